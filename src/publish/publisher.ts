import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { BlobStore } from '../storage/blob-store.js';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';

export function serializeSnapshot(payload: unknown): string {
  return `${JSON.stringify(payload, null, 2)}\n`;
}

export interface Snapshot {
  key: string;
  payload: unknown;
}

export interface Publisher {
  publish(key: string, payload: unknown): Promise<boolean>;
  /**
   * Publishes every snapshot or none of them. Returns the key that could not be
   * written, or null when all were published.
   */
  publishAll(snapshots: readonly Snapshot[]): Promise<string | null>;
}

interface Written {
  key: string;
  previous: string | null;
}

/**
 * Writes snapshots as pretty-printed JSON. Store failures are logged and reported
 * as `false`; retrying is left to the next scheduled run.
 */
export class JsonPublisher implements Publisher {
  constructor(
    private readonly blobs: BlobStore,
    private readonly logger: Logger,
  ) {}

  async publish(key: string, payload: unknown): Promise<boolean> {
    return (await this.publishAll([{ key, payload }])) === null;
  }

  async publishAll(snapshots: readonly Snapshot[]): Promise<string | null> {
    const bodies = snapshots.map((snapshot) => ({ key: snapshot.key, body: serializeSnapshot(snapshot.payload) }));
    const written: Written[] = [];

    for (const { key, body } of bodies) {
      let previous: string | null = null;
      try {
        previous = await this.blobs.get(key);
        await this.blobs.put(key, body, JSON_CONTENT_TYPE);
      } catch (error) {
        this.logger.error({ key, store: this.blobs.description, err: errorMessage(error) }, 'publish failed');
        await this.restore(written);
        return key;
      }
      written.push({ key, previous });
      this.logger.info({ key, store: this.blobs.description, bytes: Buffer.byteLength(body) }, 'published snapshot');
    }

    return null;
  }

  /** Puts back what was there before this batch; keys that did not exist are removed. */
  private async restore(written: readonly Written[]): Promise<void> {
    for (const { key, previous } of [...written].reverse()) {
      try {
        if (previous === null) {
          await this.blobs.delete(key);
        } else {
          await this.blobs.put(key, previous, JSON_CONTENT_TYPE);
        }
        this.logger.warn({ key, store: this.blobs.description }, 'restored previous snapshot');
      } catch (error) {
        this.logger.error({ key, store: this.blobs.description, err: errorMessage(error) }, 'could not restore snapshot');
      }
    }
  }
}
