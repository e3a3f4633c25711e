import type { Database } from 'better-sqlite3';

import type { BlobStore } from '../storage/blob-store.js';

/**
 * Last successfully processed fingerprint per state key.
 * `read` returns null when nothing was ever written.
 */
export interface FingerprintStore {
  read(key: string): Promise<string | null>;
  write(key: string, value: string): Promise<void>;
}

/** One text object per key on the blob store. */
export class BlobFingerprintStore implements FingerprintStore {
  constructor(private readonly blobs: BlobStore) {}

  async read(key: string): Promise<string | null> {
    const body = await this.blobs.get(key);
    return body === null ? null : body.trim();
  }

  async write(key: string, value: string): Promise<void> {
    await this.blobs.put(key, value, 'text/plain; charset=utf-8');
  }
}

const FINGERPRINT_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS fingerprints (
  state_key TEXT PRIMARY KEY,
  value TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

interface FingerprintRow {
  value: string;
}

export class SqliteFingerprintStore implements FingerprintStore {
  constructor(private readonly db: Database) {
    db.exec(FINGERPRINT_SCHEMA_SQL);
  }

  async read(key: string): Promise<string | null> {
    const row = this.db
      .prepare<[string], FingerprintRow>('SELECT value FROM fingerprints WHERE state_key = ?')
      .get(key);
    return row?.value ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.db
      .prepare<[string, string, string]>(
        `
        INSERT INTO fingerprints (state_key, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(state_key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
        `,
      )
      .run(key, value, new Date().toISOString());
  }
}

export class MemoryFingerprintStore implements FingerprintStore {
  readonly values = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.values.set(key, value);
    }
  }

  async read(key: string): Promise<string | null> {
    return this.values.get(key) ?? null;
  }

  async write(key: string, value: string): Promise<void> {
    this.values.set(key, value);
  }
}
