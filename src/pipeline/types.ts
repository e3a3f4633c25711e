import type { Logger } from '../logger.js';
import type { DocumentFetcher } from '../sync/http.js';

export type SyncStatus = 'updated' | 'unchanged' | 'failed';

export interface SyncOutcome {
  source_id: string;
  status: SyncStatus;
  fingerprint: string | null;
  previous_fingerprint: string | null;
  /** output key -> record count; empty unless published */
  records: Record<string, number>;
  message: string;
  started_at: string;
  finished_at: string;
}

export interface PublishedDocument {
  key: string;
  payload: unknown;
  recordCount: number;
}

export interface ExtractContext {
  now: Date;
  logger: Logger;
}

/**
 * One upstream publication: where it lives, how to find the current document,
 * and how to turn its bytes into the snapshots to publish.
 */
export interface SourceDefinition {
  id: string;
  name: string;
  pageUrl: string;
  /** Blob key or row key under which the last processed fingerprint is kept. */
  stateKey: string;
  outputKeys: readonly string[];
  discover(fetcher: DocumentFetcher, logger: Logger): Promise<string>;
  extract(content: Buffer, context: ExtractContext): Promise<PublishedDocument[]>;
}
