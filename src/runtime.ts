import fs from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';

import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import type { PipelineDeps } from './pipeline/run-source.js';
import type { SourceDefinition } from './pipeline/types.js';
import { JsonPublisher } from './publish/publisher.js';
import { buildSources } from './sources/index.js';
import { BlobFingerprintStore, type FingerprintStore, SqliteFingerprintStore } from './state/fingerprint-store.js';
import { SyncLedger } from './state/ledger.js';
import { type BlobStore, LocalBlobStore, S3BlobStore } from './storage/blob-store.js';
import { HttpFetcher } from './sync/http.js';

export interface Runtime {
  config: AppConfig;
  sources: SourceDefinition[];
  blobs: BlobStore;
  fingerprints: FingerprintStore;
  ledger: SyncLedger;
  deps: PipelineDeps;
  close(): void;
}

function createBlobStore(config: AppConfig): BlobStore {
  if (config.storage.kind === 's3') {
    return new S3BlobStore({
      bucket: config.storage.bucket,
      region: config.storage.region,
      endpoint: config.storage.endpoint,
    });
  }
  return new LocalBlobStore(config.storage.outputDir);
}

function openDatabase(dbPath: string): Database.Database {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  return db;
}

/** Wires stores, fetcher and publisher from the validated config. */
export function createRuntime(config: AppConfig, logger: Logger): Runtime {
  const db = openDatabase(config.dbPath);
  const blobs = createBlobStore(config);
  const fingerprints: FingerprintStore =
    config.state === 'sqlite' ? new SqliteFingerprintStore(db) : new BlobFingerprintStore(blobs);
  const ledger = new SyncLedger(db);

  logger.debug({ storage: blobs.description, state: config.state }, 'runtime ready');

  return {
    config,
    sources: buildSources(config),
    blobs,
    fingerprints,
    ledger,
    deps: {
      fetcher: new HttpFetcher(config.http),
      fingerprints,
      publisher: new JsonPublisher(blobs, logger),
      logger,
      ledger,
    },
    close() {
      db.close();
    },
  };
}
