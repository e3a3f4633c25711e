import type { Database } from 'better-sqlite3';

import type { SyncOutcome, SyncStatus } from '../pipeline/types.js';

const LEDGER_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_id TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('updated', 'unchanged', 'failed')),
  fingerprint TEXT,
  previous_fingerprint TEXT,
  records TEXT NOT NULL,
  message TEXT NOT NULL,
  started_at TEXT NOT NULL,
  finished_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_runs_source ON sync_runs(source_id, id);
`;

interface SyncRunRow {
  source_id: string;
  status: string;
  fingerprint: string | null;
  previous_fingerprint: string | null;
  records: string;
  message: string;
  started_at: string;
  finished_at: string;
}

const SELECT_COLUMNS =
  'source_id, status, fingerprint, previous_fingerprint, records, message, started_at, finished_at';

function toStatus(value: string): SyncStatus {
  if (value === 'updated' || value === 'unchanged') {
    return value;
  }
  return 'failed';
}

function parseRecords(value: string): Record<string, number> {
  const parsed: unknown = JSON.parse(value);
  const records: Record<string, number> = {};
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    for (const [key, count] of Object.entries(parsed)) {
      if (typeof count === 'number') {
        records[key] = count;
      }
    }
  }
  return records;
}

function toOutcome(row: SyncRunRow): SyncOutcome {
  return {
    source_id: row.source_id,
    status: toStatus(row.status),
    fingerprint: row.fingerprint,
    previous_fingerprint: row.previous_fingerprint,
    records: parseRecords(row.records),
    message: row.message,
    started_at: row.started_at,
    finished_at: row.finished_at,
  };
}

/** Append-only history of sync runs. */
export class SyncLedger {
  constructor(private readonly db: Database) {
    db.exec(LEDGER_SCHEMA_SQL);
  }

  record(outcome: SyncOutcome): void {
    this.db
      .prepare(
        `
        INSERT INTO sync_runs (
          source_id, status, fingerprint, previous_fingerprint, records, message, started_at, finished_at
        ) VALUES (
          @source_id, @status, @fingerprint, @previous_fingerprint, @records, @message, @started_at, @finished_at
        )
        `,
      )
      .run({ ...outcome, records: JSON.stringify(outcome.records) });
  }

  latest(sourceId: string): SyncOutcome | null {
    const row = this.db
      .prepare<[string], SyncRunRow>(
        `SELECT ${SELECT_COLUMNS} FROM sync_runs WHERE source_id = ? ORDER BY id DESC LIMIT 1`,
      )
      .get(sourceId);
    return row ? toOutcome(row) : null;
  }

  recent(limit: number, sourceId?: string): SyncOutcome[] {
    const rows = sourceId
      ? this.db
          .prepare<[string, number], SyncRunRow>(
            `SELECT ${SELECT_COLUMNS} FROM sync_runs WHERE source_id = ? ORDER BY id DESC LIMIT ?`,
          )
          .all(sourceId, limit)
      : this.db
          .prepare<[number], SyncRunRow>(`SELECT ${SELECT_COLUMNS} FROM sync_runs ORDER BY id DESC LIMIT ?`)
          .all(limit);
    return rows.map(toOutcome);
  }
}
