import type { SyncOutcome } from '../pipeline/types.js';
import type { ToolContext } from './context.js';
import { requireSource } from './source-utils.js';

export interface GetSyncStatusInput {
  source_id?: string;
  limit?: number;
}

export interface SourceStatus {
  source_id: string;
  fingerprint: string | null;
  last_run: SyncOutcome | null;
}

export interface GetSyncStatusResult {
  sources: SourceStatus[];
  recent_runs: SyncOutcome[];
}

export const DEFAULT_STATUS_LIMIT = 10;
export const MAX_STATUS_LIMIT = 50;

export async function getSyncStatus(context: ToolContext, input: GetSyncStatusInput): Promise<GetSyncStatusResult> {
  const limit = Math.min(Math.max(input.limit ?? DEFAULT_STATUS_LIMIT, 1), MAX_STATUS_LIMIT);
  const sources = input.source_id ? [requireSource(context.sources, input.source_id)] : context.sources;

  const statuses: SourceStatus[] = [];
  for (const source of sources) {
    statuses.push({
      source_id: source.id,
      fingerprint: await context.fingerprints.read(source.stateKey),
      last_run: context.ledger.latest(source.id),
    });
  }

  return {
    sources: statuses,
    recent_runs: context.ledger.recent(limit, input.source_id),
  };
}
