import { runAll } from '../pipeline/run-source.js';
import type { SyncOutcome } from '../pipeline/types.js';
import type { ToolContext } from './context.js';
import { requireSource } from './source-utils.js';

export interface RunSyncInput {
  source_id?: string;
  force?: boolean;
}

export interface RunSyncResult {
  outcomes: SyncOutcome[];
  failed: number;
}

export async function runSync(context: ToolContext, input: RunSyncInput): Promise<RunSyncResult> {
  const sources = input.source_id ? [requireSource(context.sources, input.source_id)] : context.sources;
  const outcomes = await runAll(sources, context.deps, { force: input.force === true });

  return {
    outcomes,
    failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
  };
}
