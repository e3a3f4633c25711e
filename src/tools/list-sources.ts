import type { SyncOutcome } from '../pipeline/types.js';
import type { ToolContext } from './context.js';

export interface SourceSummary {
  id: string;
  name: string;
  page_url: string;
  state_key: string;
  output_keys: string[];
  last_run: SyncOutcome | null;
}

export interface ListSourcesResult {
  sources: SourceSummary[];
}

export async function listSources(context: ToolContext): Promise<ListSourcesResult> {
  return {
    sources: context.sources.map((source) => ({
      id: source.id,
      name: source.name,
      page_url: source.pageUrl,
      state_key: source.stateKey,
      output_keys: [...source.outputKeys],
      last_run: context.ledger.latest(source.id),
    })),
  };
}
