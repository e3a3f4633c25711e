import type { ToolContext } from './context.js';

export const SERVER_NAME = 'sanctions-list-sync';
export const SERVER_VERSION = '0.1.0';

export interface AboutResult {
  name: string;
  version: string;
  description: string;
  sources: Array<{
    id: string;
    name: string;
    url: string;
  }>;
  outputs: string[];
  disclaimer: string;
  supported_tools: string[];
}

export async function about(context: ToolContext, supportedTools: string[]): Promise<AboutResult> {
  return {
    name: SERVER_NAME,
    version: SERVER_VERSION,
    description:
      'Mirrors the UN Security Council consolidated list and the Malaysian Ministry of Home Affairs list as JSON snapshots, republishing only when the upstream document changes.',
    sources: context.sources.map((source) => ({
      id: source.id,
      name: source.name,
      url: source.pageUrl,
    })),
    outputs: context.sources.flatMap((source) => [...source.outputKeys]),
    disclaimer:
      'Snapshots are machine-extracted from the published documents. Verify matches against the official lists before acting on them.',
    supported_tools: supportedTools,
  };
}
