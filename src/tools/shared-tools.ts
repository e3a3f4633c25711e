/**
 * Tool definitions and call dispatcher for the MCP server.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { about } from './about.js';
import type { ToolContext } from './context.js';
import { MAX_STATUS_LIMIT, getSyncStatus } from './get-sync-status.js';
import { listSources } from './list-sources.js';
import { runSync } from './run-sync.js';

export const TOOLS: Tool[] = [
  {
    name: 'list_sources',
    description: 'List the mirrored sanction lists with their state keys, output keys, and last recorded run.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
  {
    name: 'get_sync_status',
    description: 'Show the stored content fingerprint and last outcome per source, plus recent run history.',
    inputSchema: {
      type: 'object',
      properties: {
        source_id: { type: 'string', description: 'Optional source filter, e.g., "KDN_MOHA".' },
        limit: { type: 'number', description: 'Maximum history rows to return. Default 10, max 50.' },
      },
      required: [],
    },
  },
  {
    name: 'run_sync',
    description:
      'Check one or all sources for a new document and republish the JSON snapshots when the content changed.',
    inputSchema: {
      type: 'object',
      properties: {
        source_id: { type: 'string', description: 'Optional source id; all sources run when omitted.' },
        force: { type: 'boolean', description: 'Republish even when the content fingerprint is unchanged.' },
      },
      required: [],
    },
  },
  {
    name: 'about',
    description: 'Return server scope, mirrored sources, and supported tools.',
    inputSchema: {
      type: 'object',
      properties: {},
      additionalProperties: false,
    },
  },
];

const emptyArgs = z.object({}).strict();

const getSyncStatusArgs = z.object({
  source_id: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(MAX_STATUS_LIMIT).optional(),
});

const runSyncArgs = z.object({
  source_id: z.string().min(1).optional(),
  force: z.boolean().optional(),
});

function parseArgs<T>(schema: z.ZodType<T>, name: string, args: Record<string, unknown>): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
    throw new Error(`Invalid arguments for ${name}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Dispatch a tool call to the correct handler function.
 * Throws for unknown tools and invalid arguments.
 */
export async function callTool(context: ToolContext, name: string, args: Record<string, unknown>): Promise<unknown> {
  switch (name) {
    case 'list_sources':
      parseArgs(emptyArgs, name, args);
      return listSources(context);
    case 'get_sync_status':
      return getSyncStatus(context, parseArgs(getSyncStatusArgs, name, args));
    case 'run_sync':
      return runSync(context, parseArgs(runSyncArgs, name, args));
    case 'about':
      parseArgs(emptyArgs, name, args);
      return about(
        context,
        TOOLS.map((tool) => tool.name),
      );
    default:
      throw new Error(`Unknown tool "${name}".`);
  }
}
