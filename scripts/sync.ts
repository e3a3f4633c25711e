#!/usr/bin/env tsx
/**
 * Run one sync cycle for every configured source (or the ones named with --source).
 * Scheduled runs call this; exits 1 when any source failed.
 */
import 'dotenv/config';

import { loadConfig } from '../src/config.js';
import { errorMessage } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { runAll } from '../src/pipeline/run-source.js';
import type { SyncOutcome } from '../src/pipeline/types.js';
import { createRuntime } from '../src/runtime.js';

const SOURCE_FLAG = '--source';
const FORCE_FLAG = '--force';
const HELP_FLAGS = new Set(['--help', '-h']);

interface ParsedArgs {
  sourceIds: string[];
  force: boolean;
}

function printUsage(): void {
  console.log(
    [
      'Usage: tsx scripts/sync.ts [--source <UN_CONSOLIDATED|KDN_MOHA>]... [--force]',
      '',
      'Options:',
      `  ${SOURCE_FLAG} <id>   Sync only this source (repeatable)`,
      `  ${FORCE_FLAG}         Republish even when the content fingerprint is unchanged`,
      '  --help, -h      Show this message',
    ].join('\n'),
  );
}

function parseArguments(argv: string[]): ParsedArgs {
  if (argv.some((token) => HELP_FLAGS.has(token))) {
    printUsage();
    process.exit(0);
  }

  const sourceIds: string[] = [];
  let force = false;

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === FORCE_FLAG) {
      force = true;
      continue;
    }

    if (token === SOURCE_FLAG) {
      const value = argv[index + 1];
      if (!value) {
        throw new Error(`Missing value for ${SOURCE_FLAG}`);
      }
      sourceIds.push(value);
      index += 1;
      continue;
    }

    throw new Error(`Unknown argument: ${token}`);
  }

  return { sourceIds, force };
}

function summarize(outcome: SyncOutcome): string {
  const counts = Object.entries(outcome.records)
    .map(([key, count]) => `${key}=${count}`)
    .join(' ');
  const detail = outcome.status === 'failed' ? outcome.message : counts || outcome.message;
  return `${outcome.source_id}: ${outcome.status} ${detail}`;
}

async function main(): Promise<void> {
  const args = parseArguments(process.argv.slice(2));
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const runtime = createRuntime(config, logger);

  try {
    const unknown = args.sourceIds.filter((id) => !runtime.sources.some((source) => source.id === id));
    if (unknown.length > 0) {
      throw new Error(`Unknown source: ${unknown.join(', ')}`);
    }

    const selected =
      args.sourceIds.length > 0
        ? runtime.sources.filter((source) => args.sourceIds.includes(source.id))
        : runtime.sources;

    const outcomes = await runAll(selected, runtime.deps, { force: args.force });
    for (const outcome of outcomes) {
      console.log(`sanctions-list-sync: ${summarize(outcome)}`);
    }

    if (outcomes.some((outcome) => outcome.status === 'failed')) {
      process.exitCode = 1;
    }
  } finally {
    runtime.close();
  }
}

main().catch((error) => {
  console.error(`sanctions-list-sync: sync failed: ${errorMessage(error)}`);
  process.exit(1);
});
