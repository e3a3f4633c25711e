import { PublishError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Publisher } from '../publish/publisher.js';
import type { FingerprintStore } from '../state/fingerprint-store.js';
import type { SyncLedger } from '../state/ledger.js';
import { contentFingerprint, shouldProcess } from '../sync/change-detector.js';
import type { DocumentFetcher } from '../sync/http.js';
import type { SourceDefinition, SyncOutcome } from './types.js';

export interface PipelineDeps {
  fetcher: DocumentFetcher;
  fingerprints: FingerprintStore;
  publisher: Publisher;
  logger: Logger;
  ledger?: SyncLedger;
  clock?: () => Date;
}

export interface RunOptions {
  /** Process even when the fingerprint is unchanged. */
  force?: boolean;
}

/**
 * One discover, fetch, compare, extract, publish cycle. Never throws: any failure
 * becomes a `failed` outcome and the stored fingerprint is left as it was.
 */
export async function runSource(
  source: SourceDefinition,
  deps: PipelineDeps,
  options: RunOptions = {},
): Promise<SyncOutcome> {
  const clock = deps.clock ?? (() => new Date());
  const logger = deps.logger.child({ source: source.id });
  const startedAt = clock();

  let fingerprint: string | null = null;
  let previous: string | null = null;
  const records: Record<string, number> = {};

  const finish = (status: SyncOutcome['status'], message: string): SyncOutcome => {
    const outcome: SyncOutcome = {
      source_id: source.id,
      status,
      fingerprint,
      previous_fingerprint: previous,
      records: status === 'updated' ? records : {},
      message,
      started_at: startedAt.toISOString(),
      finished_at: clock().toISOString(),
    };
    if (deps.ledger) {
      try {
        deps.ledger.record(outcome);
      } catch (error) {
        logger.warn({ err: errorMessage(error) }, 'could not record sync run');
      }
    }
    return outcome;
  };

  try {
    const url = await source.discover(deps.fetcher, logger);
    logger.info({ url }, 'discovered document link');

    const content = await deps.fetcher.fetchBytes(url);
    fingerprint = contentFingerprint(content);
    previous = await deps.fingerprints.read(source.stateKey);

    const changed = shouldProcess(fingerprint, previous);
    logger.info({ fingerprint, previous, changed, force: options.force === true }, 'compared fingerprints');

    if (!changed && !options.force) {
      return finish('unchanged', 'content unchanged since last run');
    }

    const documents = await source.extract(content, { now: startedAt, logger });

    const rejected = await deps.publisher.publishAll(documents);
    if (rejected !== null) {
      throw new PublishError(rejected, 'store rejected the snapshot');
    }
    for (const document of documents) {
      records[document.key] = document.recordCount;
    }

    await deps.fingerprints.write(source.stateKey, fingerprint);
    logger.info({ records }, 'sync complete');

    return finish('updated', `published ${documents.length} snapshot(s)`);
  } catch (error) {
    const message = errorMessage(error);
    logger.error({ err: message }, 'sync failed');
    return finish('failed', message);
  }
}

/** Runs each source in turn; one source failing does not stop the others. */
export async function runAll(
  sources: readonly SourceDefinition[],
  deps: PipelineDeps,
  options: RunOptions = {},
): Promise<SyncOutcome[]> {
  const outcomes: SyncOutcome[] = [];
  for (const source of sources) {
    outcomes.push(await runSource(source, deps, options));
  }
  return outcomes;
}
