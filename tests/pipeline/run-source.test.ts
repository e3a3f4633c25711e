import { describe, expect, it } from 'vitest';

import { silentLogger } from '../../src/logger.js';
import { runAll, runSource } from '../../src/pipeline/run-source.js';
import type { SourceDefinition } from '../../src/pipeline/types.js';
import { JsonPublisher, type Publisher } from '../../src/publish/publisher.js';
import { MemoryBlobStore } from '../../src/storage/blob-store.js';
import { UN_LIST_KEY, UN_STATE_KEY, createUnConsolidatedSource } from '../../src/sources/un-consolidated.js';
import { contentFingerprint } from '../../src/sync/change-detector.js';
import { FakeFetcher, STUB_SOURCE, createHarness, readFixture } from '../fixtures/sync-fixtures.js';

const PAGE_URL = 'https://un.test/page';
const XML_URL = 'https://un.test/consolidated.xml';
const XML = readFixture('consolidated-list.xml');
const XML_FINGERPRINT = contentFingerprint(Buffer.from(XML, 'utf8'));

const unSource = createUnConsolidatedSource({ pageUrl: PAGE_URL });

function unFetcher(xml = XML): FakeFetcher {
  return new FakeFetcher({
    [PAGE_URL]: '<a href="/about">About</a><a href="/consolidated.xml">Consolidated list (XML)</a>',
    [XML_URL]: xml,
    'https://stub.test/list.bin': 'stub document',
  });
}

const rejectingPublisher: Publisher = {
  async publish() {
    return false;
  },
  async publishAll(snapshots) {
    return snapshots[0]?.key ?? null;
  },
};

/** Memory store whose writes to one key always fail. */
class RejectingKeyStore extends MemoryBlobStore {
  constructor(private readonly rejectedKey: string) {
    super();
  }

  override async put(key: string, body: string, contentType: string): Promise<void> {
    if (key === this.rejectedKey) {
      throw new Error('access denied');
    }
    await super.put(key, body, contentType);
  }
}

const PAIR_SOURCE: SourceDefinition = {
  id: 'PAIR',
  name: 'Two-document list',
  pageUrl: 'https://pair.test/page',
  stateKey: 'pair/last_hash.txt',
  outputKeys: ['pair/a.json', 'pair/b.json'],
  async discover() {
    return 'https://pair.test/list.bin';
  },
  async extract() {
    return [
      { key: 'pair/a.json', payload: ['NEW'], recordCount: 1 },
      { key: 'pair/b.json', payload: ['NEW'], recordCount: 1 },
    ];
  },
};

describe('runSource', () => {
  it('publishes and stores the fingerprint on the first run', async () => {
    const harness = createHarness([unSource], unFetcher());

    const outcome = await runSource(unSource, harness.context.deps);

    expect(outcome).toEqual({
      source_id: 'UN_CONSOLIDATED',
      status: 'updated',
      fingerprint: XML_FINGERPRINT,
      previous_fingerprint: null,
      records: { [UN_LIST_KEY]: 3 },
      message: 'published 1 snapshot(s)',
      started_at: '2024-06-01T00:00:00.000Z',
      finished_at: '2024-06-01T00:00:00.000Z',
    });
    expect(await harness.fingerprints.read(UN_STATE_KEY)).toBe(XML_FINGERPRINT);

    const published = harness.blobs.objects.get(UN_LIST_KEY);
    expect(published?.body.endsWith('\n')).toBe(true);
    expect(JSON.parse(published?.body ?? '{}')).toMatchObject({ '@dateGenerated': '2024-05-01T00:00:00.000Z' });
  });

  it('skips extraction and publishing when the content is unchanged', async () => {
    const harness = createHarness([unSource], unFetcher());
    await harness.fingerprints.write(UN_STATE_KEY, XML_FINGERPRINT);

    const outcome = await runSource(unSource, harness.context.deps);

    expect(outcome.status).toBe('unchanged');
    expect(outcome.previous_fingerprint).toBe(XML_FINGERPRINT);
    expect(outcome.records).toEqual({});
    expect(harness.blobs.objects.size).toBe(0);
  });

  it('republishes unchanged content when forced', async () => {
    const harness = createHarness([unSource], unFetcher());
    await harness.fingerprints.write(UN_STATE_KEY, XML_FINGERPRINT);

    const outcome = await runSource(unSource, harness.context.deps, { force: true });

    expect(outcome.status).toBe('updated');
    expect(harness.blobs.objects.has(UN_LIST_KEY)).toBe(true);
  });

  it('processes changed content', async () => {
    const harness = createHarness([unSource], unFetcher());
    await harness.fingerprints.write(UN_STATE_KEY, 'stale-fingerprint');

    const outcome = await runSource(unSource, harness.context.deps);

    expect(outcome.status).toBe('updated');
    expect(outcome.previous_fingerprint).toBe('stale-fingerprint');
    expect(await harness.fingerprints.read(UN_STATE_KEY)).toBe(XML_FINGERPRINT);
  });

  it('leaves the fingerprint alone when publishing fails', async () => {
    const harness = createHarness([unSource], unFetcher());

    const outcome = await runSource(unSource, { ...harness.context.deps, publisher: rejectingPublisher });

    expect(outcome.status).toBe('failed');
    expect(outcome.message).toBe(`publish failed for ${UN_LIST_KEY}: store rejected the snapshot`);
    expect(outcome.records).toEqual({});
    expect(await harness.fingerprints.read(UN_STATE_KEY)).toBeNull();
  });

  it('keeps every earlier snapshot when a later one cannot be written', async () => {
    const harness = createHarness([PAIR_SOURCE], new FakeFetcher({ 'https://pair.test/list.bin': 'pair document' }));
    const blobs = new RejectingKeyStore('pair/b.json');
    await blobs.put('pair/a.json', 'OLD-A', 'application/json');
    const deps = { ...harness.context.deps, publisher: new JsonPublisher(blobs, silentLogger) };

    const outcome = await runSource(PAIR_SOURCE, deps);

    expect(outcome.status).toBe('failed');
    expect(outcome.message).toBe('publish failed for pair/b.json: store rejected the snapshot');
    expect(blobs.objects.get('pair/a.json')?.body).toBe('OLD-A');
    expect(blobs.objects.has('pair/b.json')).toBe(false);
    expect(await harness.fingerprints.read('pair/last_hash.txt')).toBeNull();
  });

  it('removes snapshots the failed run created', async () => {
    const harness = createHarness([PAIR_SOURCE], new FakeFetcher({ 'https://pair.test/list.bin': 'pair document' }));
    const blobs = new RejectingKeyStore('pair/b.json');
    const deps = { ...harness.context.deps, publisher: new JsonPublisher(blobs, silentLogger) };

    const outcome = await runSource(PAIR_SOURCE, deps);

    expect(outcome.status).toBe('failed');
    expect(blobs.objects.size).toBe(0);
  });

  it('fails without side effects on malformed XML', async () => {
    const harness = createHarness([unSource], unFetcher('<CONSOLIDATED_LIST><INDIVIDUALS></CONSOLIDATED_LIST>'));

    const outcome = await runSource(unSource, harness.context.deps);

    expect(outcome.status).toBe('failed');
    expect(outcome.message).toMatch(/^malformed XML/);
    expect(harness.blobs.objects.size).toBe(0);
    expect(await harness.fingerprints.read(UN_STATE_KEY)).toBeNull();
  });

  it('records each run in the ledger', async () => {
    const harness = createHarness([unSource], unFetcher());

    await runSource(unSource, harness.context.deps);
    await runSource(unSource, harness.context.deps);

    expect(harness.ledger.recent(10).map((run) => run.status)).toEqual(['unchanged', 'updated']);
    harness.db.close();
  });

  it('uses a configured XML link without visiting the landing page', async () => {
    const fetcher = new FakeFetcher({ [XML_URL]: XML });
    const harness = createHarness([], fetcher);
    const direct = createUnConsolidatedSource({ pageUrl: PAGE_URL, xmlUrl: XML_URL });

    const outcome = await runSource(direct, harness.context.deps);

    expect(outcome.status).toBe('updated');
    expect(fetcher.requested).toEqual([XML_URL]);
  });
});

describe('runAll', () => {
  it('keeps running other sources after one fails', async () => {
    const fetcher = new FakeFetcher({ 'https://stub.test/list.bin': 'stub document' });
    const harness = createHarness([unSource, STUB_SOURCE], fetcher);

    const outcomes = await runAll([unSource, STUB_SOURCE], harness.context.deps);

    expect(outcomes.map((outcome) => [outcome.source_id, outcome.status])).toEqual([
      ['UN_CONSOLIDATED', 'failed'],
      ['STUB', 'updated'],
    ]);
    expect(outcomes[0].message).toBe(`request failed for ${PAGE_URL}: HTTP 404`);
    expect(await harness.fingerprints.read(UN_STATE_KEY)).toBeNull();
    expect(harness.blobs.objects.get('stub/STUB_LIST.json')?.body).toBe('{\n  "size": 13\n}\n');
  });
});
