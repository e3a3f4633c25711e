import type { AppConfig } from '../config.js';
import { KDN_GROUP_SCHEMA, KDN_INDIVIDUAL_SCHEMA } from '../extract/column-schema.js';
import { type PdfPageContent, extractRecords } from '../extract/pdf-records.js';
import type { ExtractContext, PublishedDocument, SourceDefinition } from '../pipeline/types.js';
import { readPdfPages } from '../pdf/pdf-reader.js';
import { findKdnPdfLink } from './links.js';

export const KDN_SOURCE_ID = 'KDN_MOHA';
export const KDN_INDIVIDUAL_KEY = 'kdn/KDN_INDIVIDUAL_SANCTION_LIST.json';
export const KDN_GROUP_KEY = 'kdn/KDN_GROUP_SANCTION_LIST.json';
export const KDN_STATE_KEY = 'kdn/kdn_last_pdf_content_hash.txt';

/** Heading that opens the groups section, right after the individuals. */
export const GROUP_SECTION_HEADING = 'B. GROUP';

export type KdnSourceConfig = AppConfig['sources']['kdn'];

/**
 * Splits already-read pages into the two published lists. Individuals run until
 * the groups heading; groups are read from the configured page range only.
 */
export function extractKdnDocuments(
  pages: readonly PdfPageContent[],
  config: Pick<KdnSourceConfig, 'groupPages'>,
  context: ExtractContext,
): PublishedDocument[] {
  const individuals = extractRecords(pages, KDN_INDIVIDUAL_SCHEMA, {
    stopAtHeading: GROUP_SECTION_HEADING,
    now: context.now,
    logger: context.logger,
  });
  const groups = extractRecords(pages, KDN_GROUP_SCHEMA, {
    pageRange: config.groupPages,
    now: context.now,
    logger: context.logger,
  });

  context.logger.info({ individuals: individuals.length, groups: groups.length }, 'extracted list records');

  return [
    { key: KDN_INDIVIDUAL_KEY, payload: individuals, recordCount: individuals.length },
    { key: KDN_GROUP_KEY, payload: groups, recordCount: groups.length },
  ];
}

export function createKdnSource(config: KdnSourceConfig): SourceDefinition {
  return {
    id: KDN_SOURCE_ID,
    name: 'Ministry of Home Affairs (KDN) Sanctions List',
    pageUrl: config.pageUrl,
    stateKey: KDN_STATE_KEY,
    outputKeys: [KDN_INDIVIDUAL_KEY, KDN_GROUP_KEY],

    async discover(fetcher) {
      const html = await fetcher.fetchText(config.pageUrl);
      return findKdnPdfLink(html, config.pageUrl);
    },

    async extract(content, context) {
      const pages = await readPdfPages(content);
      return extractKdnDocuments(pages, config, context);
    },
  };
}
