import type { AppConfig } from '../config.js';
import type { SourceDefinition } from '../pipeline/types.js';
import { normalizeConsolidatedList } from '../xml/consolidated-list.js';
import { parseXmlDocument } from '../xml/xml-tree.js';
import { findUnXmlLink } from './links.js';

export const UN_SOURCE_ID = 'UN_CONSOLIDATED';
export const UN_LIST_KEY = 'unsc/UNSCR_SANCTION_LIST.json';
export const UN_STATE_KEY = 'unsc/unsc_last_xml_content_hash.txt';

export function createUnConsolidatedSource(config: AppConfig['sources']['un']): SourceDefinition {
  return {
    id: UN_SOURCE_ID,
    name: 'UN Security Council Consolidated List',
    pageUrl: config.pageUrl,
    stateKey: UN_STATE_KEY,
    outputKeys: [UN_LIST_KEY],

    async discover(fetcher, logger) {
      if (config.xmlUrl) {
        logger.debug({ url: config.xmlUrl }, 'using configured XML link');
        return config.xmlUrl;
      }
      const html = await fetcher.fetchText(config.pageUrl);
      return findUnXmlLink(html, config.pageUrl);
    },

    async extract(content) {
      const snapshot = normalizeConsolidatedList(await parseXmlDocument(content));
      return [
        {
          key: UN_LIST_KEY,
          payload: snapshot,
          recordCount: snapshot.INDIVIDUALS.length + snapshot.ENTITIES.length,
        },
      ];
    },
  };
}
