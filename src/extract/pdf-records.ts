import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { PageRange } from '../config.js';
import { type ColumnSchema, type PdfRecord, type RawTable, cleanCell, headerMatches, mapRow } from './column-schema.js';

export interface PdfPageContent {
  /** 0-based page index within the document */
  index: number;
  text: string | null | undefined;
  tables: RawTable[];
}

export interface ExtractRecordsOptions {
  /** Stop before the first page whose text contains this heading. */
  stopAtHeading?: string;
  /** Only pages whose index falls inside this inclusive range are read. */
  pageRange?: PageRange;
  now?: Date;
  logger?: Logger;
}

function pageHasHeading(page: PdfPageContent, heading: string): boolean {
  return typeof page.text === 'string' && page.text.includes(heading);
}

function inRange(index: number, range: PageRange | undefined): boolean {
  if (!range) {
    return true;
  }
  return index >= range.start && index <= range.end;
}

/**
 * Pulls records for one schema out of page-level table candidates, in document order.
 *
 * Candidates with fewer than two rows, or whose header lacks any of the schema's
 * markers, are skipped. With `stopAtHeading` the scan ends at the first page whose
 * text carries the heading, before that page's tables are looked at.
 */
export function extractRecords(
  pages: readonly PdfPageContent[],
  schema: ColumnSchema,
  options: ExtractRecordsOptions = {},
): PdfRecord[] {
  const now = options.now ?? new Date();
  const logger = options.logger ?? silentLogger;
  const records: PdfRecord[] = [];

  for (const page of pages) {
    if (!inRange(page.index, options.pageRange)) {
      continue;
    }

    if (options.stopAtHeading && pageHasHeading(page, options.stopAtHeading)) {
      logger.debug({ page: page.index, heading: options.stopAtHeading }, 'section boundary reached');
      break;
    }

    for (const table of page.tables) {
      if (table.length < 2) {
        continue;
      }

      if (!headerMatches(schema, table[0])) {
        logger.debug({ page: page.index, schema: schema.id }, 'table header does not match schema');
        continue;
      }

      for (const row of table.slice(1)) {
        const record = mapRow(schema, row.map(cleanCell), now);
        if (record) {
          records.push(record);
        }
      }
    }
  }

  return records;
}
