import type { AppConfig } from '../config.js';
import type { SourceDefinition } from '../pipeline/types.js';
import { createKdnSource } from './kdn-list.js';
import { createUnConsolidatedSource } from './un-consolidated.js';

export { KDN_SOURCE_ID } from './kdn-list.js';
export { UN_SOURCE_ID } from './un-consolidated.js';

export function buildSources(config: AppConfig): SourceDefinition[] {
  return [createUnConsolidatedSource(config.sources.un), createKdnSource(config.sources.kdn)];
}
