import type { Runtime } from '../runtime.js';

/** What the tool handlers need from the runtime; tests build one from in-memory stores. */
export type ToolContext = Pick<Runtime, 'sources' | 'fingerprints' | 'ledger' | 'deps'>;
