import type { SourceDefinition } from '../pipeline/types.js';

export function requireSource(sources: readonly SourceDefinition[], sourceId: string): SourceDefinition {
  const source = sources.find((candidate) => candidate.id === sourceId);
  if (!source) {
    const known = sources.map((candidate) => candidate.id).join(', ');
    throw new Error(`Unknown source "${sourceId}". Known sources: ${known}.`);
  }
  return source;
}
