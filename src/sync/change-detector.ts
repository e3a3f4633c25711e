import crypto from 'node:crypto';

/** Hex SHA-256 of the raw document bytes; the fingerprint stored between runs. */
export function contentFingerprint(content: Uint8Array): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Content-hash change detection. An absent stored fingerprint (first run) always
 * counts as a change. The caller persists the new fingerprint only after every
 * downstream step succeeded.
 */
export function shouldProcess(currentFingerprint: string, storedFingerprint: string | null): boolean {
  if (storedFingerprint === null) {
    return true;
  }
  return currentFingerprint !== storedFingerprint;
}
