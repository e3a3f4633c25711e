export class SyncError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, or a non-2xx response. */
export class TransportError extends SyncError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(`request failed for ${url}: ${message}`, options);
    this.url = url;
    this.status = status;
  }
}

/** Upstream content that cannot be read at all: missing link, malformed XML, unreadable PDF. */
export class DocumentFormatError extends SyncError {}

export class PublishError extends SyncError {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(`publish failed for ${key}: ${message}`, options);
    this.key = key;
  }
}

export class ConfigError extends SyncError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
