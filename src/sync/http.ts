import { TransportError, errorMessage } from '../errors.js';

const USER_AGENT = 'sanctions-list-sync/0.1 (+scheduled sanction list mirror)';

export interface DocumentFetcher {
  fetchBytes(url: string): Promise<Buffer>;
  fetchText(url: string): Promise<string>;
}

export interface HttpFetcherOptions {
  timeoutMs: number;
  retries: number;
  fetchImpl?: typeof fetch;
}

/**
 * GET with a per-attempt timeout. The last failure is rethrown as a TransportError.
 */
export class HttpFetcher implements DocumentFetcher {
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.retries = Math.max(1, options.retries);
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchBytes(url: string): Promise<Buffer> {
    return this.request(url, 'application/pdf, application/xml, text/xml, */*', async (response) =>
      Buffer.from(await response.arrayBuffer()),
    );
  }

  async fetchText(url: string): Promise<string> {
    return this.request(url, 'text/html, application/xhtml+xml, text/plain, */*', (response) => response.text());
  }

  private async request<T>(url: string, accept: string, read: (response: Response) => Promise<T>): Promise<T> {
    let lastError: TransportError | null = null;

    for (let attempt = 0; attempt < this.retries; attempt += 1) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

      try {
        const response = await this.fetchImpl(url, {
          method: 'GET',
          headers: {
            'user-agent': USER_AGENT,
            accept,
          },
          signal: controller.signal,
        });

        if (!response.ok) {
          lastError = new TransportError(url, `HTTP ${response.status}`, response.status);
          await response.body?.cancel();
          // client errors will not heal on retry
          if (response.status >= 400 && response.status < 500) {
            break;
          }
          continue;
        }

        return await read(response);
      } catch (error) {
        lastError = new TransportError(url, errorMessage(error), null, { cause: error });
      } finally {
        clearTimeout(timeout);
      }
    }

    throw lastError ?? new TransportError(url, 'no attempt made');
  }
}
