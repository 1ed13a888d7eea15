import type { FetchBytes, FetchedFile } from '../../core/relay/types.js';
import { FetchFailedError } from '../../utils/errors.js';

export interface HttpFetcherOptions {
  timeoutMs: number;
  /** Extra request headers, e.g. authorization for private media hosts */
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
}

/** 4xx means the URL or our credentials are wrong; 408 and 429 are worth another try. */
export function isPermanentStatus(status: number): boolean {
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

export function filenameFromUrl(url: string): string | undefined {
  try {
    const segment = new URL(url).pathname.split('/').pop();
    return segment ? decodeURIComponent(segment) : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Builds the default media fetch capability on top of `fetch`, with a hard
 * timeout per request and failures classified as permanent or transient.
 */
export function createHttpFetcher(options: HttpFetcherOptions): FetchBytes {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (url: string, signal?: AbortSignal): Promise<FetchedFile> => {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: { 'User-Agent': 'MaxTelegramRelay/1.0', ...options.headers },
        redirect: 'follow',
        signal: signal ? AbortSignal.any([timeout, signal]) : timeout,
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const reason = timedOut ? `timed out after ${options.timeoutMs}ms` : 'network error';
      throw new FetchFailedError(url, `Media fetch ${reason}`, { permanent: false }, { cause: error });
    }

    if (!response.ok) {
      throw new FetchFailedError(url, `Media fetch failed with HTTP ${response.status}`, {
        status: response.status,
        permanent: isPermanentStatus(response.status),
      });
    }

    let data: Buffer;
    try {
      data = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new FetchFailedError(url, 'Media download interrupted', { permanent: false }, { cause: error });
    }

    const file: FetchedFile = { data };
    const filename = response.headers.get('X-File-Name') || filenameFromUrl(response.url || url);
    if (filename) file.filename = filename;
    const contentType = response.headers.get('Content-Type');
    if (contentType) file.contentType = contentType;
    return file;
  };
}
