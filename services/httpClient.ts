import { FormatFailure, LoadFailure, getErrorMessage } from './errors';

/**
 * The subset of a fetch Response the services read.
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Transport used by every service. The platform `fetch` satisfies it; tests
 * and callers can substitute their own.
 */
export type Fetcher = (url: string, options?: FetchOptions) => Promise<HttpResponse>;

export const defaultFetcher: Fetcher = (url, options) => fetch(url, options);

/**
 * Wraps a fetcher so requests that take longer than `timeoutMs` are aborted
 * and rejected with a LoadFailure.
 */
export const withTimeout = (fetcher: Fetcher, timeoutMs: number): Fetcher => {
  return (url, options = {}) => {
    const controller = new AbortController();
    const onOuterAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onOuterAbort);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new LoadFailure(`Request timed out after ${timeoutMs}ms: ${url}`));
      }, timeoutMs);
    });

    return Promise.race([fetcher(url, { signal: controller.signal }), timeout]).finally(() => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onOuterAbort);
    });
  };
};

/**
 * GETs a URL and decodes its JSON body. Transport errors and non-2xx
 * responses become a LoadFailure carrying `failureMessage`, an undecodable
 * body a FormatFailure.
 */
export const getJson = async (fetcher: Fetcher, url: string, failureMessage: string): Promise<unknown> => {
  let response: HttpResponse;
  try {
    response = await fetcher(url);
  } catch (error) {
    if (error instanceof LoadFailure) throw error;
    throw new LoadFailure(`${failureMessage} (${getErrorMessage(error)})`);
  }

  if (!response.ok) {
    throw new LoadFailure(`${failureMessage} (status ${response.status})`, response.status);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new FormatFailure(`${failureMessage} (invalid JSON: ${getErrorMessage(error)})`);
  }
};
