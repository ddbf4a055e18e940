import { describeError, TransportError } from '@scriptforge/core';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36';

export interface FetchDocumentOptions {
  readonly timeoutMs: number;
}

export type DocumentFetcher = (url: string, options: FetchDocumentOptions) => Promise<string>;

export const fetchDocument: DocumentFetcher = async (url, options) => {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        'user-agent': BROWSER_USER_AGENT,
        accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.1'
      },
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    throw new TransportError(url, describeError(error), { cause: error });
  }

  if (!response.ok) {
    throw new TransportError(url, `${response.status} ${response.statusText} for ${url}`, {
      status: response.status
    });
  }

  return response.text();
};
