import { request, type Dispatcher } from 'undici';

export interface HttpResult {
  body: string;
  status: number;
}

export interface HttpOptions {
  timeoutMs: number;
  /** Override the global dispatcher (tests use an undici MockAgent) */
  dispatcher?: Dispatcher;
}

export type HttpFetch = (url: string, options: HttpOptions) => Promise<HttpResult>;

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'VlrExtract/0.1 (research project)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
};

export const fetchHttp: HttpFetch = async (url, options) => {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: DEFAULT_HEADERS,
    maxRedirections: 3,
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
    signal: AbortSignal.timeout(options.timeoutMs),
    dispatcher: options.dispatcher,
  });

  const text = await body.text();

  return {
    body: text,
    status: statusCode,
  };
};
