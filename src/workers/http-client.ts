import { request, type Dispatcher } from 'undici';

export interface HttpResult {
  body: string;
  status: number;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'manifest-sync/1.0',
  Accept: '*/*',
};

export async function fetchHttp(url: string, options: HttpRequestOptions): Promise<HttpResult> {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: { ...DEFAULT_HEADERS, ...options.headers },
    maxRedirections: 3,
    headersTimeout: options.timeoutMs,
    bodyTimeout: options.timeoutMs,
    dispatcher: options.dispatcher,
  });

  const text = await body.text();

  return {
    body: text,
    status: statusCode,
  };
}
