import {
  AuthError,
  ConnectionError,
  HttpError,
  ProtocolError,
  silentLogger,
  type Logger,
} from '@deepdub/shared';

export interface HttpClientConfig {
  baseUrl: string;
  apiKey: string;
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

export interface HttpRequestOptions {
  path: string;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export type HttpResult =
  | { kind: 'json'; value: unknown }
  | { kind: 'binary'; bytes: Uint8Array; contentType: string };

function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted = { ...headers };
  if (redacted['x-api-key']) {
    redacted['x-api-key'] = '[redacted]';
  }
  return redacted;
}

function formatBodyForLog(body: unknown): unknown {
  if (typeof body === 'string') {
    return body.length > 500 ? `${body.slice(0, 500)}…` : body;
  }
  return body;
}

export function buildUrl(baseUrl: string, requestPath: string): URL {
  const base = baseUrl.replace(/\/+$/, '');
  const suffix = requestPath.startsWith('/') ? requestPath : `/${requestPath}`;
  return new URL(`${base}${suffix}`);
}

export async function httpRequest(
  config: HttpClientConfig,
  init: HttpRequestOptions,
): Promise<HttpResult> {
  const logger = config.logger ?? silentLogger;
  const fetchImpl = config.fetchImpl ?? fetch;
  const url = buildUrl(config.baseUrl, init.path);
  if (init.query) {
    for (const [key, value] of Object.entries(init.query)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
  }

  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    'x-api-key': config.apiKey,
    ...(init.headers ?? {}),
  };

  const method = init.method ?? 'GET';
  const requestInit: RequestInit = {
    method,
    headers,
  };
  if (init.body !== undefined) {
    requestInit.body = JSON.stringify(init.body);
  }
  if (init.signal) {
    requestInit.signal = init.signal;
  }

  logger.debug?.('request', { url: url.toString(), method, headers: redactHeaders(headers) });

  let response: Response;
  try {
    response = await fetchImpl(url.toString(), requestInit);
  } catch (err) {
    logger.error('fetch failed', {
      url: url.toString(),
      method,
      error: err instanceof Error ? err.message : String(err),
    });
    throw new ConnectionError(`Request to ${url.pathname} failed`, { cause: err });
  }

  const contentType = response.headers.get('content-type') ?? '';
  const isJson = contentType.startsWith('application/json');

  if (!response.ok) {
    const text = await response.text();
    let parsedBody: unknown = text;
    if (text && isJson) {
      try {
        parsedBody = JSON.parse(text);
      } catch {
        parsedBody = text;
      }
    }
    logger.error('http error', {
      url: url.toString(),
      method,
      status: response.status,
      statusText: response.statusText,
      body: formatBodyForLog(parsedBody),
    });
    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Credentials rejected (HTTP ${response.status})`, response.status);
    }
    throw new HttpError(response.status, response.statusText, parsedBody);
  }

  if (isJson) {
    const text = await response.text();
    if (!text) {
      return { kind: 'json', value: null };
    }
    try {
      return { kind: 'json', value: JSON.parse(text) };
    } catch (err) {
      throw new ProtocolError(`Malformed JSON response from ${url.pathname}`, {
        cause: err,
        details: { body: formatBodyForLog(text) },
      });
    }
  }

  const buffer = await response.arrayBuffer();
  return { kind: 'binary', bytes: new Uint8Array(buffer), contentType };
}
