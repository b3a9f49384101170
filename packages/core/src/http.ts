import { fetch, type Dispatcher } from 'undici';
import { HttpError, InvalidUrlError, NetworkError, describeError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { jsonValueSchema } from './jsonstat/schema.js';
import type { JsonValue } from './types.js';

export const DEFAULT_USER_AGENT = 'jsonstat-kit/0.1';
export const DEFAULT_TIMEOUT_MS = 30000;

export interface FetchOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  /** Routes the request through an undici dispatcher (agent, proxy or mock). */
  dispatcher?: Dispatcher;
}

/** Given a URL, returns the deserialized JSON document or fails. */
export type DocumentFetcher = (url: string) => Promise<JsonValue>;

function checkUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new InvalidUrlError(url, describeError(error));
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidUrlError(url, `unsupported scheme ${parsed.protocol}`);
  }
  return parsed;
}

/**
 * GETs a JSON document. One attempt only: retry and backoff policies belong
 * to the caller.
 */
export async function fetchDocument(url: string, options: FetchOptions = {}): Promise<JsonValue> {
  const logger = options.logger ?? silentLogger;

  let target: URL;
  try {
    target = checkUrl(url);
  } catch (error) {
    logger.error('URL error', { url, reason: describeError(error) });
    throw error;
  }

  const ctrl = new AbortController();
  const timeout = setTimeout(() => ctrl.abort(), options.timeoutMs ?? DEFAULT_TIMEOUT_MS);

  let response: Awaited<ReturnType<typeof fetch>>;
  try {
    response = await fetch(target, {
      signal: ctrl.signal,
      dispatcher: options.dispatcher,
      headers: {
        Accept: 'application/json',
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        ...(options.headers || {})
      }
    });
  } catch (error) {
    logger.error('Request failed', { url, reason: describeError(error) });
    throw new NetworkError(url, error);
  } finally {
    clearTimeout(timeout);
  }

  if (!response.ok) {
    logger.error('HTTP error', { url, status: response.status, reason: response.statusText });
    throw new HttpError(response.status, response.statusText, url);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    logger.error('Unreadable JSON response', { url, reason: describeError(error) });
    throw new NetworkError(url, error);
  }

  const parsed = jsonValueSchema.safeParse(body);
  if (!parsed.success) {
    logger.error('Response is not JSON data', { url });
    throw new NetworkError(url, parsed.error);
  }
  logger.debug('Fetched document', { url, status: response.status });
  return parsed.data;
}

export function createFetcher(options: FetchOptions = {}): DocumentFetcher {
  return url => fetchDocument(url, options);
}
