/**
 * HTTP calls to provider APIs, JSON or plain text
 */

import { ProviderError, errorMessage } from '../utils/errors.js';
import { scrubSensitiveData, truncateText } from '../formatters/scrub.js';
import { logger } from '../utils/logger.js';

export interface JsonRequest {
  /** Provider name for errors and logs */
  provider: string;
  url: string;
  method?: 'GET' | 'POST';
  /** Sent as a bearer token */
  apiKey?: string;
  /** JSON body for POST requests */
  body?: unknown;
  /** Query string parameters */
  query?: Record<string, string>;
  /** Extra request headers */
  headers?: Record<string, string>;
  timeoutMs: number;
}

const USER_AGENT = 'wechat-bot-plugins/1.0';

/** Upper bound on upstream text kept in an error message */
const MAX_ERROR_BODY = 300;

function upstreamText(text: string): string {
  return truncateText(scrubSensitiveData(text.trim()), MAX_ERROR_BODY);
}

interface ResponseBody {
  status: number;
  text: string;
}

async function send(request: JsonRequest): Promise<ResponseBody> {
  const method = request.method ?? (request.body === undefined ? 'GET' : 'POST');

  let url = request.url;
  if (request.query && Object.keys(request.query).length > 0) {
    url += `${url.includes('?') ? '&' : '?'}${new URLSearchParams(request.query).toString()}`;
  }

  const headers: Record<string, string> = {
    'Accept': 'application/json',
    'User-Agent': USER_AGENT,
    ...request.headers,
  };
  if (request.apiKey) {
    headers.Authorization = `Bearer ${request.apiKey}`;
  }
  if (request.body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => { controller.abort(); }, request.timeoutMs);
  const startedAt = Date.now();

  let response: Response;
  try {
    response = await fetch(url, {
      method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal,
    });
  } catch (error) {
    clearTimeout(timeoutId);
    const message = controller.signal.aborted
      ? `Request timed out after ${String(request.timeoutMs)}ms`
      : upstreamText(errorMessage(error));
    logger.warn('Provider request failed', { provider: request.provider, method, error: message });
    throw new ProviderError(request.provider, message);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    const message = controller.signal.aborted
      ? `Request timed out after ${String(request.timeoutMs)}ms`
      : upstreamText(errorMessage(error));
    throw new ProviderError(request.provider, message, response.status);
  } finally {
    clearTimeout(timeoutId);
  }

  logger.debug('Provider response', {
    provider: request.provider,
    method,
    status: response.status,
    durationMs: Date.now() - startedAt,
  });

  if (!response.ok) {
    const message = upstreamText(text) || response.statusText || 'Request failed';
    logger.warn('Provider returned error status', {
      provider: request.provider,
      status: response.status,
      message,
    });
    throw new ProviderError(request.provider, message, response.status);
  }

  return { status: response.status, text };
}

/**
 * Issue exactly one HTTP request and parse the JSON response
 *
 * @returns Parsed JSON body, unvalidated
 * @throws ProviderError on network failure, timeout, non-2xx status or malformed JSON
 */
export async function requestJson(request: JsonRequest): Promise<unknown> {
  const { status, text } = await send(request);
  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw new ProviderError(request.provider, 'Malformed JSON response', status);
  }
}

/**
 * Issue exactly one HTTP request and return the body as text, e.g. an HTML page
 *
 * @throws ProviderError on network failure, timeout or non-2xx status
 */
export async function requestText(request: JsonRequest): Promise<string> {
  const { text } = await send(request);
  return text;
}
