/**
 * Upstream HTTP helper
 * Native fetch with a per-call timeout, JSON decoding and error classification
 */

import { UpstreamError, UpstreamErrorType, classifyUpstreamError, statusErrorType } from './upstream.errors';

export interface FetchJsonOptions {
  timeoutMs: number;
  params?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
}

export function buildUrl(baseUrl: string, params: FetchJsonOptions['params'] = {}): string {
  const url = new URL(baseUrl);
  for (const [name, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(name, String(value));
    }
  }
  return url.toString();
}

/**
 * GET a JSON document. Rejects with UpstreamError on timeout, network failure,
 * non-2xx status or an undecodable body.
 */
export async function fetchJson(provider: string, baseUrl: string, options: FetchJsonOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(buildUrl(baseUrl, options.params), {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        'User-Agent': 'agri-snapshot-api/1.0',
        ...options.headers,
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new UpstreamError(
        provider,
        statusErrorType(response.status),
        `HTTP ${response.status} ${response.statusText}`.trim(),
        response.status
      );
    }

    const body = await response.text();
    try {
      return JSON.parse(body);
    } catch {
      throw new UpstreamError(provider, UpstreamErrorType.PARSE_ERROR, 'Response body is not valid JSON');
    }
  } catch (error: unknown) {
    throw classifyUpstreamError(provider, error);
  } finally {
    clearTimeout(timeoutId);
  }
}
