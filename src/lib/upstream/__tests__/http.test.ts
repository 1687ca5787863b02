/**
 * Upstream HTTP Helper Tests
 */

import { buildUrl, fetchJson } from '../http';
import { UpstreamErrorType } from '../upstream.errors';
import { jsonResponse } from '../../../__tests__/helpers/mocks';

describe('buildUrl', () => {
  it('should append defined params and skip undefined ones', () => {
    expect(
      buildUrl('https://api.example.com/resource', { 'filters[market]': 'Indore', limit: 10, skip: undefined })
    ).toBe('https://api.example.com/resource?filters%5Bmarket%5D=Indore&limit=10');
  });
});

describe('fetchJson', () => {
  let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should decode a JSON body', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ ok: true }));

    await expect(fetchJson('Test', 'https://api.example.com/data', { timeoutMs: 1000 })).resolves.toEqual({ ok: true });
    expect(fetchSpy).toHaveBeenCalledWith(
      'https://api.example.com/data',
      expect.objectContaining({ method: 'GET', headers: expect.objectContaining({ Accept: 'application/json' }) })
    );
  });

  it('should reject non-2xx statuses with the status code', async () => {
    fetchSpy.mockResolvedValue(jsonResponse({ error: 'slow down' }, 429));

    await expect(fetchJson('Test', 'https://api.example.com/data', { timeoutMs: 1000 })).rejects.toMatchObject({
      type: UpstreamErrorType.RATE_LIMITED,
      statusCode: 429,
      message: 'Test: HTTP 429',
    });
  });

  it('should reject a body that is not JSON', async () => {
    fetchSpy.mockResolvedValue(new Response('<html>maintenance</html>', { status: 200 }));

    await expect(fetchJson('Test', 'https://api.example.com/data', { timeoutMs: 1000 })).rejects.toMatchObject({
      type: UpstreamErrorType.PARSE_ERROR,
    });
  });

  it('should classify network failures', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(fetchJson('Test', 'https://api.example.com/data', { timeoutMs: 1000 })).rejects.toMatchObject({
      type: UpstreamErrorType.NETWORK_ERROR,
    });
  });

  it('should abort the request after the timeout', async () => {
    fetchSpy.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));
          });
        })
    );

    await expect(fetchJson('Test', 'https://api.example.com/data', { timeoutMs: 10 })).rejects.toMatchObject({
      type: UpstreamErrorType.TIMEOUT,
    });
  });
});
