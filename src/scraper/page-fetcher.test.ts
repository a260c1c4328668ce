import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios, { AxiosError, AxiosHeaders, AxiosInstance, AxiosResponse } from 'axios';
import { HttpPageFetcher, buildCookieHeader } from './page-fetcher.js';
import { loadConfig } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { TransportError } from '../utils/errors.js';

function response(data: string, status = 200): AxiosResponse<string> {
  return { data, status, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('buildCookieHeader', () => {
  it('should join cookies in insertion order', () => {
    expect(buildCookieHeader({ over18: '1', session: 'test-secret' })).toBe('over18=1; session=test-secret');
  });

  it('should return an empty header for an empty bundle', () => {
    expect(buildCookieHeader({})).toBe('');
  });
});

describe('HttpPageFetcher', () => {
  const ctx = {
    config: loadConfig({ HARVEST_BASE_URL: 'https://catalog.example.com' }),
    logger: createLogger({ silent: true }),
  };
  let client: AxiosInstance;
  let fetcher: HttpPageFetcher;

  beforeEach(() => {
    client = axios.create();
    fetcher = new HttpPageFetcher(ctx, client);
  });

  it('should send the cookie header and return the body', async () => {
    const get = vi.spyOn(client, 'get').mockResolvedValue(response('<html>ok</html>'));

    const html = await fetcher.fetchPage('https://catalog.example.com/actors/a1', { over18: '1' });

    expect(html).toBe('<html>ok</html>');
    expect(get).toHaveBeenCalledWith('https://catalog.example.com/actors/a1', {
      headers: { Cookie: 'over18=1' },
    });
  });

  it('should wrap HTTP errors with their status', async () => {
    const failed = new AxiosError('Forbidden', 'ERR_BAD_REQUEST', undefined, undefined, response('denied', 403));
    vi.spyOn(client, 'get').mockRejectedValue(failed);

    const error = await fetcher.fetchPage('https://catalog.example.com/v/1', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.message).toBe('Request failed with status 403');
    expect(error.status).toBe(403);
    expect(error.url).toBe('https://catalog.example.com/v/1');
  });

  it('should wrap network errors with their code', async () => {
    vi.spyOn(client, 'get').mockRejectedValue(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'));

    const error = await fetcher.fetchPage('https://catalog.example.com/v/2', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.message).toBe('Request failed: ECONNABORTED');
    expect(error.status).toBeUndefined();
  });
});
