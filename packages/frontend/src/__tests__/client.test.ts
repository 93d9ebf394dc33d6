import { afterEach, describe, expect, it, vi } from 'vitest';
import { ApiError, fetchReport } from '../api/client.js';

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(body),
  };
}

describe('api client', () => {
  const originalFetch = globalThis.fetch;

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('posts the report request as JSON', async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ report: {} }));
    globalThis.fetch = fetchMock;

    await fetchReport({ protocol: 'lido', days: 7 });

    expect(fetchMock).toHaveBeenCalledWith('/api/report', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"protocol":"lido","days":7}',
    });
  });

  it('raises ApiError with status and suggestions on an error body', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      jsonResponse({ error: "Protocol 'lidx' not found.", suggestions: ['Lido', 42] }, 404),
    );

    const err = await fetchReport({ protocol: 'lidx' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      message: "Protocol 'lidx' not found.",
      status: 404,
      suggestions: ['Lido'],
    });
  });

  it('falls back to the HTTP status when the body is not JSON', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({
      ok: false,
      status: 502,
      json: () => Promise.reject(new SyntaxError('Unexpected token')),
    });

    await expect(fetchReport({ protocol: 'lido' })).rejects.toMatchObject({
      message: 'HTTP 502: invalid JSON response',
      status: 502,
    });
  });
});
