import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ReadwiseClient, READWISE_HIGHLIGHTS_URL } from '../../src/client/readwise.js';
import { DeliveryError } from '../../src/errors.js';
import type { HighlightBatch } from '../../src/types.js';

const batch: HighlightBatch = {
  highlights: [{ text: 'hello', highlighted_at: '2023-11-14T22:13:20.000Z' }],
};

describe('ReadwiseClient', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('posts the batch once with token auth', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response('{}', { status: 200 }));
    const client = new ReadwiseClient({ fetch: fetchMock });

    const result = await client.submit(batch, 'test-token');

    expect(result).toEqual({ ok: true, status: 200 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(READWISE_HIGHLIGHTS_URL, {
      method: 'POST',
      headers: {
        'Authorization': 'Token test-token',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(batch),
    });
  });

  it('uses a custom endpoint', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 204 }));
    const client = new ReadwiseClient({ endpoint: 'http://localhost:9999/highlights', fetch: fetchMock });

    const result = await client.submit(batch, 'test-token');

    expect(result).toEqual({ ok: true, status: 204 });
    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:9999/highlights');
  });

  it('falls back to global fetch', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('{}', { status: 201 }));
    const client = new ReadwiseClient();

    const result = await client.submit(batch, 'test-token');

    expect(result).toEqual({ ok: true, status: 201 });
    expect(fetch).toHaveBeenCalledWith(READWISE_HIGHLIGHTS_URL, expect.objectContaining({ method: 'POST' }));
  });

  it('returns a DeliveryError with status and body on non-2xx', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('{"detail":"Invalid token."}', { status: 401, statusText: 'Unauthorized' }),
    );
    const client = new ReadwiseClient({ fetch: fetchMock });

    const result = await client.submit(batch, 'bad-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DeliveryError);
    expect(result.error.message).toBe('HTTP 401 Unauthorized');
    expect(result.error.status).toBe(401);
    expect(result.error.responseBody).toBe('{"detail":"Invalid token."}');
  });

  it('omits the response body when the server sent none', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 500 }));
    const client = new ReadwiseClient({ fetch: fetchMock });

    const result = await client.submit(batch, 'test-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('HTTP 500');
    expect(result.error.responseBody).toBeUndefined();
  });

  it('returns a DeliveryError without status on network failure', async () => {
    const cause = new TypeError('fetch failed');
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(cause);
    const client = new ReadwiseClient({ fetch: fetchMock });

    const result = await client.submit(batch, 'test-token');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.status).toBeUndefined();
    expect(result.error.cause).toBe(cause);
    expect(result.error.message).toBe(`Request to ${READWISE_HIGHLIGHTS_URL} failed`);
  });
});
