import { describe, it, expect, vi } from 'vitest';
import { runSyncHandler } from '../../../src/mcp/tools/run-sync.js';
import { DeliveryError } from '../../../src/errors.js';
import type { HighlightBatch } from '../../../src/types.js';
import type { DeliveryResult } from '../../../src/client/readwise.js';
import type { ToolContext } from '../../../src/mcp/types.js';
import { RunQueue } from '../../../src/sync/run-queue.js';
import { MemoryWatermarkStore, MemoryChangeReader, RecordingDelivery, makeHighlight } from '../../helpers/fakes.js';

function context(token: string | undefined, watermark?: number) {
  const watermarks = new MemoryWatermarkStore(watermark);
  const delivery = new RecordingDelivery();
  const ctx: ToolContext = {
    deps: {
      watermarks,
      reader: new MemoryChangeReader([makeHighlight('h1', 100), makeHighlight('h2', 200)]),
      delivery,
    },
    config: { token, timeZone: 'utc' },
    queue: new RunQueue(),
  };
  return { ctx, watermarks, delivery };
}

/** Holds the first submission open until `release` is called */
class GatedDelivery extends RecordingDelivery {
  private gate: Promise<void>;
  release: () => void = () => {};

  constructor() {
    super();
    this.gate = new Promise(resolve => {
      this.release = resolve;
    });
  }

  async submit(batch: HighlightBatch, token: string): Promise<DeliveryResult> {
    const first = this.submissions.length === 0;
    const result = super.submit(batch, token);
    if (first) await this.gate;
    return result;
  }
}

describe('run_sync handler', () => {
  it('delivers and commits the new watermark', async () => {
    const { ctx, watermarks, delivery } = context('test-token');

    const result = await runSyncHandler(ctx);

    expect(result.isError).toBeUndefined();
    expect(JSON.parse(result.content[0].text)).toEqual({
      state: 'committed',
      count: 2,
      watermark: 200,
      lastSyncedAt: '1970-01-01T00:03:20.000Z',
    });
    expect(delivery.submissions).toHaveLength(1);
    expect(watermarks.value).toBe(200);
  });

  it('reports up-to-date without delivering', async () => {
    const { ctx, delivery } = context('test-token', 200);

    const result = await runSyncHandler(ctx);

    expect(JSON.parse(result.content[0].text)).toEqual({ state: 'up-to-date', count: 0, watermark: 200 });
    expect(delivery.submissions).toEqual([]);
  });

  it('returns an error result when the token is missing', async () => {
    const { ctx, delivery } = context(undefined);

    const result = await runSyncHandler(ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('ConfigurationError: READWISE_API_TOKEN is not set');
    expect(delivery.submissions).toEqual([]);
  });

  it('returns the response body on delivery failure and keeps the watermark', async () => {
    const { ctx, watermarks, delivery } = context('test-token', 100);
    delivery.failWith(new DeliveryError('HTTP 429 Too Many Requests', { status: 429, responseBody: 'slow down' }));

    const result = await runSyncHandler(ctx);

    expect(result.isError).toBe(true);
    expect(result.content[0].text).toBe('DeliveryError (status 429): HTTP 429 Too Many Requests\nResponse: slow down');
    expect(watermarks.value).toBe(100);
  });

  it('runs overlapping calls one after another against the committed watermark', async () => {
    const watermarks = new MemoryWatermarkStore();
    const reader = new MemoryChangeReader([makeHighlight('a', 100)]);
    const delivery = new GatedDelivery();
    const ctx: ToolContext = {
      deps: { watermarks, reader, delivery },
      config: { token: 'test-token', timeZone: 'utc' },
      queue: new RunQueue(),
    };

    const first = runSyncHandler(ctx);
    const second = runSyncHandler(ctx);
    await vi.waitFor(() => expect(delivery.submissions).toHaveLength(1));
    reader.records.push(makeHighlight('b', 200));
    delivery.release();
    await Promise.all([first, second]);

    expect(delivery.submissions.map(s => s.batch.highlights.map(h => h.text))).toEqual([
      ['highlight a'],
      ['highlight b'],
    ]);
    expect(watermarks.saves).toEqual([100, 200]);
    expect(watermarks.value).toBe(200);
  });
});
