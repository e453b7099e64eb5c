import type { HighlightBatch, HighlightRecord, TimestampZone, Watermark } from '../types.js';
import type { WatermarkStore } from './watermark.js';
import type { ChangeReader } from '../source/change-reader.js';
import type { DeliveryClient } from '../client/readwise.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import { buildBatch } from '../shared/transform.js';
import { ConfigurationError, SourceUnavailableError } from '../errors.js';
import type { SyncError } from '../errors.js';

export type SyncState =
  | 'idle'
  | 'watermark-loaded'
  | 'changes-fetched'
  | 'preview'
  | 'delivering'
  | 'committed'
  | 'failed';

export interface SyncDependencies {
  watermarks: WatermarkStore;
  reader: ChangeReader;
  delivery: DeliveryClient;
  logger?: Logger;
}

export interface SyncOptions {
  /** Report the would-be batch without delivering or saving */
  preview?: boolean;
  token?: string;
  timeZone?: TimestampZone;
  /** Called once the persisted watermark has been read */
  onWatermarkLoaded?: (watermark: Watermark) => void;
  /** Called right before the single delivery request */
  onDeliver?: (count: number) => void;
}

export type SyncReport =
  | { state: 'up-to-date'; watermark: Watermark }
  | { state: 'preview'; watermark: Watermark; batch: HighlightBatch; nextWatermark: number }
  | { state: 'committed'; previousWatermark: Watermark; watermark: number; count: number }
  /** `watermark` is absent when the run failed before loading it */
  | { state: 'failed'; watermark?: Watermark; error: SyncError };

/**
 * One incremental sync run.
 *
 * The watermark is saved only after the remote service confirmed the whole
 * batch. A crash before the save replays the batch next run; a failed
 * delivery leaves the watermark where it was.
 */
export async function runSync(deps: SyncDependencies, options: SyncOptions = {}): Promise<SyncReport> {
  const logger = deps.logger ?? silentLogger;
  const enter = (state: SyncState) => logger.debug(`sync: ${state}`);

  enter('idle');
  const token = options.token?.trim();
  if (!options.preview && !token) {
    enter('failed');
    return {
      state: 'failed',
      error: new ConfigurationError('READWISE_API_TOKEN is not set'),
    };
  }

  const watermark = await deps.watermarks.load();
  enter('watermark-loaded');
  options.onWatermarkLoaded?.(watermark);

  let records: HighlightRecord[];
  try {
    records = await deps.reader.fetchSince(watermark);
  } catch (err) {
    if (err instanceof SourceUnavailableError) {
      enter('failed');
      return { state: 'failed', watermark, error: err };
    }
    throw err;
  }
  enter('changes-fetched');

  const last = records.at(-1);
  if (last === undefined) {
    return { state: 'up-to-date', watermark };
  }

  const batch = buildBatch(records, { timeZone: options.timeZone });
  const nextWatermark = watermark === undefined ? last.committedAt : Math.max(watermark, last.committedAt);

  if (options.preview || !token) {
    enter('preview');
    return { state: 'preview', watermark, batch, nextWatermark };
  }

  enter('delivering');
  options.onDeliver?.(records.length);
  const result = await deps.delivery.submit(batch, token);
  if (!result.ok) {
    enter('failed');
    return { state: 'failed', watermark, error: result.error };
  }

  try {
    await deps.watermarks.save(nextWatermark);
  } catch (err) {
    logger.warn(
      `Delivered ${records.length} highlight(s), watermark not saved; they will be delivered again next run: `
        + (err instanceof Error ? err.message : String(err)),
    );
    throw err;
  }
  enter('committed');
  return { state: 'committed', previousWatermark: watermark, watermark: nextWatermark, count: records.length };
}

export interface SyncStatus {
  watermark: Watermark;
  pending: number;
}

/** Current watermark and the number of highlights waiting to sync. Read-only. */
export async function getSyncStatus(deps: Pick<SyncDependencies, 'watermarks' | 'reader'>): Promise<SyncStatus> {
  const watermark = await deps.watermarks.load();
  const records = await deps.reader.fetchSince(watermark);
  return { watermark, pending: records.length };
}
