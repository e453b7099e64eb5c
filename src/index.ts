export type {
  HighlightRecord,
  HighlightPayload,
  HighlightBatch,
  Watermark,
  TimestampZone,
  TransformOptions,
} from './types.js';
export { SourceUnavailableError, DeliveryError, ConfigurationError, describeError, isSyncError } from './errors.js';
export type { SyncError } from './errors.js';
export { FileWatermarkStore, parseWatermark } from './sync/watermark.js';
export type { WatermarkStore } from './sync/watermark.js';
export { GoodLinksChangeReader, DEFAULT_DATABASE_PATH } from './source/change-reader.js';
export type { ChangeReader } from './source/change-reader.js';
export { ReadwiseClient, READWISE_HIGHLIGHTS_URL } from './client/readwise.js';
export type { DeliveryClient, DeliveryResult, ReadwiseClientOptions } from './client/readwise.js';
export { toIsoTimestamp, transformHighlight, buildBatch } from './shared/transform.js';
export { runSync, getSyncStatus } from './sync/orchestrator.js';
export type { SyncDependencies, SyncOptions, SyncReport, SyncState, SyncStatus } from './sync/orchestrator.js';
export { loadConfig } from './config.js';
export type { SyncConfig } from './config.js';
export { createLogger, silentLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';
