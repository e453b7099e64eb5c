import type { SyncConfig } from '../config.js';
import type { Logger } from '../shared/logger.js';
import type { SyncDependencies } from './orchestrator.js';
import { FileWatermarkStore } from './watermark.js';
import { GoodLinksChangeReader } from '../source/change-reader.js';
import { ReadwiseClient } from '../client/readwise.js';

/** Production bindings: watermark file, GoodLinks database, Readwise API */
export function createDependencies(config: SyncConfig, logger: Logger): Required<SyncDependencies> {
  return {
    watermarks: new FileWatermarkStore(config.statePath, logger),
    reader: new GoodLinksChangeReader(config.databasePath),
    delivery: new ReadwiseClient({ endpoint: config.endpoint }),
    logger,
  };
}
