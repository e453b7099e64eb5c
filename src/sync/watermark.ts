import { readFile, writeFile, rename } from 'node:fs/promises';
import type { Watermark } from '../types.js';
import type { Logger } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';

export interface WatermarkStore {
  load(): Promise<Watermark>;
  save(timestamp: number): Promise<void>;
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse persisted watermark content. Anything that is not a finite decimal
 * number reads as "no watermark".
 */
export function parseWatermark(raw: string): Watermark {
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Watermark persisted as a single decimal number in a plain-text file.
 *
 * Saves go through a temp file and rename, so a crash mid-write never leaves
 * a truncated value behind. Reads are always from disk.
 */
export class FileWatermarkStore implements WatermarkStore {
  private filePath: string;
  private logger: Logger;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger: Logger = silentLogger) {
    this.filePath = filePath;
    this.logger = logger;
  }

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<Watermark> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      // ENOENT is expected before the first sync
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return undefined;
      }
      this.logger.warn(
        `Failed to read ${this.filePath}, syncing full history: ${err instanceof Error ? err.message : String(err)}`,
      );
      return undefined;
    }

    if (!raw.trim()) return undefined;

    const value = parseWatermark(raw);
    if (value === undefined) {
      this.logger.warn(`Ignoring malformed watermark in ${this.filePath}: ${JSON.stringify(raw.trim())}`);
    }
    return value;
  }

  async save(timestamp: number): Promise<void> {
    if (!Number.isFinite(timestamp)) {
      throw new TypeError(`Watermark must be a finite number, got ${timestamp}`);
    }

    const next = this.writeQueue.then(async () => {
      const tmpPath = this.filePath + '.tmp';
      await writeFile(tmpPath, `${String(timestamp)}\n`, 'utf-8');
      await rename(tmpPath, this.filePath);
    });
    // Keep the queue usable after a failed write; the caller still sees the error
    this.writeQueue = next.catch(() => undefined);
    return next;
  }
}
