import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { DEFAULT_DATABASE_PATH } from './source/change-reader.js';
import { READWISE_HIGHLIGHTS_URL } from './client/readwise.js';
import type { TimestampZone } from './types.js';

export const DEFAULT_STATE_FILE = 'last_sync.txt';

export interface SyncConfig {
  token?: string;
  databasePath: string;
  statePath: string;
  endpoint: string;
  timeZone: TimestampZone;
  debug: boolean;
}

/** Blank variables count as unset */
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const envSchema = z.object({
  READWISE_API_TOKEN: z.preprocess(blankToUndefined, z.string().optional()),
  GOODLINKS_DB_PATH: z.preprocess(blankToUndefined, z.string().default(DEFAULT_DATABASE_PATH)),
  HIGHLIGHT_SYNC_STATE_FILE: z.preprocess(blankToUndefined, z.string().default(DEFAULT_STATE_FILE)),
  READWISE_API_URL: z.preprocess(blankToUndefined, z.string().url().default(READWISE_HIGHLIGHTS_URL)),
  HIGHLIGHT_SYNC_TIMEZONE: z.preprocess(blankToUndefined, z.enum(['local', 'utc']).default('local')),
  HIGHLIGHT_SYNC_DEBUG: z.preprocess(blankToUndefined, z.enum(['0', '1', 'true', 'false']).optional()),
});

/**
 * Read configuration from the environment.
 * The token is optional here; whether it is required depends on the run mode.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid environment: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  return {
    token: e.READWISE_API_TOKEN?.trim(),
    databasePath: resolve(cwd, e.GOODLINKS_DB_PATH),
    statePath: resolve(cwd, e.HIGHLIGHT_SYNC_STATE_FILE),
    endpoint: e.READWISE_API_URL,
    timeZone: e.HIGHLIGHT_SYNC_TIMEZONE,
    debug: e.HIGHLIGHT_SYNC_DEBUG === '1' || e.HIGHLIGHT_SYNC_DEBUG === 'true',
  };
}
