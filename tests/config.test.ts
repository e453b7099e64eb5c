import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig, DEFAULT_STATE_FILE } from '../src/config.js';
import { DEFAULT_DATABASE_PATH } from '../src/source/change-reader.js';
import { READWISE_HIGHLIGHTS_URL } from '../src/client/readwise.js';
import { ConfigurationError } from '../src/errors.js';

const CWD = '/work';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({}, CWD)).toEqual({
      token: undefined,
      databasePath: DEFAULT_DATABASE_PATH,
      statePath: resolve(CWD, DEFAULT_STATE_FILE),
      endpoint: READWISE_HIGHLIGHTS_URL,
      timeZone: 'local',
      debug: false,
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      READWISE_API_TOKEN: ' test-token ',
      GOODLINKS_DB_PATH: 'fixtures/data.sqlite',
      HIGHLIGHT_SYNC_STATE_FILE: '/var/lib/highlight-sync/last_sync.txt',
      READWISE_API_URL: 'http://localhost:8080/api/v2/highlights/',
      HIGHLIGHT_SYNC_TIMEZONE: 'utc',
      HIGHLIGHT_SYNC_DEBUG: '1',
    }, CWD);

    expect(config).toEqual({
      token: 'test-token',
      databasePath: '/work/fixtures/data.sqlite',
      statePath: '/var/lib/highlight-sync/last_sync.txt',
      endpoint: 'http://localhost:8080/api/v2/highlights/',
      timeZone: 'utc',
      debug: true,
    });
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ READWISE_API_TOKEN: '  ', HIGHLIGHT_SYNC_TIMEZONE: '' }, CWD);

    expect(config.token).toBeUndefined();
    expect(config.timeZone).toBe('local');
  });

  it('rejects invalid values with the variable names', () => {
    expect(() => loadConfig({ HIGHLIGHT_SYNC_TIMEZONE: 'mars', READWISE_API_URL: 'not a url' }, CWD))
      .toThrow(ConfigurationError);
    expect(() => loadConfig({ HIGHLIGHT_SYNC_TIMEZONE: 'mars' }, CWD))
      .toThrow(/^Invalid environment: HIGHLIGHT_SYNC_TIMEZONE: /);
  });
});
