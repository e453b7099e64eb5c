import { resolve } from 'node:path';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SyncConfig } from '../config.js';
import type { Logger } from '../shared/logger.js';
import { flagValue } from '../shared/args.js';
import type { SyncDependencies } from '../sync/orchestrator.js';
import { createDependencies } from '../sync/dependencies.js';
import { RunQueue } from '../sync/run-queue.js';
import { register as registerGetSyncStatus } from './tools/get-sync-status.js';
import { register as registerPreviewSync } from './tools/preview-sync.js';
import { register as registerRunSync } from './tools/run-sync.js';

/** Apply `--db` and `--state` overrides on top of the environment config */
export function parseServerArgs(argv: string[], config: SyncConfig, cwd: string = process.cwd()): SyncConfig {
  const db = flagValue(argv, '--db');
  const state = flagValue(argv, '--state');
  return {
    ...config,
    databasePath: db ? resolve(cwd, db) : config.databasePath,
    statePath: state ? resolve(cwd, state) : config.statePath,
  };
}

export function createServer(
  config: SyncConfig,
  logger: Logger,
  deps: SyncDependencies = createDependencies(config, logger),
): McpServer {
  const server = new McpServer({
    name: 'highlight-sync-mcp',
    version: '0.1.0',
  });

  // One sync at a time: each run reads, delivers and saves the same watermark
  const ctx = { deps, config, queue: new RunQueue() };
  registerGetSyncStatus(server, ctx);
  registerPreviewSync(server, ctx);
  registerRunSync(server, ctx);

  return server;
}
