#!/usr/bin/env node
import 'dotenv/config';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config.js';
import { createServer, parseServerArgs } from '../mcp/server.js';
import { createLogger, stderrSink } from '../shared/logger.js';
import { describeError } from '../errors.js';

async function run() {
  const config = parseServerArgs(process.argv.slice(2), loadConfig());
  const logger = createLogger({ debug: config.debug, sink: stderrSink });
  const server = createServer(config, logger);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

run().catch((err: unknown) => {
  createLogger({ sink: stderrSink }).error(describeError(err));
  process.exitCode = 1;
});
