#!/usr/bin/env node
import 'dotenv/config';
import { main } from '../cli.js';
import { createLogger } from '../shared/logger.js';
import { describeError } from '../errors.js';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    createLogger().error(`Unexpected failure: ${describeError(err)}`);
    process.exitCode = 1;
  });
