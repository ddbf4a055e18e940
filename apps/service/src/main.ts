#!/usr/bin/env -S node --import tsx
import 'dotenv/config';

import { CommanderError } from 'commander';

import { describeError } from '@scriptforge/core';

import { createCli } from './cli/index.js';
import { loadServiceConfig } from './config.js';
import { createServer } from './http/server.js';
import { createScrapeJobService } from './jobs/setup.js';
import { createServiceLogger } from './logging.js';

const config = loadServiceConfig();
const logger = createServiceLogger(config.logLevel);
const service = createScrapeJobService({ config, logger });

const cli = createCli({
  service,
  serve: async ({ port }) => {
    const server = createServer({ service });
    const address = await server.listen({ port: port ?? config.port, host: config.host });
    logger.info('Scriptforge API listening', { address });
  }
});

cli.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  logger.error('Command failed', { error: describeError(error) });
  process.exitCode = 1;
});
