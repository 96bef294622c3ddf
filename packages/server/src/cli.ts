#!/usr/bin/env node

// CLI entry point for @crowdsim/server
// Usage: npm run serve (runs this file from its TypeScript source)

import { createLogger, DatasetPersonaSource, describeError, FileResultSink } from '@crowdsim/core';
import { loadConfig } from './config.js';
import { CrowdSimServer } from './CrowdSimServer.js';

const config = loadConfig();
const logger = createLogger({ name: 'crowdsim-server', level: config.logLevel });

const server = new CrowdSimServer({
  port: config.port,
  host: config.host,
  corsOrigin: config.corsOrigin,
  ...(config.apiKey ? { apiKey: config.apiKey } : {}),
  logger,
  runManager: {
    researchMode: config.researchMode,
    stepDelayMs: config.stepDelayMs,
    personaSource: new DatasetPersonaSource(config.hfToken ? { token: config.hfToken } : {}),
    ...(config.resultsDir ? { resultSink: new FileResultSink(config.resultsDir) } : {}),
  },
});

server.start().catch((err: unknown) => {
  logger.fatal({ err: describeError(err) }, 'failed to start');
  process.exit(1);
});

// Graceful shutdown: stop the run, wait for it, close the sockets
let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'shutting down');
  server.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err: describeError(err) }, 'shutdown failed');
      process.exit(1);
    },
  );
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
