#!/usr/bin/env node
import type { Server } from 'node:http';
import { startApiServer } from './api/routes.js';
import { parseCli, toOverrides } from './cli.js';
import { loadEnv, mergeOverrides } from './config.js';
import { addFileTransport, logger, setLogLevel } from './logger.js';
import { createMonitor } from './monitor/createMonitor.js';
import type { SessionSummary } from './recording/types.js';
import { errorMessage } from './utils/errors.js';

async function main() {
  const opts = parseCli(process.argv);
  const env = loadEnv();

  setLogLevel(opts.verbose ? 'debug' : env.LOG_LEVEL);
  const logFile = addFileTransport(env.LOG_DIRECTORY);
  logger.debug(`Logging to ${logFile}`);

  // ─── Monitor ───
  const { monitor, orchestrator, watcher } = await createMonitor({
    configPath: opts.config,
    overrides: mergeOverrides(env, toOverrides(opts)),
    env,
    controlDirectory: opts.controlDir,
  });

  const { settings } = watcher.current();
  if (settings.sessionId) {
    logger.info(`🔐 Using session id for authenticated requests (data center: ${settings.targetIdc ?? 'default'})`);
  }

  orchestrator.on('sessionStopped', (summary: SessionSummary) => {
    logger.debug({ summary }, 'Session summary');
  });

  // ─── Status API ───
  let httpServer: Server | null = null;
  if (settings.statusPort > 0) {
    httpServer = await startApiServer({ monitor, orchestrator }, settings.statusPort);
  }

  // ─── Graceful shutdown ───
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down...`);
    monitor.requestStop(signal, 'shutdown');
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await monitor.run();

  httpServer?.close();
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
}

main().catch((err) => {
  logger.error({ error: errorMessage(err) }, 'Fatal error');
  process.exit(1);
});
