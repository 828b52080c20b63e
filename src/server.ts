/**
 * Admission Control - Standalone Server
 *
 * Runs the admission middleware in front of a minimal Express app. Useful
 * for trying a rule set; embedding applications use createAdmissionControl.
 */

import 'dotenv/config';

import type { Server } from 'http';

import express from 'express';

import { createAdmissionControl, type AdmissionControl } from './admission-control.js';
import { createConfigLoader } from './config/loader.js';
import { toErrorMessage } from './utils/errors.js';
import { getEnvInt, getEnvString } from './utils/helpers.js';
import logger, { logLifecycle } from './utils/logger.js';

// =============================================================================
// Global State
// =============================================================================

const configLoader = createConfigLoader();
let admission: AdmissionControl | null = null;
let server: Server | null = null;
let isShuttingDown = false;

// =============================================================================
// Application Startup
// =============================================================================

async function bootstrap(): Promise<void> {
  logLifecycle('startup', 'Admission control starting up...');

  const loaded = await configLoader.load();
  admission = await createAdmissionControl(loaded);
  admission.follow(configLoader);
  configLoader.startWatching();

  const controller = admission.controller;
  const app = express();

  app.get('/_admission/metrics', (_req, res) => {
    res.json(controller.getMetrics());
  });

  app.get('/_admission/rules', (_req, res) => {
    res.json(controller.getRuleIndex().getRules());
  });

  app.use(admission.middleware());

  app.use((req, res) => {
    res.json({ path: req.path, admitted: true });
  });

  const port = getEnvInt('PORT', 8080) ?? 8080;
  const host = getEnvString('HOST', '0.0.0.0') ?? '0.0.0.0';

  await new Promise<void>((resolve) => {
    server = app.listen(port, host, () => resolve());
  });

  logLifecycle('ready', 'Admission control listening', {
    url: `http://${host}:${port}`,
    rules: controller.getRuleIndex().size,
    failureMode: loaded.config.failureMode,
  });
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 10000);

  try {
    const listening = server;
    if (listening !== null) {
      await new Promise<void>((resolve, reject) => {
        listening.close((error) => (error ? reject(error) : resolve()));
      });
    }

    await configLoader.stopWatching();

    if (admission !== null) {
      await admission.close();
    }

    clearTimeout(shutdownTimeout);
    logLifecycle('shutdown', 'Admission control shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', { error: toErrorMessage(error) });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason: toErrorMessage(reason) });
});

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  logLifecycle('error', 'Failed to start admission control', {
    error: toErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
