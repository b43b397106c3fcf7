/**
 * Kitchen worker entry point. Runs as a standalone container.
 *
 * Responsibilities:
 * - Runs the auto-bump scheduler for every hub in KDS_HUB_IDS
 * - Logs periodic health
 *
 * Usage: node --import tsx infra/worker.ts
 */

import { config } from 'dotenv';
import { resolve } from 'path';

// Load env
config({ path: resolve(__dirname, '../.env.local') });
config({ path: resolve(__dirname, '../.env') });

import { getDeploymentConfig, getEventBus, logger, serializeError, setLogLevel } from '@kitchenflow/core';
import { closeDb, configureDb } from '@kitchenflow/db';
import {
  AutoBumpScheduler,
  DrizzleKitchenStore,
  DrizzleSettingsProvider,
  DrizzleStationDirectory,
  configureKds,
} from '@kitchenflow/module-kds';

const HEALTH_CHECK_INTERVAL = 5 * 60 * 1000; // 5 minutes

async function main() {
  const deployment = getDeploymentConfig();
  setLogLevel(deployment.logLevel);
  logger.info('Worker starting', { pid: process.pid, target: deployment.target });
  configureDb(deployment.database);

  const bus = getEventBus();
  await bus.start();
  configureKds({
    store: new DrizzleKitchenStore(),
    stations: new DrizzleStationDirectory(),
    settings: new DrizzleSettingsProvider(),
    bus,
  });

  if (deployment.hubIds.length === 0) {
    logger.warn('KDS_HUB_IDS is empty; auto-bump has nothing to schedule');
  }
  const scheduler = new AutoBumpScheduler();
  await scheduler.start(deployment.hubIds);

  const healthInterval = setInterval(() => {
    logger.info('Worker health', {
      running: scheduler.isRunning(),
      hubs: deployment.hubIds.length,
      uptime: Math.round(process.uptime()),
      memoryMB: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
    });
  }, HEALTH_CHECK_INTERVAL);

  // Graceful shutdown
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Worker shutting down (${signal})`);
    clearInterval(healthInterval);
    await scheduler.stop();
    await bus.stop();
    await closeDb();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Worker shutdown failed', { error: serializeError(err) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  logger.info('Worker ready', { hubs: deployment.hubIds });
}

main().catch((err: unknown) => {
  logger.error('Worker failed to start', { error: serializeError(err) });
  process.exit(1);
});
