#!/usr/bin/env node

import { Server } from 'http';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { errorMessage } from './utils/errors.js';
import { formatPrice } from './scraper/price-parser.js';
import { computeCatalogStats } from './sync/catalog-stats.js';
import { createRuntime, Runtime } from './runtime.js';
import { createApp, stopServer } from './server.js';
import { JobScheduler } from './scheduler/scheduler.js';

/**
 * Run a single sync and resolve with the process exit code
 */
async function runOnce(runtime: Runtime): Promise<number> {
  const { controller, task } = runtime;
  const started = controller.start(task);
  logger.info('=== Sync run started ===', { runId: started.runId });

  const unsubscribe = controller.subscribe(state => {
    if (state.status === 'running') {
      logger.debug(`[${state.progress}%] ${state.message}`);
    }
  });

  try {
    const final = await controller.waitForCompletion();
    const duration =
      final.startedAt && final.finishedAt
        ? ((final.finishedAt.getTime() - final.startedAt.getTime()) / 1000).toFixed(1)
        : '0';

    logger.info('=== Sync run finished ===', {
      status: final.status,
      message: final.message,
      duration: `${duration}s`,
      counters: final.counters,
    });

    return final.status === 'completed' ? 0 : 1;
  } finally {
    unsubscribe();
    controller.acknowledge();
  }
}

/**
 * Print catalog statistics
 */
async function printStats(runtime: Runtime): Promise<void> {
  const vehicles = await runtime.store.queryAll();
  const stats = computeCatalogStats(vehicles);
  const prices = vehicles
    .filter(v => v.isAvailable && v.price !== null)
    .map(v => v.price ?? 0);
  const lowest = prices.length > 0 ? Math.min(...prices) : null;

  console.log('\n📊 Catalog statistics');
  console.log(`   Total vehicles:      ${stats.total}`);
  console.log(`   Available:           ${stats.available}`);
  console.log(`   New in last 24h:     ${stats.newIn24h}`);
  console.log(`   With price history:  ${stats.withPriceHistory}`);
  console.log(`   Lowest price:        ${formatPrice(lowest)}\n`);
}

/**
 * Server mode: HTTP API plus the optional cron trigger
 */
function startServer(runtime: Runtime): void {
  const app = createApp(runtime);
  const server: Server = app.listen(config.app.port, () => {
    logger.info(`API server listening on port ${config.app.port}`);
  });

  let scheduler: JobScheduler | null = null;
  if (config.app.scrapeSchedule) {
    scheduler = new JobScheduler(runtime.controller, runtime.task, {
      schedule: config.app.scrapeSchedule,
      runOnStart: process.argv.includes('--run-now'),
      timezone: config.app.timezone,
    });
    scheduler.start();
  }

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully`);
    stopServer(server, runtime.controller, scheduler)
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

// Check if this is the main module (works with both node and tsx)
const isMainModule = process.argv[1]?.includes('index.ts') || process.argv[1]?.includes('index.js');

if (isMainModule) {
  const args = process.argv.slice(2);
  const mode = args.find(arg => arg.startsWith('--mode='))?.split('=')[1] || 'once';
  const runtime = createRuntime();

  if (args.includes('--stats')) {
    printStats(runtime)
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Failed to load catalog statistics', { error: errorMessage(error) });
        process.exit(1);
      });
  } else if (mode === 'server') {
    startServer(runtime);
  } else {
    runOnce(runtime)
      .then(code => process.exit(code))
      .catch(error => {
        logger.error('Sync run failed', { error: errorMessage(error) });
        process.exit(1);
      });
  }
}

export { runOnce, printStats };
