import express, { Express } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { createSyncRouter, SyncRouterDeps } from './api/sync-api.js';
import { JobController } from './scheduler/job-controller.js';
import { JobScheduler } from './scheduler/scheduler.js';
import { logger } from './utils/logger.js';

export function createApp(deps: SyncRouterDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api', createSyncRouter(deps));

  return app;
}

/**
 * Graceful stop: the cron trigger first, then any running sync, which is
 * cancelled and awaited so its browser session closes, then the listener.
 */
export async function stopServer(
  server: Server,
  controller: JobController,
  scheduler: JobScheduler | null = null
): Promise<void> {
  scheduler?.stop();

  if (controller.cancel()) {
    const final = await controller.waitForCompletion();
    logger.info('Sync run stopped for shutdown', { runId: final.runId, status: final.status });
  }

  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}
