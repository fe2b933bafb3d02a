/**
 * Sync API Routes
 * Trigger and status endpoints for sync runs, plus the catalog read endpoints
 *
 * POST /api/refresh   start a run (409 while one is running)
 * POST /api/cancel    request cancellation of the running run
 * GET  /api/status    live progress snapshot; a finished run's outcome is reported once
 * GET  /api/vehicles  catalog with price history and stats
 * GET  /api/stats     catalog stats only
 */

import { Router, Request, Response } from 'express';
import { CatalogStats, JobState, VehicleWithHistory } from '../types/index.js';
import { VehicleStore } from '../database/vehicle-store.js';
import { JobController, JobTask } from '../scheduler/job-controller.js';
import { computeCatalogStats, isNewVehicle } from '../sync/catalog-stats.js';
import { logger } from '../utils/logger.js';
import { ConflictError, errorMessage } from '../utils/errors.js';
import { captureError } from '../utils/sentry.js';

export interface SyncRouterDeps {
  controller: JobController;
  store: VehicleStore;
  task: JobTask;
  clock?: () => Date;
}

export function toStatusResponse(state: Readonly<JobState>) {
  return {
    success: true,
    is_running: state.status === 'running',
    status: state.status,
    progress: state.progress,
    status_message: state.message,
    last_run: state.lastRun?.toISOString() ?? null,
    error: state.error,
    run_id: state.runId,
    started_at: state.startedAt?.toISOString() ?? null,
    finished_at: state.finishedAt?.toISOString() ?? null,
    listings_seen: state.counters.listingsSeen,
    ads_added: state.counters.added,
    price_changes: state.counters.priceChanges,
    growth_steps: state.counters.growthSteps,
  };
}

export function toVehicleResponse(vehicle: VehicleWithHistory, now: Date) {
  return {
    url: vehicle.url,
    title: vehicle.title,
    price: vehicle.price,
    original_price: vehicle.originalPrice,
    trim: vehicle.trim,
    charge_type: vehicle.chargeType,
    exterior_color: vehicle.exteriorColor,
    seat_type: vehicle.seatType,
    packs: vehicle.packs,
    location: vehicle.location,
    photo_url: vehicle.photoUrl,
    latitude: vehicle.latitude,
    longitude: vehicle.longitude,
    first_seen: vehicle.firstSeen.toISOString(),
    last_seen: vehicle.lastSeen.toISOString(),
    is_available: vehicle.isAvailable,
    is_new: isNewVehicle(vehicle, now),
    price_history: vehicle.priceHistory.map(h => ({
      price: h.price,
      date: h.observedAt.toISOString(),
    })),
  };
}

function sendServerError(res: Response, route: string, error: unknown): void {
  const message = errorMessage(error);
  logger.error(`API error in ${route}`, { error: message });
  captureError(error instanceof Error ? error : new Error(message), { route });

  res.status(500).json({
    success: false,
    error: message,
  });
}

export function createSyncRouter(deps: SyncRouterDeps): Router {
  const { controller, store, task } = deps;
  const clock = deps.clock ?? (() => new Date());
  const router = Router();

  router.post('/refresh', (_req: Request, res: Response) => {
    try {
      const state = controller.start(task);
      res.status(202).json({
        success: true,
        message: 'Scraping started',
        run_id: state.runId,
      });
    } catch (error) {
      if (error instanceof ConflictError) {
        logger.warn('Refresh rejected, a run is already in progress');
        res.status(409).json({
          success: false,
          error: error.message,
        });
        return;
      }
      sendServerError(res, '/api/refresh', error);
    }
  });

  router.post('/cancel', (_req: Request, res: Response) => {
    if (!controller.cancel()) {
      res.status(409).json({
        success: false,
        error: 'no run in progress',
      });
      return;
    }

    res.json({
      success: true,
      message: 'Cancellation requested',
    });
  });

  // A terminal state is served once, then reset to idle
  router.get('/status', (_req: Request, res: Response) => {
    const state = controller.snapshot();
    res.json(toStatusResponse(state));
    if (state.status !== 'idle' && state.status !== 'running') {
      controller.acknowledge();
    }
  });

  router.get('/vehicles', async (req: Request, res: Response) => {
    try {
      const availableOnly = req.query.available === 'true';
      const vehicles = await store.queryAll();
      const now = clock();
      const listed = availableOnly ? vehicles.filter(v => v.isAvailable) : vehicles;

      res.json({
        success: true,
        vehicles: listed.map(v => toVehicleResponse(v, now)),
        stats: toStatsResponse(computeCatalogStats(vehicles, now)),
        timestamp: now.toISOString(),
      });
    } catch (error) {
      sendServerError(res, '/api/vehicles', error);
    }
  });

  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      const vehicles = await store.queryAll();
      res.json({
        success: true,
        stats: toStatsResponse(computeCatalogStats(vehicles, clock())),
      });
    } catch (error) {
      sendServerError(res, '/api/stats', error);
    }
  });

  return router;
}

function toStatsResponse(stats: CatalogStats) {
  return {
    total: stats.total,
    available: stats.available,
    new_in_24h: stats.newIn24h,
    with_price_history: stats.withPriceHistory,
  };
}
