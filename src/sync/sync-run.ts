/**
 * One sync run: extract listings, reconcile them batch by batch, then run the
 * availability pass. Executed by the JobController as its background task.
 *
 * Progress: 5% opening the source, 10-90% extraction, 95% availability pass.
 */

import { RunCounters, VehicleRecord } from '../types/index.js';
import { VehicleStore } from '../database/vehicle-store.js';
import { ListingSession } from '../scraper/listing-page.js';
import { ExtractOptions, extractListings } from '../scraper/listing-extractor.js';
import { JobContext, JobResult, JobTask } from '../scheduler/job-controller.js';
import { logger } from '../utils/logger.js';
import { errorMessage, isRetryable } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { markStaleUnavailable, reconcileBatch } from './reconciler.js';

export interface SyncRunOptions {
  store: VehicleStore;
  openSource: () => Promise<ListingSession>;
  extraction: Omit<ExtractOptions, 'signal' | 'onGrowthStep' | 'onEnd'>;
  batchSize: number;
  /** Attempts per batch (and for the availability pass) */
  storeRetries: number;
  retryBaseDelayMs: number;
  availabilityGraceMs: number;
  clock?: () => Date;
}

export function extractionProgress(listingsSeen: number): number {
  return 10 + Math.floor((80 * listingsSeen) / (listingsSeen + 50));
}

function statusLine(counters: RunCounters): string {
  return `Listings: ${counters.listingsSeen} | New: ${counters.added} | Price changes: ${counters.priceChanges}`;
}

export function createSyncTask(options: SyncRunOptions): JobTask {
  const clock = options.clock ?? (() => new Date());
  const batchSize = Math.max(1, options.batchSize);

  return async (ctx: JobContext): Promise<JobResult> => {
    const runStartedAt = clock();
    const counters: RunCounters = { listingsSeen: 0, added: 0, priceChanges: 0, growthSteps: 0 };

    const storeRetry = <T>(label: string, fn: () => Promise<T>): Promise<T> =>
      withRetry(fn, {
        attempts: options.storeRetries,
        baseDelayMs: options.retryBaseDelayMs,
        label,
        shouldRetry: isRetryable,
      });

    const flush = async (batch: VehicleRecord[]): Promise<void> => {
      if (batch.length === 0) return;

      const outcomes = await storeRetry('Reconcile batch', () => reconcileBatch(options.store, batch, clock()));
      counters.added += outcomes.filter(o => o.isNew).length;
      counters.priceChanges += outcomes.filter(o => o.priceChanged).length;

      ctx.reportProgress(
        extractionProgress(counters.listingsSeen),
        `Scraping... ${statusLine(counters)}`,
        counters
      );
    };

    ctx.reportProgress(5, 'Opening listing source...');
    const session = await options.openSource();

    try {
      ctx.reportProgress(10, 'Scraping vehicle listings...');

      let batch: VehicleRecord[] = [];
      const listings = extractListings(session.page, {
        ...options.extraction,
        signal: ctx.signal,
        onGrowthStep: (step) => {
          counters.growthSteps = step.step;
          ctx.reportProgress(
            extractionProgress(counters.listingsSeen),
            `Scraping... ${statusLine(counters)}`,
            counters
          );
        },
      });

      try {
        for await (const record of listings) {
          batch.push(record);
          counters.listingsSeen++;

          if (batch.length >= batchSize) {
            const full = batch;
            batch = [];
            await flush(full);

            if (ctx.signal.aborted) break;
          }
        }
      } catch (error) {
        // Keep what was already observed before the extraction aborted
        if (batch.length > 0) {
          logger.warn('Extraction aborted, committing observed listings', {
            pending: batch.length,
            error: errorMessage(error),
          });
          const pending = batch;
          batch = [];
          try {
            await flush(pending);
          } catch (flushError) {
            logger.error('Failed to commit observed listings after extraction abort', {
              error: errorMessage(flushError),
            });
          }
        }
        throw error;
      }

      // The batch in flight completes even when cancelled
      await flush(batch);

      if (ctx.signal.aborted) {
        return {
          outcome: 'cancelled',
          message: `Cancelled. ${statusLine(counters)}`,
        };
      }

      ctx.reportProgress(95, 'Marking unseen vehicles unavailable...', counters);
      const markedUnavailable = await storeRetry('Availability pass', () =>
        markStaleUnavailable(options.store, runStartedAt, options.availabilityGraceMs)
      );

      return {
        outcome: 'completed',
        message: `Completed! ${statusLine(counters)} | Unavailable: ${markedUnavailable}`,
      };
    } finally {
      await session.close().catch((closeError: unknown) => {
        logger.warn('Failed to close listing source', { error: errorMessage(closeError) });
      });
    }
  };
}
