/**
 * Scroll-until-stable listing extraction
 *
 * Reads the loaded listing nodes, triggers growth, waits for new nodes and
 * re-reads. When the number of distinct listing URLs stays unchanged for
 * `settleThreshold` consecutive growth steps the page is fully loaded.
 * A growth wait that times out is not an error: it just counts as a step
 * without growth.
 */

import { VehicleRecord } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { StructuralError } from '../utils/errors.js';
import { ListingPage } from './listing-page.js';
import { ParseContext, ParsedListing, parseListing } from './listing-selectors.js';
import { ListingFilter, acceptAll } from './filters.js';
import { saveDebugSnapshot } from './debug-snapshot.js';

export type ExtractionEnd = 'settled' | 'max-steps' | 'cancelled' | 'empty';

export interface GrowthStep {
  step: number;
  distinctListings: number;
  stableSteps: number;
  timedOut: boolean;
}

export interface ExtractOptions {
  parse: ParseContext;
  settleThreshold: number;
  growthTimeoutMs: number;
  maxGrowthSteps: number;
  emptyResultsPattern: RegExp;
  /** Where to write the page HTML on structural failure; null disables it */
  debugSnapshotPath: string | null;
  filter?: ListingFilter;
  signal?: AbortSignal;
  onGrowthStep?: (step: GrowthStep) => void;
  onEnd?: (reason: ExtractionEnd, distinctListings: number) => void;
}

async function structuralFailure(page: ListingPage, options: ExtractOptions, error: StructuralError): Promise<never> {
  const snapshotPath = options.debugSnapshotPath
    ? await saveDebugSnapshot(page, options.debugSnapshotPath)
    : null;

  throw new StructuralError(error.message, snapshotPath, { cause: error });
}

export async function* extractListings(
  page: ListingPage,
  options: ExtractOptions
): AsyncGenerator<VehicleRecord, void, undefined> {
  const filter = options.filter ?? acceptAll;
  const settleThreshold = Math.max(1, options.settleThreshold);
  const seen = new Set<string>();

  let nodes = await page.readListings();

  if (nodes.length === 0) {
    const text = await page.bodyText();
    if (options.emptyResultsPattern.test(text)) {
      logger.info('Source reports no results');
      options.onEnd?.('empty', 0);
      return;
    }
    await structuralFailure(
      page,
      options,
      new StructuralError('No listing nodes found and the page does not report an empty result')
    );
  }

  let step = 0;
  let stableSteps = 0;
  let previousCount = 0;
  let timedOut = false;
  let filtered = 0;

  for (;;) {
    for (const html of nodes) {
      let parsed: ParsedListing;
      try {
        parsed = parseListing(html, options.parse);
      } catch (error) {
        if (error instanceof StructuralError) {
          await structuralFailure(page, options, error);
        }
        throw error;
      }

      if (seen.has(parsed.record.url)) continue;
      seen.add(parsed.record.url);

      if (!filter(parsed)) {
        filtered++;
        logger.debug('Listing filtered out', { url: parsed.record.url });
        continue;
      }

      yield parsed.record;
    }

    if (step > 0) {
      stableSteps = seen.size === previousCount ? stableSteps + 1 : 0;
      options.onGrowthStep?.({ step, distinctListings: seen.size, stableSteps, timedOut });
    }
    previousCount = seen.size;

    let end: ExtractionEnd | null = null;
    if (stableSteps >= settleThreshold) {
      end = 'settled';
    } else if (options.signal?.aborted) {
      end = 'cancelled';
    } else if (step >= options.maxGrowthSteps) {
      end = 'max-steps';
    }

    if (end) {
      logger.info('Listing extraction finished', {
        reason: end,
        growthSteps: step,
        distinctListings: seen.size,
        filtered,
      });
      options.onEnd?.(end, seen.size);
      return;
    }

    step++;
    await page.grow();
    const grew = await page.waitForGrowth(nodes.length, options.growthTimeoutMs);
    timedOut = !grew;
    if (timedOut) {
      logger.debug('No new listings before growth timeout', { step, timeoutMs: options.growthTimeoutMs });
    }
    nodes = await page.readListings();
  }
}
