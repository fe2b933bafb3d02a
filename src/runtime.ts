import { config } from './utils/config.js';
import { getSupabaseClient } from './database/client.js';
import { SupabaseVehicleStore } from './database/supabase-vehicle-store.js';
import { VehicleStore } from './database/vehicle-store.js';
import { BrowserClient } from './scraper/browser-client.js';
import { createListingFilter } from './scraper/filters.js';
import { JobController, JobTask, jobController } from './scheduler/job-controller.js';
import { createSyncTask } from './sync/sync-run.js';

export interface Runtime {
  store: VehicleStore;
  controller: JobController;
  task: JobTask;
}

/**
 * Wire the production collaborators from configuration
 */
export function createRuntime(): Runtime {
  const store = new SupabaseVehicleStore(getSupabaseClient(), config.sync.storeTimeoutMs);
  const browserClient = new BrowserClient(config.browser, config.source);

  const task = createSyncTask({
    store,
    openSource: () => browserClient.openListingSource(),
    extraction: {
      parse: {
        baseUrl: config.source.baseUrl || config.source.url,
        selectors: config.source.selectors,
        trimLabel: config.source.trimLabel,
        chargeTypeLabel: config.source.chargeTypeLabel,
      },
      settleThreshold: config.extraction.settleThreshold,
      growthTimeoutMs: config.extraction.growthTimeoutMs,
      maxGrowthSteps: config.extraction.maxGrowthSteps,
      emptyResultsPattern: config.source.emptyResultsPattern,
      debugSnapshotPath: config.extraction.debugSnapshotPath,
      filter: createListingFilter(config.filters),
    },
    batchSize: config.sync.batchSize,
    storeRetries: config.sync.storeRetries,
    retryBaseDelayMs: config.browser.retryBaseDelayMs,
    availabilityGraceMs: config.sync.availabilityGraceMs,
  });

  return { store, controller: jobController, task };
}
