import { config as dotenvConfig } from 'dotenv';
import { Config } from '../types/index.js';

dotenvConfig();

function getEnvVar(key: string, required = true): string {
  const value = process.env[key];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value || '';
}

function getNumberEnvVar(key: string, fallback: number): number {
  const raw = getEnvVar(key, false);
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Environment variable ${key} must be a number, got "${raw}"`);
  }
  return value;
}

function getOptionalNumberEnvVar(key: string): number | null {
  const raw = getEnvVar(key, false);
  return raw ? getNumberEnvVar(key, 0) : null;
}

function getListEnvVar(key: string): string[] {
  return getEnvVar(key, false)
    .split(',')
    .map(e => e.trim().toLowerCase())
    .filter(e => e.length > 0);
}

export const config: Config = {
  supabase: {
    // Only required once the Supabase store is created (see database/client.ts)
    url: getEnvVar('SUPABASE_URL', false),
    serviceKey: getEnvVar('SUPABASE_SERVICE_KEY', false),
  },
  source: {
    url: getEnvVar('SOURCE_URL', false),
    baseUrl: getEnvVar('SOURCE_BASE_URL', false),
    selectors: {
      listing: getEnvVar('LISTING_SELECTOR', false) || '[data-listing], article.vehicle-card',
      link: getEnvVar('LISTING_LINK_SELECTOR', false) || 'a[href]',
      title: getEnvVar('TITLE_SELECTOR', false) || 'h2, h3, [data-title]',
      price: getEnvVar('PRICE_SELECTOR', false) || '[data-price], .price',
      trim: getEnvVar('TRIM_SELECTOR', false) || '[data-trim], .trim',
      chargeType: getEnvVar('CHARGE_TYPE_SELECTOR', false) || '[data-charge], .charge-type',
      color: getEnvVar('COLOR_SELECTOR', false) || '[data-color], .color',
      seats: getEnvVar('SEATS_SELECTOR', false) || '[data-seats], .seats',
      packs: getEnvVar('PACKS_SELECTOR', false) || '[data-packs] li, .packs li',
      location: getEnvVar('LOCATION_SELECTOR', false) || '[data-location], .location',
      mapLink: getEnvVar('MAP_LINK_SELECTOR', false) || 'a[href*="maps"]',
      photo: getEnvVar('PHOTO_SELECTOR', false) || 'img',
      loadMore: getEnvVar('LOAD_MORE_SELECTOR', false) || null,
    },
    emptyResultsPattern: new RegExp(getEnvVar('EMPTY_RESULTS_PATTERN', false) || 'aucun r|0 r[ée]sultat|no results', 'i'),
    trimLabel: getEnvVar('TRIM_LABEL', false) || null,
    chargeTypeLabel: getEnvVar('CHARGE_TYPE_LABEL', false) || null,
  },
  browser: {
    wsEndpoint: getEnvVar('BROWSER_WS_ENDPOINT', false) || null,
    executablePath: getEnvVar('CHROME_EXECUTABLE_PATH', false) || null,
    navigationTimeoutMs: getNumberEnvVar('NAVIGATION_TIMEOUT_MS', 60000),
    fetchRetries: getNumberEnvVar('FETCH_RETRIES', 3),
    retryBaseDelayMs: getNumberEnvVar('RETRY_BASE_DELAY_MS', 1000),
  },
  extraction: {
    settleThreshold: getNumberEnvVar('SETTLE_THRESHOLD', 3),
    growthTimeoutMs: getNumberEnvVar('GROWTH_TIMEOUT_MS', 5000),
    maxGrowthSteps: getNumberEnvVar('MAX_GROWTH_STEPS', 200),
    debugSnapshotPath: getEnvVar('DEBUG_SNAPSHOT_PATH', false) || 'debug_fail_page.html',
  },
  sync: {
    batchSize: getNumberEnvVar('BATCH_SIZE', 10),
    storeRetries: getNumberEnvVar('STORE_RETRIES', 3),
    storeTimeoutMs: getNumberEnvVar('STORE_TIMEOUT_MS', 15000),
    availabilityGraceMs: getNumberEnvVar('AVAILABILITY_GRACE_MS', 0),
  },
  filters: {
    excludedColors: getListEnvVar('EXCLUDED_COLORS'),
    excludedKeywords: getListEnvVar('EXCLUDED_KEYWORDS'),
    requiredKeywords: getListEnvVar('REQUIRED_KEYWORDS'),
    priceMin: getOptionalNumberEnvVar('PRICE_MIN'),
    priceMax: getOptionalNumberEnvVar('PRICE_MAX'),
  },
  app: {
    port: getNumberEnvVar('API_PORT', 3000),
    timezone: getEnvVar('TIMEZONE', false) || 'Europe/Paris',
    logLevel: getEnvVar('LOG_LEVEL', false) || 'info',
    scrapeSchedule: getEnvVar('SCRAPE_SCHEDULE', false) || null,
  },
};
