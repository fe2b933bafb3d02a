// Scraper Types
export interface VehicleRecord {
  url: string;
  title: string;
  /** Integer minor units (cents), null when the listing price could not be parsed */
  price: number | null;
  trim: string | null;
  chargeType: string | null;
  exteriorColor: string | null;
  seatType: string | null;
  packs: string[] | null;
  location: string | null;
  latitude: number | null;
  longitude: number | null;
  photoUrl: string | null;
}

// Database Models
export interface VehicleEntity extends VehicleRecord {
  originalPrice: number | null;
  firstSeen: Date;
  lastSeen: Date;
  isAvailable: boolean;
}

export interface PriceHistoryEntry {
  vehicleUrl: string;
  price: number | null;
  observedAt: Date;
}

export interface VehicleWithHistory extends VehicleEntity {
  priceHistory: PriceHistoryEntry[];
}

export interface VehicleQueryFilter {
  availableOnly?: boolean;
  url?: string;
}

export interface CatalogStats {
  total: number;
  available: number;
  newIn24h: number;
  withPriceHistory: number;
}

// Sync Types
export interface ReconcileOutcome {
  isNew: boolean;
  priceChanged: boolean;
  oldPrice?: number | null;
}

export type JobStatus = 'idle' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface RunCounters {
  listingsSeen: number;
  added: number;
  priceChanges: number;
  growthSteps: number;
}

export interface JobState {
  status: JobStatus;
  runId: string | null;
  progress: number;
  message: string;
  startedAt: Date | null;
  finishedAt: Date | null;
  lastRun: Date | null;
  error: string | null;
  counters: RunCounters;
}

// Configuration
export interface SourceSelectors {
  listing: string;
  link: string;
  title: string;
  price: string;
  trim: string;
  chargeType: string;
  color: string;
  seats: string;
  packs: string;
  location: string;
  mapLink: string;
  photo: string;
  loadMore: string | null;
}

export interface Config {
  supabase: {
    url: string;
    serviceKey: string;
  };
  source: {
    url: string;
    baseUrl: string;
    selectors: SourceSelectors;
    emptyResultsPattern: RegExp;
    trimLabel: string | null;
    chargeTypeLabel: string | null;
  };
  browser: {
    wsEndpoint: string | null;
    executablePath: string | null;
    navigationTimeoutMs: number;
    fetchRetries: number;
    retryBaseDelayMs: number;
  };
  extraction: {
    settleThreshold: number;
    growthTimeoutMs: number;
    maxGrowthSteps: number;
    debugSnapshotPath: string;
  };
  sync: {
    batchSize: number;
    storeRetries: number;
    storeTimeoutMs: number;
    availabilityGraceMs: number;
  };
  filters: {
    excludedColors: string[];
    excludedKeywords: string[];
    /** A listing is kept only if its card text contains one of these; empty keeps all */
    requiredKeywords: string[];
    priceMin: number | null;
    priceMax: number | null;
  };
  app: {
    port: number;
    timezone: string;
    logLevel: string;
    scrapeSchedule: string | null;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
