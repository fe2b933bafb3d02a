import {
  VehicleEntity,
  VehicleQueryFilter,
  VehicleWithHistory,
} from '../types/index.js';

/**
 * Operations available inside a store transaction
 */
export interface VehicleStoreTransaction {
  getByUrl(url: string): Promise<VehicleEntity | null>;
  /** Insert or replace the entity keyed by its URL */
  upsert(entity: VehicleEntity): Promise<void>;
  /** Append-only */
  appendPriceHistory(url: string, price: number | null, observedAt: Date): Promise<void>;
}

/**
 * Durable catalog of vehicles and their price history.
 * Implementations throw StoreError on read/write failures.
 */
export interface VehicleStore extends VehicleStoreTransaction {
  /**
   * Mark every available vehicle whose lastSeen is before `notSeenSince` as unavailable.
   * Returns the number of vehicles changed.
   */
  markUnavailable(notSeenSince: Date): Promise<number>;
  /**
   * All vehicles ordered by lastSeen desc then price asc,
   * each with its price history ordered by observedAt asc
   */
  queryAll(filter?: VehicleQueryFilter): Promise<VehicleWithHistory[]>;
  /** Run `work` atomically: either all of its writes commit or none do */
  transaction<T>(work: (tx: VehicleStoreTransaction) => Promise<T>): Promise<T>;
}

/**
 * Catalog ordering shared by store implementations
 */
export function compareCatalogOrder(a: VehicleEntity, b: VehicleEntity): number {
  const bySeen = b.lastSeen.getTime() - a.lastSeen.getTime();
  if (bySeen !== 0) return bySeen;

  // Unpriced listings sort last
  const aPrice = a.price ?? Number.MAX_SAFE_INTEGER;
  const bPrice = b.price ?? Number.MAX_SAFE_INTEGER;
  return aPrice - bPrice;
}
