import { SupabaseClient } from '@supabase/supabase-js';
import {
  PriceHistoryEntry,
  VehicleEntity,
  VehicleQueryFilter,
  VehicleWithHistory,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { StoreError } from '../utils/errors.js';
import { VehicleStore, VehicleStoreTransaction, compareCatalogOrder } from './vehicle-store.js';

/** PostgREST's default max-rows */
export const CATALOG_PAGE_SIZE = 1000;

// Database rows
export interface VehicleRow {
  url: string;
  title: string;
  current_price: number | null;
  original_price: number | null;
  trim: string | null;
  charge_type: string | null;
  exterior_color: string | null;
  seat_type: string | null;
  packs: string[] | null;
  location: string | null;
  latitude: number | null;
  longitude: number | null;
  photo_url: string | null;
  first_seen: string;
  last_seen: string;
  is_available: boolean;
}

export interface PriceHistoryRow {
  vehicle_url: string;
  price: number | null;
  observed_at: string;
}

type VehicleRowWithHistory = VehicleRow & {
  price_history: Array<Pick<PriceHistoryRow, 'price' | 'observed_at'>> | null;
};

export function rowToEntity(row: VehicleRow): VehicleEntity {
  return {
    url: row.url,
    title: row.title,
    price: row.current_price,
    originalPrice: row.original_price,
    trim: row.trim,
    chargeType: row.charge_type,
    exteriorColor: row.exterior_color,
    seatType: row.seat_type,
    packs: row.packs,
    location: row.location,
    latitude: row.latitude,
    longitude: row.longitude,
    photoUrl: row.photo_url,
    firstSeen: new Date(row.first_seen),
    lastSeen: new Date(row.last_seen),
    isAvailable: row.is_available,
  };
}

export function entityToRow(entity: VehicleEntity): VehicleRow {
  return {
    url: entity.url,
    title: entity.title,
    current_price: entity.price,
    original_price: entity.originalPrice,
    trim: entity.trim,
    charge_type: entity.chargeType,
    exterior_color: entity.exteriorColor,
    seat_type: entity.seatType,
    packs: entity.packs,
    location: entity.location,
    latitude: entity.latitude,
    longitude: entity.longitude,
    photo_url: entity.photoUrl,
    first_seen: entity.firstSeen.toISOString(),
    last_seen: entity.lastSeen.toISOString(),
    is_available: entity.isAvailable,
  };
}

export function rowToVehicleWithHistory(row: VehicleRowWithHistory): VehicleWithHistory {
  const priceHistory: PriceHistoryEntry[] = (row.price_history ?? [])
    .map(h => ({ vehicleUrl: row.url, price: h.price, observedAt: new Date(h.observed_at) }))
    .sort((a, b) => a.observedAt.getTime() - b.observedAt.getTime());

  return { ...rowToEntity(row), priceHistory };
}

/**
 * Writes buffered by a transaction, committed in one commit_vehicle_batch call
 */
class BufferedTransaction implements VehicleStoreTransaction {
  readonly vehicles = new Map<string, VehicleEntity>();
  readonly history: Array<PriceHistoryRow & { seq: number }> = [];

  constructor(private readonly store: SupabaseVehicleStore) {}

  async getByUrl(url: string): Promise<VehicleEntity | null> {
    const pending = this.vehicles.get(url);
    return pending ? { ...pending } : this.store.getByUrl(url);
  }

  async upsert(entity: VehicleEntity): Promise<void> {
    this.vehicles.set(entity.url, { ...entity });
  }

  async appendPriceHistory(url: string, price: number | null, observedAt: Date): Promise<void> {
    this.history.push({
      vehicle_url: url,
      price,
      observed_at: observedAt.toISOString(),
      seq: this.history.length,
    });
  }
}

/**
 * Supabase (PostgreSQL) implementation of the vehicle catalog.
 * Every request is bounded by `timeoutMs`.
 */
export class SupabaseVehicleStore implements VehicleStore {
  private readonly VEHICLES_TABLE = 'vehicles';
  private readonly HISTORY_TABLE = 'price_history';

  constructor(
    private readonly supabase: SupabaseClient,
    private readonly timeoutMs: number,
    private readonly pageSize: number = CATALOG_PAGE_SIZE
  ) {}

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.timeoutMs);
  }

  async getByUrl(url: string): Promise<VehicleEntity | null> {
    const { data, error } = await this.supabase
      .from(this.VEHICLES_TABLE)
      .select('*')
      .eq('url', url)
      .abortSignal(this.signal())
      .single();

    if (error && error.code !== 'PGRST116') {
      // PGRST116 = no rows returned
      logger.error('Failed to fetch vehicle', { error: error.message, url });
      throw new StoreError(`Failed to fetch vehicle ${url}: ${error.message}`);
    }

    return data ? rowToEntity(data as VehicleRow) : null;
  }

  async upsert(entity: VehicleEntity): Promise<void> {
    const { error } = await this.supabase
      .from(this.VEHICLES_TABLE)
      .upsert(entityToRow(entity), { onConflict: 'url' })
      .abortSignal(this.signal());

    if (error) {
      logger.error('Failed to upsert vehicle', { error: error.message, url: entity.url });
      throw new StoreError(`Failed to upsert vehicle ${entity.url}: ${error.message}`);
    }
  }

  async appendPriceHistory(url: string, price: number | null, observedAt: Date): Promise<void> {
    const row: PriceHistoryRow = { vehicle_url: url, price, observed_at: observedAt.toISOString() };
    const { error } = await this.supabase
      .from(this.HISTORY_TABLE)
      .insert(row)
      .abortSignal(this.signal());

    if (error) {
      logger.error('Failed to insert price history', { error: error.message, url });
      throw new StoreError(`Failed to insert price history for ${url}: ${error.message}`);
    }
  }

  async markUnavailable(notSeenSince: Date): Promise<number> {
    const { data, error } = await this.supabase
      .from(this.VEHICLES_TABLE)
      .update({ is_available: false })
      .eq('is_available', true)
      .lt('last_seen', notSeenSince.toISOString())
      .select('url')
      .abortSignal(this.signal());

    if (error) {
      logger.error('Failed to mark vehicles unavailable', { error: error.message });
      throw new StoreError(`Failed to mark vehicles unavailable: ${error.message}`);
    }

    return (data ?? []).length;
  }

  private catalogQuery(filter: VehicleQueryFilter) {
    let query = this.supabase
      .from(this.VEHICLES_TABLE)
      .select('*, price_history(price, observed_at)')
      .order('last_seen', { ascending: false })
      .order('current_price', { ascending: true, nullsFirst: false })
      // Tie-breaker so pages do not overlap
      .order('url', { ascending: true })
      .order('observed_at', { referencedTable: this.HISTORY_TABLE, ascending: true });

    if (filter.availableOnly) {
      query = query.eq('is_available', true);
    }
    if (filter.url !== undefined) {
      query = query.eq('url', filter.url);
    }
    return query;
  }

  /**
   * Whole catalog, read page by page: PostgREST caps a single response at
   * its max-rows setting.
   */
  async queryAll(filter: VehicleQueryFilter = {}): Promise<VehicleWithHistory[]> {
    const rows: VehicleRowWithHistory[] = [];

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.catalogQuery(filter)
        .range(from, from + this.pageSize - 1)
        .abortSignal(this.signal());

      if (error) {
        logger.error('Failed to fetch vehicles', { error: error.message, offset: from });
        throw new StoreError(`Failed to fetch vehicles: ${error.message}`);
      }

      const page = (data ?? []) as VehicleRowWithHistory[];
      rows.push(...page);
      if (page.length < this.pageSize) break;
    }

    logger.debug('Fetched vehicle catalog', { vehicles: rows.length });

    return rows
      .map(rowToVehicleWithHistory)
      .sort(compareCatalogOrder);
  }

  async transaction<T>(work: (tx: VehicleStoreTransaction) => Promise<T>): Promise<T> {
    const tx = new BufferedTransaction(this);
    const result = await work(tx);

    if (tx.vehicles.size === 0 && tx.history.length === 0) {
      return result;
    }

    const { error } = await this.supabase
      .rpc('commit_vehicle_batch', {
        vehicles: [...tx.vehicles.values()].map(entityToRow),
        price_history: tx.history,
      })
      .abortSignal(this.signal());

    if (error) {
      logger.error('Failed to commit vehicle batch', {
        error: error.message,
        vehicles: tx.vehicles.size,
        priceHistory: tx.history.length,
      });
      throw new StoreError(`Failed to commit vehicle batch: ${error.message}`);
    }

    logger.debug('Committed vehicle batch', {
      vehicles: tx.vehicles.size,
      priceHistory: tx.history.length,
    });

    return result;
  }
}
