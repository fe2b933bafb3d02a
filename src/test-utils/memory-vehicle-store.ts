import {
  PriceHistoryEntry,
  VehicleEntity,
  VehicleQueryFilter,
  VehicleWithHistory,
} from '../types/index.js';
import { VehicleStore, VehicleStoreTransaction, compareCatalogOrder } from '../database/vehicle-store.js';
import { StoreError } from '../utils/errors.js';

export type StoreOperation = 'getByUrl' | 'upsert' | 'appendPriceHistory' | 'markUnavailable' | 'queryAll' | 'commit';

/**
 * Return an error to make the given operation fail, or null to let it through
 */
export type FailureInjector = (operation: StoreOperation) => Error | null;

function cloneEntity(entity: VehicleEntity): VehicleEntity {
  return {
    ...entity,
    packs: entity.packs ? [...entity.packs] : null,
    firstSeen: new Date(entity.firstSeen.getTime()),
    lastSeen: new Date(entity.lastSeen.getTime()),
  };
}

function cloneHistory(entry: PriceHistoryEntry): PriceHistoryEntry {
  return { ...entry, observedAt: new Date(entry.observedAt.getTime()) };
}

/**
 * In-process VehicleStore used by the test suites.
 * Transactions run one at a time against a copy and are swapped in on success.
 */
export class MemoryVehicleStore implements VehicleStore {
  private vehicles = new Map<string, VehicleEntity>();
  private history: PriceHistoryEntry[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  failOn: FailureInjector = () => null;
  commits = 0;

  async getByUrl(url: string): Promise<VehicleEntity | null> {
    this.check('getByUrl');
    const found = this.vehicles.get(url);
    return found ? cloneEntity(found) : null;
  }

  async upsert(entity: VehicleEntity): Promise<void> {
    this.check('upsert');
    this.vehicles.set(entity.url, cloneEntity(entity));
  }

  async appendPriceHistory(url: string, price: number | null, observedAt: Date): Promise<void> {
    this.check('appendPriceHistory');
    this.history.push({ vehicleUrl: url, price, observedAt: new Date(observedAt.getTime()) });
  }

  async markUnavailable(notSeenSince: Date): Promise<number> {
    this.check('markUnavailable');
    let changed = 0;
    for (const vehicle of this.vehicles.values()) {
      if (vehicle.isAvailable && vehicle.lastSeen.getTime() < notSeenSince.getTime()) {
        vehicle.isAvailable = false;
        changed++;
      }
    }
    return changed;
  }

  async queryAll(filter: VehicleQueryFilter = {}): Promise<VehicleWithHistory[]> {
    this.check('queryAll');
    return [...this.vehicles.values()]
      .filter(v => !filter.availableOnly || v.isAvailable)
      .filter(v => !filter.url || v.url === filter.url)
      .sort(compareCatalogOrder)
      .map(v => ({
        ...cloneEntity(v),
        priceHistory: this.history
          .filter(h => h.vehicleUrl === v.url)
          .map(cloneHistory)
          .sort((a, b) => a.observedAt.getTime() - b.observedAt.getTime()),
      }));
  }

  transaction<T>(work: (tx: VehicleStoreTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(work));
    this.queue = run.catch(() => undefined);
    return run;
  }

  /** Price history rows for one URL, in insertion order */
  historyFor(url: string): PriceHistoryEntry[] {
    return this.history.filter(h => h.vehicleUrl === url).map(cloneHistory);
  }

  size(): number {
    return this.vehicles.size;
  }

  private async runTransaction<T>(work: (tx: VehicleStoreTransaction) => Promise<T>): Promise<T> {
    const savedVehicles = new Map([...this.vehicles].map(([url, v]) => [url, cloneEntity(v)]));
    const savedHistory = this.history.map(cloneHistory);

    try {
      const result = await work(this);
      this.check('commit');
      this.commits++;
      return result;
    } catch (error) {
      this.vehicles = savedVehicles;
      this.history = savedHistory;
      throw error;
    }
  }

  private check(operation: StoreOperation): void {
    const error = this.failOn(operation);
    if (error) {
      throw error instanceof StoreError ? error : new StoreError(error.message, { cause: error });
    }
  }
}
