import { ReconcileOutcome, VehicleEntity, VehicleRecord } from '../types/index.js';
import { VehicleStore, VehicleStoreTransaction } from '../database/vehicle-store.js';
import { formatPrice } from '../scraper/price-parser.js';
import { logger } from '../utils/logger.js';

/**
 * Merge one freshly extracted record into the catalog.
 *
 * New URL: inserted as available with originalPrice = price, no history row.
 * Known URL: lastSeen advances, availability is restored, other fields are
 * overwritten. A price that differs from the stored one (null included) is
 * appended to the history before the stored price is replaced.
 */
export async function reconcile(
  store: VehicleStoreTransaction,
  record: VehicleRecord,
  now: Date
): Promise<ReconcileOutcome> {
  const existing = await store.getByUrl(record.url);

  if (!existing) {
    await store.upsert({
      ...record,
      originalPrice: record.price,
      firstSeen: now,
      lastSeen: now,
      isAvailable: true,
    });

    logger.info('New vehicle added', { url: record.url, price: formatPrice(record.price) });
    return { isNew: true, priceChanged: false };
  }

  const priceChanged = existing.price !== record.price;
  if (priceChanged) {
    await store.appendPriceHistory(record.url, record.price, now);
    logger.info('Price change detected', {
      url: record.url,
      oldPrice: formatPrice(existing.price),
      newPrice: formatPrice(record.price),
    });
  }

  const updated: VehicleEntity = {
    ...record,
    originalPrice: existing.originalPrice,
    firstSeen: existing.firstSeen,
    // A clock stepping backwards must not break firstSeen <= lastSeen
    lastSeen: now.getTime() < existing.firstSeen.getTime() ? existing.firstSeen : now,
    isAvailable: true,
  };
  await store.upsert(updated);

  return priceChanged
    ? { isNew: false, priceChanged: true, oldPrice: existing.price }
    : { isNew: false, priceChanged: false };
}

/**
 * Reconcile a batch of records inside one store transaction
 */
export async function reconcileBatch(
  store: VehicleStore,
  records: VehicleRecord[],
  now: Date
): Promise<ReconcileOutcome[]> {
  return store.transaction(async (tx) => {
    const outcomes: ReconcileOutcome[] = [];
    for (const record of records) {
      outcomes.push(await reconcile(tx, record, now));
    }
    return outcomes;
  });
}

/**
 * Full-catalog availability pass: every vehicle not seen since the run
 * started (minus the grace period) becomes unavailable.
 * Only ever called for a run whose extraction finished normally.
 */
export async function markStaleUnavailable(
  store: VehicleStore,
  runStartedAt: Date,
  graceMs = 0
): Promise<number> {
  const cutoff = new Date(runStartedAt.getTime() - Math.max(0, graceMs));
  const marked = await store.markUnavailable(cutoff);

  logger.info('Availability pass completed', {
    cutoff: cutoff.toISOString(),
    markedUnavailable: marked,
  });

  return marked;
}
