import { describe, it, expect, vi } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import {
  SupabaseVehicleStore,
  VehicleRow,
  entityToRow,
  rowToEntity,
  rowToVehicleWithHistory,
} from './supabase-vehicle-store.js';
import { compareCatalogOrder } from './vehicle-store.js';
import { StoreError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const row: VehicleRow = {
  url: 'https://cars.example.com/vehicles/1',
  title: 'Megane E-Tech',
  current_price: 1850000,
  original_price: 1990000,
  trim: 'Techno',
  charge_type: 'EV',
  exterior_color: 'Gris',
  seat_type: null,
  packs: ['Pack Hiver'],
  location: 'Lyon',
  latitude: 45.764,
  longitude: 4.8357,
  photo_url: null,
  first_seen: '2026-03-01T08:00:00.000Z',
  last_seen: '2026-03-02T08:00:00.000Z',
  is_available: true,
};

describe('vehicle row mapping', () => {
  it('should map a row to an entity and back', () => {
    const entity = rowToEntity(row);

    expect(entity.price).toBe(1850000);
    expect(entity.originalPrice).toBe(1990000);
    expect(entity.firstSeen.toISOString()).toBe('2026-03-01T08:00:00.000Z');
    expect(entityToRow(entity)).toEqual(row);
  });

  it('should attach price history in ascending order', () => {
    const vehicle = rowToVehicleWithHistory({
      ...row,
      price_history: [
        { price: 1850000, observed_at: '2026-03-02T08:00:00.000Z' },
        { price: null, observed_at: '2026-03-01T20:00:00.000Z' },
      ],
    });

    expect(vehicle.priceHistory.map(h => [h.price, h.observedAt.toISOString()])).toEqual([
      [null, '2026-03-01T20:00:00.000Z'],
      [1850000, '2026-03-02T08:00:00.000Z'],
    ]);
    expect(vehicle.priceHistory[0].vehicleUrl).toBe(row.url);
  });

  it('should treat a missing history embed as empty', () => {
    expect(rowToVehicleWithHistory({ ...row, price_history: null }).priceHistory).toEqual([]);
  });
});

describe('compareCatalogOrder', () => {
  it('should order by lastSeen desc, then price asc with unpriced last', () => {
    const base = rowToEntity(row);
    const older = { ...base, url: 'older', lastSeen: new Date('2026-02-01T00:00:00Z') };
    const cheap = { ...base, url: 'cheap', price: 100 };
    const unpriced = { ...base, url: 'unpriced', price: null };

    const sorted = [older, unpriced, base, cheap].sort(compareCatalogOrder).map(v => v.url);

    expect(sorted).toEqual(['cheap', row.url, 'unpriced', 'older']);
  });
});

interface RecordedRequest {
  method: string;
  path: string;
  params: URLSearchParams;
  body: unknown;
}

interface StubResponse {
  status?: number;
  body: unknown;
}

/**
 * Real Supabase client whose HTTP layer answers in process
 */
function stubbedStore(respond: (request: RecordedRequest) => StubResponse, pageSize?: number) {
  const requests: RecordedRequest[] = [];

  const fetchStub = async (input: RequestInfo | URL, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const request: RecordedRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname,
      params: url.searchParams,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : null,
    };
    requests.push(request);

    const { status = 200, body } = respond(request);
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  const client = createClient('http://supabase.test', 'test-secret', {
    auth: { autoRefreshToken: false, persistSession: false },
    global: { fetch: fetchStub },
  });

  return { store: new SupabaseVehicleStore(client, 1000, pageSize), requests };
}

const noRows: StubResponse = {
  status: 406,
  body: { code: 'PGRST116', message: 'JSON object requested, multiple (or no) rows returned', details: null, hint: null },
};

const serverError = (message: string): StubResponse => ({
  status: 500,
  body: { code: '40P01', message, details: null, hint: null },
});

describe('SupabaseVehicleStore', () => {
  describe('getByUrl', () => {
    it('should map the matching row', async () => {
      const { store, requests } = stubbedStore(() => ({ body: row }));

      expect(await store.getByUrl(row.url)).toEqual(rowToEntity(row));
      expect(requests[0].path).toBe('/rest/v1/vehicles');
      expect(requests[0].params.get('url')).toBe(`eq.${row.url}`);
    });

    it('should return null when no row matches', async () => {
      const { store } = stubbedStore(() => noRows);

      expect(await store.getByUrl(row.url)).toBeNull();
    });

    it('should raise StoreError on other failures', async () => {
      const { store } = stubbedStore(() => serverError('canceling statement due to statement timeout'));

      await expect(store.getByUrl(row.url)).rejects.toThrow(
        `Failed to fetch vehicle ${row.url}: canceling statement due to statement timeout`
      );
    });
  });

  describe('transaction', () => {
    it('should read its own writes and commit them in one call', async () => {
      const { store, requests } = stubbedStore(request =>
        request.path === '/rest/v1/rpc/commit_vehicle_batch' ? { body: null } : noRows
      );
      const entity = rowToEntity(row);
      const otherUrl = 'https://cars.example.com/vehicles/2';

      const seen = await store.transaction(async tx => {
        await tx.upsert(entity);
        const pending = await tx.getByUrl(entity.url);
        const missing = await tx.getByUrl(otherUrl);
        await tx.appendPriceHistory(entity.url, 1990000, new Date('2026-03-01T20:00:00Z'));
        await tx.appendPriceHistory(entity.url, 1850000, new Date('2026-03-02T08:00:00Z'));
        return { pending, missing };
      });

      expect(seen).toEqual({ pending: entity, missing: null });
      expect(requests.map(r => [r.method, r.path])).toEqual([
        ['GET', '/rest/v1/vehicles'],
        ['POST', '/rest/v1/rpc/commit_vehicle_batch'],
      ]);
      expect(requests[0].params.get('url')).toBe(`eq.${otherUrl}`);
      expect(requests[1].body).toEqual({
        vehicles: [row],
        price_history: [
          { vehicle_url: row.url, price: 1990000, observed_at: '2026-03-01T20:00:00.000Z', seq: 0 },
          { vehicle_url: row.url, price: 1850000, observed_at: '2026-03-02T08:00:00.000Z', seq: 1 },
        ],
      });
    });

    it('should keep the last upsert of a url', async () => {
      const { store, requests } = stubbedStore(() => ({ body: null }));
      const entity = rowToEntity(row);

      await store.transaction(async tx => {
        await tx.upsert(entity);
        await tx.upsert({ ...entity, price: 1700000 });
      });

      expect(requests).toHaveLength(1);
      expect(requests[0].body).toEqual({
        vehicles: [{ ...row, current_price: 1700000 }],
        price_history: [],
      });
    });

    it('should skip the commit when nothing was written', async () => {
      const { store, requests } = stubbedStore(() => ({ body: row }));

      const price = await store.transaction(async tx => (await tx.getByUrl(row.url))?.price);

      expect(price).toBe(1850000);
      expect(requests.map(r => r.path)).toEqual(['/rest/v1/vehicles']);
    });

    it('should raise StoreError when the commit fails', async () => {
      const { store } = stubbedStore(() => serverError('deadlock detected'));

      const error = await store
        .transaction(async tx => tx.upsert(rowToEntity(row)))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreError);
      expect(error).toHaveProperty('message', 'Failed to commit vehicle batch: deadlock detected');
    });
  });

  describe('markUnavailable', () => {
    it('should flag available vehicles not seen since the cutoff and count them', async () => {
      const { store, requests } = stubbedStore(() => ({
        body: [{ url: 'https://cars.example.com/vehicles/1' }, { url: 'https://cars.example.com/vehicles/2' }],
      }));

      const marked = await store.markUnavailable(new Date('2026-03-02T08:00:00Z'));

      expect(marked).toBe(2);
      expect(requests[0].method).toBe('PATCH');
      expect(requests[0].params.get('is_available')).toBe('eq.true');
      expect(requests[0].params.get('last_seen')).toBe('lt.2026-03-02T08:00:00.000Z');
      expect(requests[0].body).toEqual({ is_available: false });
    });

    it('should raise StoreError on failure', async () => {
      const { store } = stubbedStore(() => serverError('connection reset'));

      await expect(store.markUnavailable(new Date())).rejects.toThrow(
        'Failed to mark vehicles unavailable: connection reset'
      );
    });
  });

  describe('queryAll', () => {
    const catalog = [1, 2, 3, 4, 5].map(n => ({
      ...row,
      url: `https://cars.example.com/vehicles/${n}`,
      last_seen: `2026-03-0${n}T08:00:00.000Z`,
      price_history: [],
    }));

    function pagedCatalog(rows: typeof catalog) {
      return (request: RecordedRequest): StubResponse => {
        const offset = Number(request.params.get('offset'));
        const limit = Number(request.params.get('limit'));
        return { body: rows.slice(offset, offset + limit) };
      };
    }

    it('should read every page until a short one', async () => {
      const { store, requests } = stubbedStore(pagedCatalog(catalog), 2);

      const vehicles = await store.queryAll();

      expect(vehicles.map(v => v.url)).toEqual([5, 4, 3, 2, 1].map(n => `https://cars.example.com/vehicles/${n}`));
      expect(requests.map(r => [r.params.get('offset'), r.params.get('limit')])).toEqual([
        ['0', '2'],
        ['2', '2'],
        ['4', '2'],
      ]);
    });

    it('should stop on an empty page when the catalog fills the last page', async () => {
      const { store, requests } = stubbedStore(pagedCatalog(catalog.slice(0, 4)), 2);

      expect(await store.queryAll()).toHaveLength(4);
      expect(requests).toHaveLength(3);
    });

    it('should filter on availability', async () => {
      const { store, requests } = stubbedStore(() => ({ body: [] }));

      expect(await store.queryAll({ availableOnly: true })).toEqual([]);
      expect(requests[0].params.get('is_available')).toBe('eq.true');
    });

    it('should raise StoreError on failure', async () => {
      const { store } = stubbedStore(() => serverError('relation "vehicles" does not exist'));

      await expect(store.queryAll()).rejects.toThrow('Failed to fetch vehicles: relation "vehicles" does not exist');
    });
  });
});
