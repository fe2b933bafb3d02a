import { CatalogStats, VehicleWithHistory } from '../types/index.js';

const NEW_WINDOW_MS = 24 * 60 * 60 * 1000;

/**
 * First seen within the last 24 hours and still available
 */
export function isNewVehicle(vehicle: VehicleWithHistory, now: Date = new Date()): boolean {
  return vehicle.isAvailable && vehicle.firstSeen.getTime() > now.getTime() - NEW_WINDOW_MS;
}

export function computeCatalogStats(vehicles: VehicleWithHistory[], now: Date = new Date()): CatalogStats {
  return {
    total: vehicles.length,
    available: vehicles.filter(v => v.isAvailable).length,
    newIn24h: vehicles.filter(v => isNewVehicle(v, now)).length,
    withPriceHistory: vehicles.filter(v => v.priceHistory.length > 0).length,
  };
}
