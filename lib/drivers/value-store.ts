import { Decimal, toDecimal } from '@/lib/math';
import { MONTHS } from './period';
import type { PlantId, StoredDriverValue } from './types';

/**
 * Driver values by period with fallback logic.
 *
 * One flat map keyed by (driver, plant, year, month). `plantId = null` is the
 * system-wide value and `month = null` an annual value. Last write wins.
 */

const keyOf = (driverName: string, plantId: PlantId, year: number, month: number | null) =>
  `${driverName}\u0000${plantId ?? '*'}\u0000${year}\u0000${month ?? '*'}`;

/**
 * Candidate keys for a lookup, most specific first:
 * 1. plant + month  2. plant + annual  3. system + month  4. system + annual
 */
export function resolutionKeys(
  driverName: string,
  year: number,
  month: number,
  plantId: PlantId
): string[] {
  const keys: string[] = [];
  if (plantId !== null) {
    keys.push(keyOf(driverName, plantId, year, month));
    keys.push(keyOf(driverName, plantId, year, null));
  }
  keys.push(keyOf(driverName, null, year, month));
  keys.push(keyOf(driverName, null, year, null));
  return keys;
}

export class DriverValueStore {
  private values = new Map<string, StoredDriverValue>();

  set(
    driverName: string,
    year: number,
    month: number | null,
    value: Decimal.Value,
    plantId: PlantId = null
  ): void {
    this.values.set(keyOf(driverName, plantId, year, month), {
      driverName,
      plantId,
      year,
      month,
      value: toDecimal(value),
    });
  }

  get(
    driverName: string,
    year: number,
    month: number,
    plantId: PlantId = null,
    defaultValue: Decimal.Value = 0
  ): Decimal {
    for (const key of resolutionKeys(driverName, year, month, plantId)) {
      const hit = this.values.get(key);
      if (hit) return hit.value;
    }
    return toDecimal(defaultValue);
  }

  getAllMonths(
    driverName: string,
    year: number,
    plantId: PlantId = null,
    defaultValue: Decimal.Value = 0
  ): Record<number, Decimal> {
    const result: Record<number, Decimal> = {};
    for (const month of MONTHS) {
      result[month] = this.get(driverName, year, month, plantId, defaultValue);
    }
    return result;
  }

  /** Exact-key presence, no fallback */
  has(driverName: string, year: number, month: number | null, plantId: PlantId = null): boolean {
    return this.values.has(keyOf(driverName, plantId, year, month));
  }

  clear(driverName?: string): void {
    if (driverName === undefined) {
      this.values.clear();
      return;
    }
    for (const [key, entry] of this.values) {
      if (entry.driverName === driverName) this.values.delete(key);
    }
  }

  storedDrivers(): string[] {
    const names = new Set<string>();
    for (const entry of this.values.values()) names.add(entry.driverName);
    return [...names];
  }

  entries(driverName?: string): StoredDriverValue[] {
    const all = [...this.values.values()];
    return driverName === undefined ? all : all.filter((e) => e.driverName === driverName);
  }

  get size(): number {
    return this.values.size;
  }
}
