// lib/drivers/fuel-model.ts
// Driver-based fuel forecasting model (engine facade)

import { Decimal } from '@/lib/math';
import { assertMonth, assertYear, MONTHS } from './period';
import { DriverRegistry } from './registry';
import { DriverValueStore } from './value-store';
import type {
  Driver,
  DriverIssue,
  DriverLogger,
  DriverResolver,
  ModelSnapshot,
  PlantId,
} from './types';

export interface FuelModelOptions {
  registry?: DriverRegistry;
  logger?: DriverLogger;
}

/**
 * Driver definitions plus their values.
 *
 * Meant to be built per request or job and thrown away; it does no locking.
 */
export class FuelModel implements DriverResolver {
  readonly registry: DriverRegistry;
  readonly values = new DriverValueStore();

  constructor(options: FuelModelOptions = {}) {
    this.registry = options.registry ?? new DriverRegistry({ logger: options.logger });
  }

  registerDriver(driver: Driver): DriverIssue[] {
    return this.registry.register(driver);
  }

  registerDrivers(drivers: readonly Driver[]): DriverIssue[] {
    return this.registry.registerMany(drivers);
  }

  getDriver(name: string): Driver {
    return this.registry.get(name);
  }

  get calculationOrder(): readonly string[] {
    return this.registry.calculationOrder();
  }

  getValue(driverName: string, year: number, month: number, plantId: PlantId = null): Decimal {
    const driver = this.registry.get(driverName);
    assertYear(year);
    assertMonth(month);

    if (driver.driverType === 'CALCULATED' && driver.calculation) {
      // Builds (or reuses) the order so a cycle fails here rather than recursing forever
      this.registry.calculationOrder();
      return driver.calculation.evaluate(this, year, month, plantId);
    }

    return this.values.get(driverName, year, month, plantId, driver.defaultValue);
  }

  setValue(
    driverName: string,
    year: number,
    month: number | null,
    value: Decimal.Value,
    plantId: PlantId = null
  ): void {
    this.registry.get(driverName);
    assertYear(year);
    if (month !== null) assertMonth(month);

    this.values.set(driverName, year, month, value, plantId);
  }

  /** Every driver for one period, in calculation order */
  getAllValues(year: number, month: number, plantId: PlantId = null): Record<string, Decimal> {
    const result: Record<string, Decimal> = {};
    for (const name of this.registry.calculationOrder()) {
      result[name] = this.getValue(name, year, month, plantId);
    }
    return result;
  }

  getMonthlyValues(driverName: string, year: number, plantId: PlantId = null): Record<number, Decimal> {
    const result: Record<number, Decimal> = {};
    for (const month of MONTHS) {
      result[month] = this.getValue(driverName, year, month, plantId);
    }
    return result;
  }

  toSnapshot(year: number, month: number, plantId: PlantId = null): ModelSnapshot {
    const values = this.getAllValues(year, month, plantId);
    const drivers: ModelSnapshot['drivers'] = {};

    for (const [name, value] of Object.entries(values)) {
      const driver = this.registry.get(name);
      drivers[name] = {
        value: value.toNumber(),
        driverType: driver.driverType,
        category: driver.category,
        unit: driver.unit,
      };
    }

    return { year, month, plantId, drivers };
  }

  /** Same driver definitions, empty values */
  copy(): FuelModel {
    return new FuelModel({ registry: this.registry.clone() });
  }
}
