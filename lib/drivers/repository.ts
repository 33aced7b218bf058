import type { Decimal } from '@/lib/math';
import type { Driver, PlantId } from './types';

/**
 * Persistence contract of the scenario driver bridge.
 *
 * Periods are `YYYYMM` (monthly) or `YYYY` (annual). Implementations:
 * DrizzleScenarioDriverRepository (PostgreSQL) and the in-memory repository
 * used by the tests.
 */

export interface DriverDefinitionRecord {
  id: number;
  name: string;
}

export interface DriverValueKey {
  scenarioId: number;
  driverId: number;
  plantId: PlantId;
  period: string;
}

export interface DriverValueRecord extends DriverValueKey {
  id: number;
  value: Decimal;
  updatedBy: string | null;
  updatedAt: Date;
}

/** A stored value joined with its driver's name */
export interface ScenarioDriverValueRow {
  driverName: string;
  plantId: PlantId;
  period: string;
  value: Decimal;
}

export type DriverValueChangeType = 'create' | 'update';

export interface DriverValueHistoryInput extends DriverValueKey {
  driverValueId: number;
  oldValue: Decimal | null;
  newValue: Decimal;
  changeType: DriverValueChangeType;
  changedBy: string | null;
}

export interface ScenarioValueQuery {
  scenarioId: number;
  year: number;
  /** When set: this plant's rows plus system-wide rows */
  plantId?: number | null;
}

export interface ScenarioDriverRepository {
  listDriverDefinitions(): Promise<DriverDefinitionRecord[]>;
  createDriverDefinition(driver: Driver): Promise<DriverDefinitionRecord>;

  findScenarioValues(query: ScenarioValueQuery): Promise<ScenarioDriverValueRow[]>;
  findDriverValue(key: DriverValueKey): Promise<DriverValueRecord | null>;
  createDriverValue(key: DriverValueKey, value: Decimal, updatedBy: string | null): Promise<DriverValueRecord>;
  updateDriverValue(id: number, value: Decimal, updatedBy: string | null): Promise<void>;
  recordHistory(entry: DriverValueHistoryInput): Promise<void>;

  transaction<T>(work: (repo: ScenarioDriverRepository) => Promise<T>): Promise<T>;
}
