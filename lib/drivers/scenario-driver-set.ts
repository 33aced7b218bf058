// lib/drivers/scenario-driver-set.ts
// Transport format for a scenario's driver values + comparison

import { computeHash, canonicalize } from '@/lib/crypto';
import { Decimal } from '@/lib/math';
import { InvalidDriverSetError } from './errors';
import type { FuelModel } from './fuel-model';
import { assertMonth, assertYear, parsePeriod } from './period';
import type { DriverLogger, PlantId } from './types';

// ============================================================================
// Types
// ============================================================================

export interface PeriodValues {
  annual: number | null;
  monthly: Record<number, number>;
}

/** One driver on the wire; keys are the exchange format's, not camelCase */
export interface DriverValueSet extends PeriodValues {
  plant_specific: Record<number, PeriodValues>;
}

export interface ScenarioDriverSet {
  scenarioId: number;
  year: number;
  drivers: Record<string, DriverValueSet>;
}

export interface ScenarioDriverSetJson extends ScenarioDriverSet {
  exportedAt: string;
  checksum: string;
}

export interface DriverSetEntry {
  driverName: string;
  plantId: PlantId;
  month: number | null;
  value: Decimal.Value;
}

export interface DriverSetComparison {
  scenarioAId: number;
  scenarioBId: number;
  year: number;
  totalDrivers: number;
  sameCount: number;
  differentCount: number;
  onlyInACount: number;
  onlyInBCount: number;
  same: string[];
  differences: { driver: string; scenarioA: DriverValueSet; scenarioB: DriverValueSet }[];
  onlyInA: string[];
  onlyInB: string[];
}

// ============================================================================
// Building
// ============================================================================

export function emptyDriverValueSet(): DriverValueSet {
  return { annual: null, monthly: {}, plant_specific: {} };
}

export function createDriverSet(
  scenarioId: number,
  year: number,
  entries: Iterable<DriverSetEntry>
): ScenarioDriverSet {
  const drivers: Record<string, DriverValueSet> = {};

  for (const entry of entries) {
    const set = (drivers[entry.driverName] ??= emptyDriverValueSet());
    const value = new Decimal(entry.value).toNumber();

    let target: PeriodValues = set;
    if (entry.plantId !== null) {
      target = set.plant_specific[entry.plantId] ??= { annual: null, monthly: {} };
    }

    if (entry.month === null) target.annual = value;
    else target.monthly[entry.month] = value;
  }

  return { scenarioId, year, drivers };
}

/** Stored (explicit) values of one year, in the transport format */
export function exportModelDrivers(model: FuelModel, year: number, scenarioId = 0): ScenarioDriverSet {
  const entries = model.values.entries().filter((e) => e.year === year);
  return createDriverSet(scenarioId, year, entries);
}

/** Persisted rows (period string `YYYY` or `YYYYMM`) in the transport format */
export function driverSetFromRows(
  scenarioId: number,
  year: number,
  rows: Iterable<{ driverName: string; plantId: PlantId; period: string; value: Decimal.Value }>
): ScenarioDriverSet {
  const entries: DriverSetEntry[] = [];
  for (const row of rows) {
    const period = parsePeriod(row.period);
    if (period.year !== year) continue;
    entries.push({ driverName: row.driverName, plantId: row.plantId, month: period.month, value: row.value });
  }
  return createDriverSet(scenarioId, year, entries);
}

export interface ApplyResult {
  applied: number;
  skippedDrivers: string[];
}

/**
 * Write a driver set into a model. Drivers the model does not know are
 * skipped with a warning; bad periods still throw.
 */
export function applyDriverSet(
  model: FuelModel,
  driverSet: ScenarioDriverSet,
  logger: DriverLogger = console
): ApplyResult {
  const { year } = driverSet;
  const result: ApplyResult = { applied: 0, skippedDrivers: [] };

  const applyPeriods = (name: string, values: PeriodValues, plantId: PlantId) => {
    if (values.annual !== null) {
      model.setValue(name, year, null, values.annual, plantId);
      result.applied++;
    }
    for (const [month, value] of Object.entries(values.monthly)) {
      model.setValue(name, year, Number(month), value, plantId);
      result.applied++;
    }
  };

  for (const [name, values] of Object.entries(driverSet.drivers)) {
    if (!model.registry.has(name)) {
      logger.warn(`[ScenarioDrivers] Unknown driver in import: ${name}`);
      result.skippedDrivers.push(name);
      continue;
    }

    applyPeriods(name, values, null);
    for (const [plantId, plantValues] of Object.entries(values.plant_specific)) {
      applyPeriods(name, plantValues, Number(plantId));
    }
  }

  return result;
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeDriverSet(driverSet: ScenarioDriverSet, exportedAt = new Date()): ScenarioDriverSetJson {
  return {
    scenarioId: driverSet.scenarioId,
    year: driverSet.year,
    drivers: driverSet.drivers,
    exportedAt: exportedAt.toISOString(),
    checksum: computeHash(driverSet.drivers),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidDriverSetError(`${where}: expected a finite number`);
  }
  return value;
}

const PERIOD_KEYS = ['annual', 'monthly'] as const;
const DRIVER_KEYS = [...PERIOD_KEYS, 'plant_specific'] as const;

function rejectUnknownKeys(value: Record<string, unknown>, allowed: readonly string[], where: string): void {
  for (const key of Object.keys(value)) {
    if (!allowed.includes(key)) {
      throw new InvalidDriverSetError(`${where}: unknown field "${key}" (expected ${allowed.join(', ')})`);
    }
  }
}

function readPeriodValues(value: Record<string, unknown>, where: string): PeriodValues {
  const annual = value.annual == null ? null : readNumber(value.annual, `${where}.annual`);
  const monthly: Record<number, number> = {};

  if (value.monthly != null) {
    if (!isRecord(value.monthly)) throw new InvalidDriverSetError(`${where}.monthly: expected an object`);
    for (const [key, raw] of Object.entries(value.monthly)) {
      const month = Number(key);
      try {
        assertMonth(month);
      } catch {
        throw new InvalidDriverSetError(`${where}.monthly: invalid month "${key}"`);
      }
      monthly[month] = readNumber(raw, `${where}.monthly.${key}`);
    }
  }

  return { annual, monthly };
}

function readDriverValues(raw: unknown, where: string): DriverValueSet {
  if (!isRecord(raw)) throw new InvalidDriverSetError(`${where}: expected an object`);
  rejectUnknownKeys(raw, DRIVER_KEYS, where);

  const plants: Record<number, PeriodValues> = {};
  if (raw.plant_specific != null) {
    if (!isRecord(raw.plant_specific)) {
      throw new InvalidDriverSetError(`${where}.plant_specific: expected an object`);
    }
    for (const [plantKey, plantRaw] of Object.entries(raw.plant_specific)) {
      const plantId = Number(plantKey);
      if (plantKey.trim() === '' || !Number.isInteger(plantId)) {
        throw new InvalidDriverSetError(`${where}.plant_specific: invalid plant id "${plantKey}"`);
      }
      const plantWhere = `${where}.plant_specific.${plantKey}`;
      if (!isRecord(plantRaw)) throw new InvalidDriverSetError(`${plantWhere}: expected an object`);
      rejectUnknownKeys(plantRaw, PERIOD_KEYS, plantWhere);
      plants[plantId] = readPeriodValues(plantRaw, plantWhere);
    }
  }

  return { ...readPeriodValues(raw, where), plant_specific: plants };
}

/**
 * Validate an untrusted driver set (request body, file). `scenarioId` is
 * optional on input and defaults to 0. A `checksum`, when present, must match
 * the `drivers` it came with.
 */
export function parseScenarioDriverSet(data: unknown): ScenarioDriverSet {
  if (!isRecord(data)) throw new InvalidDriverSetError('Driver set must be an object');

  const year = readNumber(data.year, 'year');
  try {
    assertYear(year);
  } catch {
    throw new InvalidDriverSetError(`year: invalid year ${year}`);
  }

  const scenarioId = data.scenarioId == null ? 0 : readNumber(data.scenarioId, 'scenarioId');
  if (!isRecord(data.drivers)) throw new InvalidDriverSetError('drivers: expected an object');

  if (typeof data.checksum === 'string' && data.checksum !== computeHash(data.drivers)) {
    throw new InvalidDriverSetError('checksum: does not match drivers');
  }

  const drivers: Record<string, DriverValueSet> = {};
  for (const [name, raw] of Object.entries(data.drivers)) {
    drivers[name] = readDriverValues(raw, `drivers.${name}`);
  }

  return { scenarioId, year, drivers };
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDriverSets(a: ScenarioDriverSet, b: ScenarioDriverSet): DriverSetComparison {
  const names = [...new Set([...Object.keys(a.drivers), ...Object.keys(b.drivers)])].sort();

  const same: string[] = [];
  const differences: DriverSetComparison['differences'] = [];
  const onlyInA: string[] = [];
  const onlyInB: string[] = [];

  for (const name of names) {
    const valueA = a.drivers[name];
    const valueB = b.drivers[name];

    if (valueA && !valueB) onlyInA.push(name);
    else if (valueB && !valueA) onlyInB.push(name);
    else if (canonicalize(valueA) === canonicalize(valueB)) same.push(name);
    else differences.push({ driver: name, scenarioA: valueA, scenarioB: valueB });
  }

  return {
    scenarioAId: a.scenarioId,
    scenarioBId: b.scenarioId,
    year: a.year,
    totalDrivers: names.length,
    sameCount: same.length,
    differentCount: differences.length,
    onlyInACount: onlyInA.length,
    onlyInBCount: onlyInB.length,
    same,
    differences,
    onlyInA,
    onlyInB,
  };
}
