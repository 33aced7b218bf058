/**
 * Scenario-based driver management
 *
 * Loads and saves complete driver value sets to/from scenarios, copies them
 * between scenarios and compares two scenarios' values. Every save records
 * an audit trail (create/update); nothing is physically deleted here.
 */

import { createDefaultFuelModel } from './default-drivers';
import type { FuelModel } from './fuel-model';
import { formatPeriod, parsePeriod } from './period';
import type { DriverDefinitionRecord, ScenarioDriverRepository } from './repository';
import {
  applyDriverSet,
  compareDriverSets,
  driverSetFromRows,
  type DriverSetComparison,
  type ScenarioDriverSet,
} from './scenario-driver-set';
import type { Driver, DriverLogger } from './types';

export interface ScenarioDriverOptions {
  logger?: DriverLogger;
  /** Builds the model values are loaded into; defaults to the default driver set */
  createModel?: () => FuelModel;
}

// Scale of the numeric value columns
export const STORED_DECIMAL_PLACES = 6;

const modelFactory = (options: ScenarioDriverOptions) =>
  options.createModel ?? (() => createDefaultFuelModel({ logger: options.logger }));

/**
 * Ensure a definition row exists for every driver. Returns name → row.
 */
export async function ensureDriverDefinitions(
  repo: ScenarioDriverRepository,
  drivers: readonly Driver[]
): Promise<Map<string, DriverDefinitionRecord>> {
  const existing = new Map((await repo.listDriverDefinitions()).map((d) => [d.name, d]));

  for (const driver of drivers) {
    if (!existing.has(driver.name)) {
      existing.set(driver.name, await repo.createDriverDefinition(driver));
    }
  }

  return existing;
}

/**
 * Fresh model populated with a scenario's values for one year.
 * With `plantId`, only that plant's rows and the system-wide rows are loaded.
 */
export async function loadDriverValuesFromScenario(
  repo: ScenarioDriverRepository,
  scenarioId: number,
  year: number,
  plantId: number | null = null,
  options: ScenarioDriverOptions = {}
): Promise<FuelModel> {
  const logger = options.logger ?? console;
  const model = modelFactory(options)();

  const rows = await repo.findScenarioValues({ scenarioId, year, plantId });

  for (const row of rows) {
    if (!model.registry.has(row.driverName)) {
      logger.warn(`[ScenarioDrivers] Skipping unknown driver: ${row.driverName}`);
      continue;
    }
    const period = parsePeriod(row.period);
    model.setValue(row.driverName, period.year, period.month, row.value, row.plantId);
  }

  return model;
}

/**
 * Upsert a model's stored values for `year` into a scenario.
 * Returns the number of values saved (unchanged values included).
 */
export async function saveDriverValuesToScenario(
  repo: ScenarioDriverRepository,
  model: FuelModel,
  scenarioId: number,
  year: number,
  updatedBy: string | null = null,
  options: Pick<ScenarioDriverOptions, 'logger'> = {}
): Promise<number> {
  const logger = options.logger ?? console;

  return repo.transaction(async (tx) => {
    const definitions = await ensureDriverDefinitions(tx, model.registry.definitions());
    let saved = 0;

    for (const driverName of model.values.storedDrivers()) {
      const definition = definitions.get(driverName);
      if (!definition) {
        logger.warn(`[ScenarioDrivers] Skipping unknown driver: ${driverName}`);
        continue;
      }

      for (const entry of model.values.entries(driverName)) {
        if (entry.year !== year) continue;

        const key = {
          scenarioId,
          driverId: definition.id,
          plantId: entry.plantId,
          period: formatPeriod(entry.year, entry.month),
        };
        const value = entry.value.toDecimalPlaces(STORED_DECIMAL_PLACES);
        const existing = await tx.findDriverValue(key);

        if (!existing) {
          const created = await tx.createDriverValue(key, value, updatedBy);
          await tx.recordHistory({
            ...key,
            driverValueId: created.id,
            oldValue: null,
            newValue: value,
            changeType: 'create',
            changedBy: updatedBy,
          });
        } else if (!existing.value.equals(value)) {
          const oldValue = existing.value;
          await tx.updateDriverValue(existing.id, value, updatedBy);
          await tx.recordHistory({
            ...key,
            driverValueId: existing.id,
            oldValue,
            newValue: value,
            changeType: 'update',
            changedBy: updatedBy,
          });
        }
        saved++;
      }
    }

    logger.log(`[ScenarioDrivers] Saved ${saved} values to scenario ${scenarioId} (${year})`);
    return saved;
  });
}

export interface CopyScenarioOptions extends ScenarioDriverOptions {
  /** Replace values the target already has (default false) */
  overwrite?: boolean;
  updatedBy?: string | null;
}

/**
 * Copy one year of driver values between scenarios. Without `overwrite`,
 * only values the target lacks (exact driver/plant/period) are copied.
 */
export async function copyScenarioDrivers(
  repo: ScenarioDriverRepository,
  sourceScenarioId: number,
  targetScenarioId: number,
  year: number,
  options: CopyScenarioOptions = {}
): Promise<number> {
  const { overwrite = false, updatedBy = null } = options;
  const source = await loadDriverValuesFromScenario(repo, sourceScenarioId, year, null, options);

  if (overwrite) {
    return saveDriverValuesToScenario(repo, source, targetScenarioId, year, updatedBy, options);
  }

  const target = await loadDriverValuesFromScenario(repo, targetScenarioId, year, null, options);
  for (const entry of source.values.entries()) {
    if (!target.values.has(entry.driverName, entry.year, entry.month, entry.plantId)) {
      target.setValue(entry.driverName, entry.year, entry.month, entry.value, entry.plantId);
    }
  }

  return saveDriverValuesToScenario(repo, target, targetScenarioId, year, updatedBy, options);
}

export async function exportScenarioDrivers(
  repo: ScenarioDriverRepository,
  scenarioId: number,
  year: number
): Promise<ScenarioDriverSet> {
  const rows = await repo.findScenarioValues({ scenarioId, year });
  return driverSetFromRows(scenarioId, year, rows);
}

/**
 * Import a driver set into a scenario; drivers the default model does not
 * know are skipped with a warning.
 */
export async function importScenarioDrivers(
  repo: ScenarioDriverRepository,
  scenarioId: number,
  driverSet: ScenarioDriverSet,
  updatedBy: string | null = null,
  options: ScenarioDriverOptions = {}
): Promise<number> {
  const model = modelFactory(options)();
  applyDriverSet(model, driverSet, options.logger ?? console);
  return saveDriverValuesToScenario(repo, model, scenarioId, driverSet.year, updatedBy, options);
}

export async function compareScenarioDrivers(
  repo: ScenarioDriverRepository,
  scenarioAId: number,
  scenarioBId: number,
  year: number
): Promise<DriverSetComparison> {
  const [setA, setB] = await Promise.all([
    exportScenarioDrivers(repo, scenarioAId, year),
    exportScenarioDrivers(repo, scenarioBId, year),
  ]);
  return compareDriverSets(setA, setB);
}
