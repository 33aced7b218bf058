import { toDecimal } from '@/lib/math';
import type { Driver, DriverInput, DriverIssue } from './types';

/**
 * Build an immutable driver definition, filling in defaults.
 *
 * A calculated driver without an explicit `dependsOn` takes its
 * dependencies from the calculation.
 */
export function defineDriver(input: DriverInput): Driver {
  const calculation = input.calculation ?? null;
  const dependsOn = input.dependsOn ?? calculation?.dependencies ?? [];

  return Object.freeze({
    name: input.name,
    driverType: input.driverType,
    category: input.category ?? 'other',
    unit: input.unit ?? '',
    description: input.description ?? '',
    defaultValue: toDecimal(input.defaultValue ?? 0),
    minValue: input.minValue == null ? null : toDecimal(input.minValue),
    maxValue: input.maxValue == null ? null : toDecimal(input.maxValue),
    step: toDecimal(input.step ?? 1),
    displayOrder: input.displayOrder ?? 0,
    isPlantSpecific: input.isPlantSpecific ?? false,
    dependsOn: Object.freeze([...dependsOn]),
    calculation,
  });
}

/**
 * Configuration problems of a single definition. These never block
 * registration.
 */
export function checkDriver(driver: Driver): DriverIssue[] {
  const issues: DriverIssue[] = [];

  if (driver.driverType === 'CALCULATED') {
    if (!driver.calculation) {
      issues.push({
        code: 'CALCULATED_WITHOUT_FORMULA',
        driver: driver.name,
        message: `Driver '${driver.name}' is CALCULATED but has no calculation`,
      });
    }
    if (driver.dependsOn.length === 0) {
      issues.push({
        code: 'CALCULATED_WITHOUT_DEPENDENCIES',
        driver: driver.name,
        message: `Driver '${driver.name}' is CALCULATED but declares no dependencies`,
      });
    }
  } else if (driver.dependsOn.length > 0) {
    issues.push({
      code: 'DEPENDENCIES_ON_NON_CALCULATED',
      driver: driver.name,
      message: `Driver '${driver.name}' has dependencies but is not CALCULATED type`,
    });
  }

  return issues;
}

export function isCalculated(driver: Driver): boolean {
  return driver.driverType === 'CALCULATED';
}

export interface DriverSummary {
  name: string;
  driverType: Driver['driverType'];
  category: Driver['category'];
  unit: string;
  description: string;
  defaultValue: number;
  minValue: number | null;
  maxValue: number | null;
  step: number;
  displayOrder: number;
  isPlantSpecific: boolean;
  dependsOn: string[];
}

/** JSON-safe view of a definition (the calculation itself is not transportable). */
export function summarizeDriver(driver: Driver): DriverSummary {
  return {
    name: driver.name,
    driverType: driver.driverType,
    category: driver.category,
    unit: driver.unit,
    description: driver.description,
    defaultValue: driver.defaultValue.toNumber(),
    minValue: driver.minValue ? driver.minValue.toNumber() : null,
    maxValue: driver.maxValue ? driver.maxValue.toNumber() : null,
    step: driver.step.toNumber(),
    displayOrder: driver.displayOrder,
    isPlantSpecific: driver.isPlantSpecific,
    dependsOn: [...driver.dependsOn],
  };
}
