import type { Decimal } from '@/lib/math';
import { defineDriver } from './driver';
import type { Calculation, Driver, DriverInput, PlantId } from './types';

export interface CalculationContext {
  year: number;
  month: number;
  plantId: PlantId;
}

export type Formula = (values: Record<string, Decimal>, period: CalculationContext) => Decimal;

/**
 * Wrap a formula over named dependencies as a Calculation.
 *
 * Each dependency is resolved through the model for the same year, month and
 * plant before the formula runs.
 */
export function createCalculation(dependencies: readonly string[], formula: Formula): Calculation {
  const deps = Object.freeze([...dependencies]);
  return {
    dependencies: deps,
    evaluate(model, year, month, plantId) {
      const values: Record<string, Decimal> = {};
      for (const dep of deps) {
        values[dep] = model.getValue(dep, year, month, plantId);
      }
      return formula(values, { year, month, plantId });
    },
  };
}

export type CalculatedDriverInput = Omit<DriverInput, 'driverType' | 'calculation' | 'dependsOn'> & {
  dependsOn: readonly string[];
  formula: Formula;
};

export function calculatedDriver(input: CalculatedDriverInput): Driver {
  const { formula, dependsOn, ...rest } = input;
  return defineDriver({
    ...rest,
    driverType: 'CALCULATED',
    dependsOn,
    calculation: createCalculation(dependsOn, formula),
  });
}
