// lib/drivers/types.ts
// Driver-based forecasting engine - Type Definitions

import type { Decimal } from '@/lib/math';

// ============================================================================
// Driver classification
// ============================================================================

export const DRIVER_TYPES = [
  'INPUT', // User-provided input value
  'PRICE_INDEX', // Market price index (coal, gas, etc.)
  'RATE', // Rate per unit ($/ton, BTU/kWh)
  'VOLUME', // Quantity (tons, MWh, hours)
  'PERCENTAGE', // Percentage value (0-100)
  'CALCULATED', // Derived from other drivers
  'TOGGLE', // Boolean on/off flag
] as const;

export type DriverType = (typeof DRIVER_TYPES)[number];

export const DRIVER_CATEGORIES = [
  'coal_price',
  'transportation',
  'heat_rate',
  'generation',
  'inventory',
  'escalation',
  'consumables',
  'byproducts',
  'other',
] as const;

export type DriverCategory = (typeof DRIVER_CATEGORIES)[number];

/** null = system-wide */
export type PlantId = number | null;

// ============================================================================
// Calculation strategy
// ============================================================================

/**
 * What a calculation can read from. FuelModel implements it; formulas only
 * ever see this narrow view.
 */
export interface DriverResolver {
  getValue(driverName: string, year: number, month: number, plantId?: PlantId): Decimal;
}

export interface Calculation {
  /** Names the formula resolves, in the order it reads them */
  readonly dependencies: readonly string[];
  evaluate(model: DriverResolver, year: number, month: number, plantId: PlantId): Decimal;
}

// ============================================================================
// Driver definition
// ============================================================================

export interface Driver {
  readonly name: string;
  readonly driverType: DriverType;
  readonly category: DriverCategory;
  readonly unit: string;
  readonly description: string;
  readonly defaultValue: Decimal;

  // Display/UI hints (not enforced)
  readonly minValue: Decimal | null;
  readonly maxValue: Decimal | null;
  readonly step: Decimal;
  readonly displayOrder: number;
  readonly isPlantSpecific: boolean;

  // For calculated drivers
  readonly dependsOn: readonly string[];
  readonly calculation: Calculation | null;
}

export interface DriverInput {
  name: string;
  driverType: DriverType;
  unit?: string;
  category?: DriverCategory;
  description?: string;
  defaultValue?: Decimal.Value;
  minValue?: Decimal.Value | null;
  maxValue?: Decimal.Value | null;
  step?: Decimal.Value;
  displayOrder?: number;
  isPlantSpecific?: boolean;
  dependsOn?: readonly string[];
  calculation?: Calculation | null;
}

// ============================================================================
// Configuration diagnostics
// ============================================================================

export type DriverIssueCode =
  | 'CALCULATED_WITHOUT_FORMULA'
  | 'CALCULATED_WITHOUT_DEPENDENCIES'
  | 'DEPENDENCIES_ON_NON_CALCULATED'
  | 'OVERWRITTEN'
  | 'UNKNOWN_DEPENDENCY';

export interface DriverIssue {
  code: DriverIssueCode;
  driver: string;
  message: string;
  dependency?: string;
}

export type DriverLogger = Pick<Console, 'log' | 'warn'>;

// ============================================================================
// Stored values
// ============================================================================

export interface StoredDriverValue {
  driverName: string;
  plantId: PlantId;
  year: number;
  /** null = annual */
  month: number | null;
  value: Decimal;
}

export interface ModelSnapshot {
  year: number;
  month: number;
  plantId: PlantId;
  drivers: Record<
    string,
    {
      value: number;
      driverType: DriverType;
      category: DriverCategory;
      unit: string;
    }
  >;
}
