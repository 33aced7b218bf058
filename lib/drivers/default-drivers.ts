/**
 * Default driver set for the fuel cost forecast.
 *
 * Definitions (units, defaults, bounds, dependencies) live in
 * default-drivers.json; the formulas of the calculated drivers live here and
 * are keyed by driver name.
 *
 * Categories: coal prices, transportation, heat rate, generation, inventory,
 * escalation.
 */

import { Decimal, FinMath, HUNDRED, ZERO } from '@/lib/math';
import definitions from './default-drivers.json';
import { createCalculation, type Formula } from './calculation';
import { defineDriver } from './driver';
import { UnknownDriverError } from './errors';
import { FuelModel, type FuelModelOptions } from './fuel-model';
import { daysInMonth, hoursInMonth } from './period';
import {
  DRIVER_CATEGORIES,
  DRIVER_TYPES,
  type Driver,
  type DriverCategory,
  type DriverType,
} from './types';

const LBS_PER_TON = new Decimal(2000);
const BTU_PER_MMBTU = new Decimal(1_000_000);

// ============================================================================
// Coal price formulas
// ============================================================================

const coalPriceBlended: Formula = (v) => {
  const eastern = FinMath.fromPercent(v.coal_blend_eastern_pct);
  const ilb = FinMath.fromPercent(v.coal_blend_ilb_pct);
  const prb = FinMath.fromPercent(v.coal_blend_prb_pct);

  // Normalised so partial blends still weight correctly
  const total = eastern.plus(ilb).plus(prb);
  if (total.lte(0)) return v.coal_price_eastern;

  return v.coal_price_eastern
    .times(eastern)
    .plus(v.coal_price_ilb.times(ilb))
    .plus(v.coal_price_prb.times(prb))
    .div(total);
};

// $/ton ÷ (BTU/lb × 2000 lb/ton ÷ 1,000,000) = $/MMBtu
const perMmbtu =
  (priceDriver: string, btuDriver: string): Formula =>
  (v) => {
    const mmbtuPerTon = v[btuDriver].times(LBS_PER_TON).div(BTU_PER_MMBTU);
    if (mmbtuPerTon.lte(0)) return ZERO;
    return v[priceDriver].div(mmbtuPerTon);
  };

// ============================================================================
// Transportation / heat rate
// ============================================================================

const deliveredCost: Formula = (v) => v.coal_price_blended.plus(v.barge_rate_ohio);

const heatRateEffective: Formula = (v) =>
  v.heat_rate_baseline
    .plus(v.heat_rate_suf_correction)
    .plus(FinMath.fromPercent(v.coal_blend_prb_pct).times(v.heat_rate_prb_penalty));

// ============================================================================
// Generation
// ============================================================================

const generationMwh: Formula = (v, { year, month }) =>
  v.capacity_mw.times(hoursInMonth(year, month)).times(FinMath.fromPercent(v.use_factor));

const netDeliveredMwh: Formula = (v, { year, month }) => {
  const afterFgd = Decimal.sub(1, FinMath.fromPercent(v.fgd_aux_pct));
  const afterGsu = Decimal.sub(1, FinMath.fromPercent(v.gsu_loss_pct));
  const reserveMwh = v.reserve_mw.times(hoursInMonth(year, month));

  const net = v.generation_mwh.times(afterFgd).times(afterGsu).minus(reserveMwh);
  return FinMath.clampMin(net, 0);
};

// ============================================================================
// Inventory
// ============================================================================

const inventoryEndingTons: Formula = (v) =>
  v.inventory_beginning_tons.plus(v.coal_deliveries_tons).minus(v.coal_consumption_tons);

const uncommittedTonsNeeded: Formula = (v, { year, month }) => {
  const dailyBurn = v.coal_consumption_tons.div(daysInMonth(year, month));
  const target = v.inventory_target_days.times(dailyBurn);
  const expected = v.inventory_beginning_tons
    .plus(v.contracted_deliveries_tons)
    .minus(v.coal_consumption_tons);

  return FinMath.clampMin(target.minus(expected), 0);
};

export const DEFAULT_FORMULAS: Readonly<Record<string, Formula>> = {
  coal_price_blended: coalPriceBlended,
  coal_mmbtu_eastern: perMmbtu('coal_price_eastern', 'coal_btu_eastern'),
  coal_mmbtu_ilb: perMmbtu('coal_price_ilb', 'coal_btu_ilb'),
  delivered_cost: deliveredCost,
  heat_rate_effective: heatRateEffective,
  generation_mwh: generationMwh,
  net_delivered_mwh: netDeliveredMwh,
  inventory_ending_tons: inventoryEndingTons,
  uncommitted_tons_needed: uncommittedTonsNeeded,
};

// ============================================================================
// Definitions
// ============================================================================

const driverTypes: ReadonlySet<string> = new Set(DRIVER_TYPES);
const driverCategories: ReadonlySet<string> = new Set(DRIVER_CATEGORIES);

function isDriverType(value: string): value is DriverType {
  return driverTypes.has(value);
}

function isDriverCategory(value: string): value is DriverCategory {
  return driverCategories.has(value);
}

type DefinitionRow = (typeof definitions)[number];

function buildDriver(row: DefinitionRow): Driver {
  if (!isDriverType(row.driverType)) {
    throw new Error(`[DefaultDrivers] ${row.name}: unknown driver type ${row.driverType}`);
  }
  if (!isDriverCategory(row.category)) {
    throw new Error(`[DefaultDrivers] ${row.name}: unknown category ${row.category}`);
  }

  const formula = DEFAULT_FORMULAS[row.name];
  if (row.driverType === 'CALCULATED' && !formula) {
    throw new Error(`[DefaultDrivers] ${row.name}: no formula for calculated driver`);
  }

  return defineDriver({
    name: row.name,
    driverType: row.driverType,
    category: row.category,
    unit: row.unit,
    description: row.description,
    defaultValue: row.defaultValue,
    minValue: row.minValue,
    maxValue: row.maxValue,
    step: row.step,
    displayOrder: row.displayOrder,
    isPlantSpecific: row.isPlantSpecific,
    dependsOn: row.dependsOn,
    calculation: formula ? createCalculation(row.dependsOn, formula) : null,
  });
}

export const ALL_DRIVERS: readonly Driver[] = Object.freeze(definitions.map(buildDriver));

export function createDefaultFuelModel(options: FuelModelOptions = {}): FuelModel {
  const model = new FuelModel(options);
  model.registerDrivers(ALL_DRIVERS);
  return model;
}

export function getDefaultDriver(name: string): Driver {
  const driver = ALL_DRIVERS.find((d) => d.name === name);
  if (!driver) throw new UnknownDriverError(name);
  return driver;
}

export function getDefaultDriversByCategory(category: DriverCategory): Driver[] {
  return ALL_DRIVERS.filter((d) => d.category === category);
}
