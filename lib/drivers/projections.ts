// lib/drivers/projections.ts
// Multi-year escalation of price drivers from a base year

import { Decimal, FinMath, toDecimal, ZERO } from '@/lib/math';
import type { FuelModel } from './fuel-model';
import { assertYear } from './period';
import type { PlantId } from './types';

const COAL_PRICE_DRIVERS = ['coal_price_eastern', 'coal_price_ilb', 'coal_price_prb'];
const TRANSPORT_RATE_DRIVERS = ['barge_rate_ohio', 'barge_rate_upper_ohio', 'rail_rate_prb'];

// Escalation rate driver → the drivers it escalates
export const ESCALATION_MAPPINGS: Readonly<Record<string, readonly string[]>> = {
  escalation_coal_annual: COAL_PRICE_DRIVERS,
  escalation_transport_annual: TRANSPORT_RATE_DRIVERS,
  // No reagent price drivers yet
  escalation_reagent_annual: [],
};

// Inputs copied to the target year as they are
export const CARRIED_FORWARD_DRIVERS: readonly string[] = [
  'heat_rate_baseline',
  'heat_rate_suf_correction',
  'heat_rate_prb_penalty',
  'use_factor',
  'capacity_mw',
  'reserve_mw',
  'fgd_aux_pct',
  'gsu_loss_pct',
  'inventory_target_days',
  'coal_blend_eastern_pct',
  'coal_blend_ilb_pct',
  'coal_blend_prb_pct',
  'coal_btu_eastern',
  'coal_btu_ilb',
];

// Drivers shown by the escalation preview
export const PREVIEW_DRIVERS: readonly string[] = [...COAL_PRICE_DRIVERS, ...TRANSPORT_RATE_DRIVERS];

/**
 * Compound annual escalation: value × (1 + rate%/100)^years, rounded to cents
 * (half-even). Returned unchanged when the target is not after the base year.
 */
export function applyEscalation(
  baseValue: Decimal.Value,
  baseYear: number,
  targetYear: number,
  annualRatePct: Decimal.Value
): Decimal {
  const base = toDecimal(baseValue);
  const years = targetYear - baseYear;
  if (years <= 0) return base;

  const factor = Decimal.add(1, FinMath.fromPercent(annualRatePct)).pow(years);
  return base.times(factor).toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN);
}

/**
 * Model holding annual values for `targetYear`: escalated prices, carried
 * forward operating inputs and the escalation rates themselves. Base values
 * are read for January of the base year. Drivers the base model does not
 * register are left out.
 */
export function createEscalatedModel(
  baseModel: FuelModel,
  baseYear: number,
  targetYear: number,
  plantId: PlantId = null
): FuelModel {
  assertYear(baseYear);
  assertYear(targetYear);
  if (targetYear <= baseYear) return baseModel;

  const { registry } = baseModel;
  const escalated = baseModel.copy();
  const baseValue = (name: string) => baseModel.getValue(name, baseYear, 1, plantId);

  for (const [rateDriver, targets] of Object.entries(ESCALATION_MAPPINGS)) {
    const rate = registry.has(rateDriver) ? baseValue(rateDriver) : ZERO;

    for (const name of targets) {
      if (!registry.has(name)) continue;
      const value = applyEscalation(baseValue(name), baseYear, targetYear, rate);
      escalated.setValue(name, targetYear, null, value, plantId);
    }

    if (registry.has(rateDriver)) {
      escalated.setValue(rateDriver, targetYear, null, rate, plantId);
    }
  }

  for (const name of CARRIED_FORWARD_DRIVERS) {
    if (registry.has(name)) {
      escalated.setValue(name, targetYear, null, baseValue(name), plantId);
    }
  }

  return escalated;
}

export interface EscalationPreview {
  baseYear: number;
  targetYear: number;
  yearsEscalated: number;
  drivers: Record<string, { baseValue: number; escalatedValue: number; changePct: number }>;
}

/** Base vs escalated values of the price drivers */
export function previewEscalation(
  baseModel: FuelModel,
  baseYear: number,
  targetYear: number,
  plantId: PlantId = null
): EscalationPreview {
  const escalated = createEscalatedModel(baseModel, baseYear, targetYear, plantId);
  const drivers: EscalationPreview['drivers'] = {};

  for (const name of PREVIEW_DRIVERS) {
    if (!baseModel.registry.has(name)) continue;

    const base = baseModel.getValue(name, baseYear, 1, plantId);
    const value = escalated.getValue(name, targetYear, 1, plantId);
    const changePct = base.gt(0) ? value.minus(base).div(base).times(100).toDecimalPlaces(2) : ZERO;

    drivers[name] = {
      baseValue: base.toNumber(),
      escalatedValue: value.toNumber(),
      changePct: changePct.toNumber(),
    };
  }

  return { baseYear, targetYear, yearsEscalated: targetYear - baseYear, drivers };
}
