import type { MacroAmounts, MacroEntry } from './macroEntry';

export type Ratio =
  | { kind: 'finite'; value: number }
  | { kind: 'undefined' } // no protein and no energy: an empty entry
  | { kind: 'infinite' }; // protein with zero energy

export interface DerivedValues {
  netCarbGrams: number;
  energyGrams: number;
  ratio: Ratio;
}

const UNDEFINED_RATIO: Ratio = Object.freeze({ kind: 'undefined' });
const INFINITE_RATIO: Ratio = Object.freeze({ kind: 'infinite' });

export function netCarbs(totalCarbGrams: number, fiberGrams: number): number {
  // Labels sometimes round fiber above total carbs; clamp instead of rejecting.
  return Math.max(0, totalCarbGrams - fiberGrams);
}

export function proteinEnergyRatio(proteinGrams: number, energyGrams: number): Ratio {
  if (!Number.isFinite(proteinGrams) || !Number.isFinite(energyGrams)) {
    throw new RangeError(`Cannot compare ${proteinGrams} g protein with ${energyGrams} g energy`);
  }
  if (energyGrams === 0) {
    return proteinGrams === 0 ? UNDEFINED_RATIO : INFINITE_RATIO;
  }
  const value = proteinGrams / energyGrams;
  // Energy so small next to protein that the quotient overflows.
  if (value === Infinity) {
    return INFINITE_RATIO;
  }
  return Object.freeze({ kind: 'finite', value });
}

/**
 * Derive net carbs, energy and the P:E ratio from raw gram amounts. No rounding.
 * Throws RangeError when the amounts are too large for energy to stay finite.
 */
export function deriveFromAmounts(amounts: MacroAmounts): DerivedValues {
  const netCarbGrams = netCarbs(amounts.totalCarbGrams, amounts.fiberGrams);
  const energyGrams = amounts.fatGrams + netCarbGrams;

  return Object.freeze({
    netCarbGrams,
    energyGrams,
    ratio: proteinEnergyRatio(amounts.proteinGrams, energyGrams),
  });
}

/**
 * Gram amounts an entry contributes once its servings multiplier is applied.
 */
export function scaledAmounts(entry: MacroEntry): MacroAmounts {
  return {
    proteinGrams: entry.proteinGrams * entry.servings,
    fatGrams: entry.fatGrams * entry.servings,
    totalCarbGrams: entry.totalCarbGrams * entry.servings,
    fiberGrams: entry.fiberGrams * entry.servings,
  };
}

export function derive(entry: MacroEntry): DerivedValues {
  return deriveFromAmounts(scaledAmounts(entry));
}
