import { deriveFromAmounts, scaledAmounts } from './derivation';
import type { DerivedValues } from './derivation';
import type { MacroAmounts, MacroEntry } from './macroEntry';

export type AggregateEntry = MacroAmounts;

export const EMPTY_AGGREGATE: Readonly<AggregateEntry> = Object.freeze({
  proteinGrams: 0,
  fatGrams: 0,
  totalCarbGrams: 0,
  fiberGrams: 0,
});

// Adding smallest first fixes the rounding, so every ordering of the entries sums alike.
function sumAscending(values: number[]): number {
  return values.sort((a, b) => a - b).reduce((total, value) => total + value, 0);
}

/**
 * Aggregate an array of macro entries into cumulative totals, servings applied.
 */
export function computeAggregate(entries: readonly MacroEntry[]): Readonly<AggregateEntry> {
  if (entries.length === 0) {
    return EMPTY_AGGREGATE;
  }
  const amounts = entries.map(scaledAmounts);
  return Object.freeze({
    proteinGrams: sumAscending(amounts.map((cur) => cur.proteinGrams)),
    fatGrams: sumAscending(amounts.map((cur) => cur.fatGrams)),
    totalCarbGrams: sumAscending(amounts.map((cur) => cur.totalCarbGrams)),
    fiberGrams: sumAscending(amounts.map((cur) => cur.fiberGrams)),
  });
}

// Sum first, then derive like any single entry.
export function deriveAggregate(entries: readonly MacroEntry[]): DerivedValues {
  return deriveFromAmounts(computeAggregate(entries));
}
