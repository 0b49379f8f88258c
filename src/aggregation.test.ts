import { computeAggregate, deriveAggregate } from './utils/aggregation';
import { createMacroEntry } from './utils/macroEntry';

describe('computeAggregate', () => {
  it('returns zeros for empty list', () => {
    expect(computeAggregate([])).toEqual({
      proteinGrams: 0,
      fatGrams: 0,
      totalCarbGrams: 0,
      fiberGrams: 0,
    });
  });

  it('sums macros across entries', () => {
    const entries = [
      createMacroEntry('a', { proteinGrams: 10, fatGrams: 5, totalCarbGrams: 5, fiberGrams: 0 }),
      createMacroEntry('b', { proteinGrams: 20, fatGrams: 5, totalCarbGrams: 5, fiberGrams: 5 }),
    ];

    expect(computeAggregate(entries)).toEqual({
      proteinGrams: 30,
      fatGrams: 10,
      totalCarbGrams: 10,
      fiberGrams: 5,
    });
  });

  it('applies each entry\'s servings before summing', () => {
    const entries = [
      createMacroEntry('a', { proteinGrams: 10, fatGrams: 2, servings: 3 }),
      createMacroEntry('b', { proteinGrams: 4, totalCarbGrams: 6, servings: 0.5 }),
    ];

    expect(computeAggregate(entries)).toEqual({
      proteinGrams: 32,
      fatGrams: 6,
      totalCarbGrams: 3,
      fiberGrams: 0,
    });
  });

  it('gives the same totals for every ordering of the entries', () => {
    const a = createMacroEntry('a', { proteinGrams: 12, fatGrams: 3, totalCarbGrams: 7, fiberGrams: 2 });
    const b = createMacroEntry('b', { proteinGrams: 5, fatGrams: 9, totalCarbGrams: 1, fiberGrams: 0 });
    const c = createMacroEntry('c', { proteinGrams: 0, fatGrams: 4, totalCarbGrams: 20, fiberGrams: 6 });
    const expected = computeAggregate([a, b, c]);

    const orderings = [[a, c, b], [b, a, c], [b, c, a], [c, a, b], [c, b, a]];
    orderings.forEach((ordering) => {
      expect(computeAggregate(ordering)).toEqual(expected);
    });
  });

  it('gives bit-identical totals for every ordering of decimal amounts', () => {
    const a = createMacroEntry('a', { proteinGrams: 0.1, fatGrams: 0.7 });
    const b = createMacroEntry('b', { proteinGrams: 0.2, fatGrams: 0.1 });
    const c = createMacroEntry('c', { proteinGrams: 0.3, fatGrams: 0.2 });
    const expected = computeAggregate([a, b, c]);

    [[a, c, b], [b, a, c], [b, c, a], [c, a, b], [c, b, a]].forEach((ordering) => {
      const totals = computeAggregate(ordering);
      expect(totals.proteinGrams).toBe(expected.proteinGrams);
      expect(totals.fatGrams).toBe(expected.fatGrams);
    });
    expect(expected.proteinGrams).toBeCloseTo(0.6);
  });

  it('returns a frozen result', () => {
    const totals = computeAggregate([createMacroEntry('a', { proteinGrams: 4 })]);

    expect(Object.isFrozen(totals)).toBe(true);
  });
});

describe('deriveAggregate', () => {
  it('derives the combined ratio from the summed entry', () => {
    const entries = [
      createMacroEntry('a', { proteinGrams: 10, fatGrams: 5, totalCarbGrams: 5, fiberGrams: 0 }),
      createMacroEntry('b', { proteinGrams: 20, fatGrams: 5, totalCarbGrams: 5, fiberGrams: 5 }),
    ];

    expect(deriveAggregate(entries)).toEqual({
      netCarbGrams: 5,
      energyGrams: 15,
      ratio: { kind: 'finite', value: 2 },
    });
  });

  it('sums before clamping, so one item\'s excess fiber offsets another\'s carbs', () => {
    const entries = [
      createMacroEntry('a', { proteinGrams: 6, totalCarbGrams: 2, fiberGrams: 5 }),
      createMacroEntry('b', { proteinGrams: 6, totalCarbGrams: 4, fiberGrams: 0 }),
    ];

    expect(deriveAggregate(entries)).toEqual({
      netCarbGrams: 1,
      energyGrams: 1,
      ratio: { kind: 'finite', value: 12 },
    });
  });

  it('reports an undefined ratio for an empty collection', () => {
    expect(deriveAggregate([]).ratio).toEqual({ kind: 'undefined' });
  });
});
