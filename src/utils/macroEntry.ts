export const MACRO_FIELDS = ['protein', 'fat', 'totalCarb', 'fiber'] as const;

export type MacroField = (typeof MACRO_FIELDS)[number];

// Servings is not a macro but is edited and validated the same way.
export type QuantityField = MacroField | 'servings';

export const QUANTITY_FIELDS: readonly QuantityField[] = [...MACRO_FIELDS, 'servings'];

export interface MacroAmounts {
  proteinGrams: number;
  fatGrams: number;
  totalCarbGrams: number;
  fiberGrams: number;
}

export interface MacroEntry extends MacroAmounts {
  id: string;
  label: string;
  servings: number; // multiplier applied to the per-serving gram amounts
}

export type EntryInit = Partial<Omit<MacroEntry, 'id'>>;

type QuantityKey = keyof MacroAmounts | 'servings';

export const FIELD_KEYS: Record<QuantityField, QuantityKey> = {
  protein: 'proteinGrams',
  fat: 'fatGrams',
  totalCarb: 'totalCarbGrams',
  fiber: 'fiberGrams',
  servings: 'servings',
};

export type InvalidInputReason = 'negative' | 'not-finite' | 'unparsable';

/**
 * Raised when a proposed quantity cannot be stored. The entry keeps its prior value.
 */
export class InvalidInputError extends Error {
  readonly field: QuantityField;
  readonly value: unknown;
  readonly reason: InvalidInputReason;

  constructor(field: QuantityField, value: unknown, reason: InvalidInputReason) {
    super(describeReason(field, reason));
    this.name = 'InvalidInputError';
    this.field = field;
    this.value = value;
    this.reason = reason;
  }
}

const FIELD_NAMES: Record<QuantityField, string> = {
  protein: 'Protein',
  fat: 'Fat',
  totalCarb: 'Total carbs',
  fiber: 'Fiber',
  servings: 'Servings',
};

function describeReason(field: QuantityField, reason: InvalidInputReason): string {
  const name = FIELD_NAMES[field];
  switch (reason) {
    case 'negative':
      return `${name} cannot be negative`;
    case 'not-finite':
      return `${name} must be a finite number`;
    case 'unparsable':
      return `${name} must be a number`;
  }
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function assertValidQuantity(field: QuantityField, value: number): void {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(field, value, 'not-finite');
  }
  if (value < 0) {
    throw new InvalidInputError(field, value, 'negative');
  }
}

export function createMacroEntry(id: string, initial: EntryInit = {}): MacroEntry {
  const entry: MacroEntry = {
    id,
    label: initial.label ?? '',
    proteinGrams: initial.proteinGrams ?? 0,
    fatGrams: initial.fatGrams ?? 0,
    totalCarbGrams: initial.totalCarbGrams ?? 0,
    fiberGrams: initial.fiberGrams ?? 0,
    servings: initial.servings ?? 1,
  };

  for (const field of QUANTITY_FIELDS) {
    assertValidQuantity(field, readQuantity(entry, field));
  }
  const overflow = overflowingField(entry);
  if (overflow) {
    throw new InvalidInputError(overflow, readQuantity(entry, overflow), 'not-finite');
  }

  return entry;
}

export function readQuantity(entry: MacroEntry, field: QuantityField): number {
  return entry[FIELD_KEYS[field]];
}

/**
 * Sum of every gram amount once servings are applied. While this stays finite, so does
 * every total and energy figure derived from the entry.
 */
export function scaledMagnitude(entry: Readonly<MacroEntry>): number {
  return MACRO_FIELDS.reduce((total, field) => total + readQuantity(entry, field) * entry.servings, 0);
}

/**
 * The first macro whose scaled amount, added on top of `base`, overflows to Infinity.
 */
export function overflowingField(entry: Readonly<MacroEntry>, base = 0): MacroField | undefined {
  let total = base;
  for (const field of MACRO_FIELDS) {
    total += readQuantity(entry, field) * entry.servings;
    if (!Number.isFinite(total)) {
      return field;
    }
  }
  return undefined;
}

/**
 * A validated copy of the entry with one quantity replaced. The original is untouched.
 */
export function withQuantity(entry: Readonly<MacroEntry>, field: QuantityField, value: number): MacroEntry {
  assertValidQuantity(field, value);
  const next: MacroEntry = { ...entry };
  next[FIELD_KEYS[field]] = value;
  if (overflowingField(next) !== undefined) {
    throw new InvalidInputError(field, value, 'not-finite');
  }
  return next;
}

/**
 * Validates and writes a quantity in place. Returns false when the value is unchanged.
 */
export function writeQuantity(entry: MacroEntry, field: QuantityField, value: number): boolean {
  const next = withQuantity(entry, field, value);
  const key = FIELD_KEYS[field];
  if (entry[key] === next[key]) {
    return false;
  }
  entry[key] = next[key];
  return true;
}
