import { InvalidInputError, assertValidQuantity } from './macroEntry';
import type { QuantityField } from './macroEntry';
import type { Ratio } from './derivation';

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;
const NEGATIVE_PATTERN = /^-(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse the text of a gram (or servings) input. Blank text means the field was cleared.
 */
export function parseGramsInput(field: QuantityField, raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return 0;
  }
  if (NEGATIVE_PATTERN.test(trimmed)) {
    throw new InvalidInputError(field, raw, 'negative');
  }
  if (!DECIMAL_PATTERN.test(trimmed)) {
    throw new InvalidInputError(field, raw, 'unparsable');
  }
  const value = Number(trimmed);
  assertValidQuantity(field, value);
  return value;
}

export function formatGrams(value: number, precision = 2): string {
  // Anything that would round to zero prints as zero, never "-0.00".
  if (Math.abs(value) < 0.5 * 10 ** -precision) {
    return (0).toFixed(precision);
  }
  return value.toFixed(precision);
}

export function formatRatio(ratio: Ratio, precision = 2): string {
  switch (ratio.kind) {
    case 'undefined':
      return '—';
    case 'infinite':
      return '∞';
    case 'finite':
      return formatGrams(ratio.value, precision);
  }
}

// Used to refill inputs from a share link.
export function formatInputValue(value: number): string {
  return value === 0 ? '' : String(value);
}
