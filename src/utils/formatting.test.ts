import { formatGrams, formatInputValue, formatRatio, parseGramsInput } from './formatting';
import { InvalidInputError } from './macroEntry';

describe('parseGramsInput', () => {
  it.each([
    ['12', 12],
    [' 12.5 ', 12.5],
    ['.5', 0.5],
    ['3.', 3],
    ['0', 0],
  ])('parses %p as %p', (text, expected) => {
    expect(parseGramsInput('protein', text)).toBe(expected);
  });

  it('treats a cleared field as zero', () => {
    expect(parseGramsInput('fat', '')).toBe(0);
    expect(parseGramsInput('fat', '   ')).toBe(0);
  });

  it.each(['abc', '1e3', '1,5', '12g', '0x10', '.'])('rejects %p as unparsable', (text) => {
    expect(() => parseGramsInput('fiber', text)).toThrow(InvalidInputError);
    try {
      parseGramsInput('fiber', text);
    } catch (error) {
      expect(error).toMatchObject({ field: 'fiber', value: text, reason: 'unparsable' });
    }
  });

  it('rejects negative numbers', () => {
    expect(() => parseGramsInput('totalCarb', '-1')).toThrow('Total carbs cannot be negative');
  });

  it('rejects numbers too large to be finite', () => {
    expect(() => parseGramsInput('protein', '9'.repeat(400))).toThrow('Protein must be a finite number');
  });
});

describe('formatGrams', () => {
  it('uses fixed decimals', () => {
    expect(formatGrams(12)).toBe('12.00');
    expect(formatGrams(1 / 3)).toBe('0.33');
    expect(formatGrams(2.5, 1)).toBe('2.5');
    expect(formatGrams(7.6, 0)).toBe('8');
  });

  it('prints values that round to zero as zero', () => {
    expect(formatGrams(0.004)).toBe('0.00');
    expect(formatGrams(-0)).toBe('0.00');
  });
});

describe('formatRatio', () => {
  it('renders sentinels and finite ratios', () => {
    expect(formatRatio({ kind: 'undefined' })).toBe('—');
    expect(formatRatio({ kind: 'infinite' })).toBe('∞');
    expect(formatRatio({ kind: 'finite', value: 3 })).toBe('3.00');
    expect(formatRatio({ kind: 'finite', value: 2 / 3 }, 1)).toBe('0.7');
  });
});

describe('formatInputValue', () => {
  it('leaves zero blank and prints other values as typed', () => {
    expect(formatInputValue(0)).toBe('');
    expect(formatInputValue(12.5)).toBe('12.5');
    expect(formatInputValue(1)).toBe('1');
  });
});
