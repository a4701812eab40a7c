/**
 * Numeric cell parsing
 */

import { cleanNumeric, isNumericCell, parseNumericRows } from '@finspread/shared';

describe('cleanNumeric', () => {
  it('should strip currency symbols and thousands separators', () => {
    expect(cleanNumeric('$1,234.56')).toBe(1234.56);
    expect(cleanNumeric('€ 2,000')).toBe(2000);
  });

  it('should read parentheses as negative', () => {
    expect(cleanNumeric('(1,234)')).toBe(-1234);
    expect(cleanNumeric('($5)')).toBe(-5);
  });

  it('should read a leading minus as negative', () => {
    expect(cleanNumeric('-42')).toBe(-42);
  });

  it('should drop a percent sign', () => {
    expect(cleanNumeric('12.5%')).toBe(12.5);
  });

  it('should treat a lone dash as zero', () => {
    expect(cleanNumeric('-')).toBe(0);
    expect(cleanNumeric('—')).toBe(0);
  });

  it('should return null for not-available markers and blanks', () => {
    expect(cleanNumeric('n/a')).toBeNull();
    expect(cleanNumeric('N/A')).toBeNull();
    expect(cleanNumeric('')).toBeNull();
    expect(cleanNumeric('   ')).toBeNull();
    expect(cleanNumeric(null)).toBeNull();
    expect(cleanNumeric(undefined)).toBeNull();
  });

  it('should accept decimals and exponents', () => {
    expect(cleanNumeric('.5')).toBe(0.5);
    expect(cleanNumeric('1.5e3')).toBe(1500);
  });

  it('should return null for text', () => {
    expect(cleanNumeric('abc')).toBeNull();
    expect(cleanNumeric('1,234 USD')).toBeNull();
  });
});

describe('isNumericCell', () => {
  it('should follow cleanNumeric', () => {
    expect(isNumericCell('(600)')).toBe(true);
    expect(isNumericCell('Revenue')).toBe(false);
  });
});

describe('parseNumericRows', () => {
  it('should keep the row shape', () => {
    expect(
      parseNumericRows([
        ['Revenue', '1,000', '900'],
        ['Cost of revenue', '(600)', '-'],
      ])
    ).toEqual([
      [null, 1000, 900],
      [null, -600, 0],
    ]);
  });
});
