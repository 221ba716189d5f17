import { SENTINEL_DATE } from '../../../common/utils';
import {
  asIsoDate,
  asText,
  extractField,
  extractFromText,
  FieldRule,
  FIELD_PATTERNS,
  spanText,
} from './field-extractor';

const invoiceIdRule: FieldRule<string | null> = {
  field: 'invoiceId',
  spans: [0, 1],
  pattern: FIELD_PATTERNS.nineDigits,
  coerce: asText,
  fallback: null,
};

describe('spanText', () => {
  const blocks = ['a', 'b', 'c'];

  it('joins single blocks and ranges', () => {
    expect(spanText(blocks, 1)).toBe('b');
    expect(spanText(blocks, [0, 1])).toBe('a\nb');
  });

  it('counts negative indices from the end', () => {
    expect(spanText(blocks, -1)).toBe('c');
    expect(spanText(blocks, [-2, -1])).toBe('b\nc');
  });

  it('clamps ranges and rejects spans off the page', () => {
    expect(spanText(blocks, [1, 9])).toBe('b\nc');
    expect(spanText(blocks, 5)).toBeNull();
    expect(spanText(blocks, -4)).toBeNull();
  });
});

describe('extractField', () => {
  it('returns the first span that matches', () => {
    expect(extractField(['no digits', 'id 123456789'], invoiceIdRule)).toEqual({
      present: true,
      value: '123456789',
    });
  });

  it('does not take nine digits out of a longer run', () => {
    const result = extractField(['1234567890'], invoiceIdRule);

    expect(result.present).toBe(false);
    expect(result.value).toBeNull();
  });

  it('reports spans outside the page', () => {
    expect(extractField(['x'], { ...invoiceIdRule, spans: [7] })).toEqual({
      present: false,
      value: null,
      reason: 'invoiceId: no search span lies inside the page',
    });
  });

  it('falls back when the matched text does not coerce', () => {
    const rule: FieldRule<string> = {
      field: 'transactionDate',
      spans: [0],
      pattern: FIELD_PATTERNS.usDate,
      coerce: asIsoDate,
      fallback: SENTINEL_DATE,
    };

    expect(extractField(['02/30/2024'], rule)).toEqual({
      present: false,
      value: SENTINEL_DATE,
      reason: 'transactionDate: "02/30/2024" is not a valid value',
    });
  });

  it('keeps looking in later spans after a failed coercion', () => {
    const rule: FieldRule<string> = {
      field: 'transactionDate',
      spans: [0, 1],
      pattern: FIELD_PATTERNS.usDate,
      coerce: asIsoDate,
      fallback: SENTINEL_DATE,
    };

    expect(extractField(['02/30/2024', '03/01/2024'], rule).value).toBe('2024-03-01');
  });
});

describe('extractFromText', () => {
  it('searches a single string', () => {
    const result = extractFromText<string>('DUN#123456789 01/15/2024', {
      field: 'dunId',
      pattern: FIELD_PATTERNS.dunId,
      coerce: asText,
      fallback: '',
    });

    expect(result).toEqual({ present: true, value: '123456789' });
  });
});
