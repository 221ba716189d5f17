import { parseDecimal, parseInteger, usDateToIso } from '../../../common/utils';

/** A block index, or an inclusive `[from, to]` range. Negative indices count from the end. */
export type BlockSpan = number | readonly [number, number];

export interface FieldRule<T> {
  field: string;
  /** Tried in order; the first span that yields a coercible match wins. */
  spans: readonly BlockSpan[];
  /** Must capture the raw value in a named `value` group. */
  pattern: RegExp;
  coerce: (raw: string) => T | null;
  fallback: T;
}

export type FieldResult<T> =
  | { present: true; value: T }
  | { present: false; value: T; reason: string };

/** Structural shapes of the invoice layout. None of them carries the `g` flag. */
export const FIELD_PATTERNS = {
  styleColor: /(?<value>\d{6}-\d{3})/,
  nineDigits: /(?<!\d)(?<value>\d{9})(?!\d)/,
  eightDigits: /(?<!\d)(?<value>\d{8})(?!\d)/,
  dunId: /DUN#\s*(?<value>\d{9})(?!\d)/,
  usDate: /(?<value>\d{2}\/\d{2}\/\d{4})/,
  currency: /\b(?<value>[A-Z]{3})\b/,
  size: /^(?<value>[A-Z]{1,3})$/,
  unsignedInt: /^(?<value>\d+)$/,
  tariffCode: /^(?<value>\d{4}\.\d{2}\.\d{4})$/,
  deliveryId: /^(?<value>\d{10})$/,
  anything: /(?<value>[\s\S]+)/,
} as const;

export const asText = (raw: string): string | null => {
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
};

export const asInteger = (raw: string): number | null => parseInteger(raw);

export const asDecimal = (raw: string): number | null => parseDecimal(raw);

export const asIsoDate = (raw: string): string | null => usDateToIso(raw);

const resolveIndex = (index: number, length: number) => (index < 0 ? length + index : index);

/** Joins the blocks covered by `span` with newlines, or returns null when the span is off the page. */
export const spanText = (blocks: readonly string[], span: BlockSpan): string | null => {
  const [from, to] = typeof span === 'number' ? [span, span] : span;
  const start = resolveIndex(from, blocks.length);
  const end = Math.min(resolveIndex(to, blocks.length), blocks.length - 1);
  if (start < 0 || start >= blocks.length || end < start) {
    return null;
  }
  return blocks.slice(start, end + 1).join('\n');
};

export function extractField<T>(blocks: readonly string[], rule: FieldRule<T>): FieldResult<T> {
  let reason = `${rule.field}: no search span lies inside the page`;

  for (const span of rule.spans) {
    const text = spanText(blocks, span);
    if (text === null) {
      continue;
    }

    const raw: string | undefined = rule.pattern.exec(text)?.groups?.['value'];
    if (raw === undefined) {
      reason = `${rule.field}: no match for ${String(rule.pattern)}`;
      continue;
    }

    const value = rule.coerce(raw);
    if (value === null) {
      reason = `${rule.field}: "${raw}" is not a valid value`;
      continue;
    }

    return { present: true, value };
  }

  return { present: false, value: rule.fallback, reason };
}

/** Single-string convenience for rules that search one piece of text. */
export const extractFromText = <T>(text: string, rule: Omit<FieldRule<T>, 'spans'>): FieldResult<T> =>
  extractField([text], { ...rule, spans: [0] });
