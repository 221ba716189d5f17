import { Injectable, Logger } from '@nestjs/common';

import { Measure, ParseIssue, ParseIssueCode, SummaryRecord } from '../interfaces';
import { asDecimal, asInteger, extractFromText } from './field-extractor';
import { TOTALS_MARKER } from './tokenizer';

export const RETURNS_NOTICE = /NO RETURNS ACCEPTED/i;

const SUMMARY_LINES = 4;
const CURRENCY_TOKEN = /^[A-Z]{3}$/;

export interface SummaryResolution {
  summary: SummaryRecord;
  issues: ParseIssue[];
}

const zeroMeasure = (): Measure => Object.freeze({ value: 0, unit: '' });

export const createEmptySummary = (): SummaryRecord =>
  Object.freeze({
    totalUnits: 0,
    merchandiseTotal: zeroMeasure(),
    freightTotal: zeroMeasure(),
    totalInvoice: zeroMeasure(),
  });

/** Lines from the totals marker up to the returns notice, or to the end of the page. */
export const totalsRegion = (text: string): string[] | null => {
  const start = text.indexOf(TOTALS_MARKER);
  if (start < 0) {
    return null;
  }
  const tail = text.slice(start);
  const notice = RETURNS_NOTICE.exec(tail);
  const region = notice ? tail.slice(0, notice.index) : tail;
  return region
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, SUMMARY_LINES);
};

/**
 * Reads a labelled total. The unit may sit before or after the label. The amount right after
 * the label wins; otherwise the last decimal token on the line is taken.
 */
export const labelledAmount = (line: string | undefined, label: string): Measure => {
  if (line === undefined || !line.includes(label)) {
    return zeroMeasure();
  }
  const tokens = line.trim().split(/\s+/).filter(Boolean);
  const afterLabel = line.slice(line.indexOf(label) + label.length).trim().split(/\s+/)[0] ?? '';

  const decimals = tokens.map(asDecimal).filter((value): value is number => value !== null);
  const value = asDecimal(afterLabel) ?? decimals[decimals.length - 1] ?? 0;
  const unit = tokens.find((token) => CURRENCY_TOKEN.test(token)) ?? '';

  return Object.freeze({ value, unit });
};

@Injectable()
export class SummaryResolver {
  private readonly logger = new Logger(SummaryResolver.name);

  resolve(pageIndex: number, text: string): SummaryResolution {
    const lines = totalsRegion(text);
    if (lines === null) {
      const message = `Page ${pageIndex}: "${TOTALS_MARKER}" not found, summary left at zero`;
      this.logger.warn(message);
      return {
        summary: createEmptySummary(),
        issues: [{ code: ParseIssueCode.FieldMalformed, pageIndex, field: 'totalUnits', message }],
      };
    }

    const [unitsLine, merchandiseLine, freightLine, invoiceLine] = lines;
    const issues: ParseIssue[] = [];

    const totalUnits = extractFromText<number | null>(unitsLine ?? '', {
      field: 'totalUnits',
      pattern: /Total Units\s+(?<value>\d{1,3}(?:,\d{3})+|\d+)(?![\d.,])/,
      coerce: (raw) => asInteger(raw.replace(/,/g, '')),
      fallback: null,
    }).value;
    if (totalUnits === null) {
      const message = `Page ${pageIndex}: total units missing from "${unitsLine ?? ''}"`;
      this.logger.warn(message);
      issues.push({ code: ParseIssueCode.FieldMalformed, pageIndex, field: 'totalUnits', message });
    }

    const summary: SummaryRecord = Object.freeze({
      totalUnits: totalUnits ?? 0,
      merchandiseTotal: labelledAmount(merchandiseLine, 'Merchandise Total'),
      freightTotal: labelledAmount(freightLine, 'Freight'),
      totalInvoice: labelledAmount(invoiceLine, 'Invoice'),
    });

    this.logger.debug(`Page ${pageIndex}: summary with ${summary.totalUnits} unit(s)`);
    return { summary, issues };
  }
}
