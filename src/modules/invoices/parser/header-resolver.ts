import { Injectable, Logger } from '@nestjs/common';

import { SENTINEL_DATE } from '../../../common/utils';
import { InvoiceHeader, Measure, ParseIssue, ParseIssueCode, TableGrid } from '../interfaces';
import {
  asDecimal,
  asInteger,
  asIsoDate,
  asText,
  extractField,
  FieldRule,
  FIELD_PATTERNS,
} from './field-extractor';
import { readTableHeaderFields, TableHeaderFields } from './table-header-fields';
import { PageSections, splitBlocks, splitOnce } from './tokenizer';

export const EMPTY_MEASURE: Measure = Object.freeze({ value: 0, unit: '' });

export const createDefaultHeader = (overrides: Partial<InvoiceHeader> = {}): InvoiceHeader =>
  Object.freeze({
    reportEntity: '',
    transactionDate: SENTINEL_DATE,
    invoiceId: '',
    dunId: null,
    invoiceTo: '',
    soldTo: '',
    shipTo: '',
    currency: '',
    customerId: '',
    salesOrderId: '',
    customerPo: '',
    terms: '',
    cartonsCount: 0,
    cartonsNetWeight: EMPTY_MEASURE,
    cartonsGrossWeight: EMPTY_MEASURE,
    ...overrides,
  });

// Identification strip, searched as [entity, date/invoice, first line after marker, whole preamble].
const ENTITY = 0;
const DATE_INVOICE = 1;
const LEAD_LINE = 2;
const PREAMBLE = 3;

const INVOICE_ID: FieldRule<string | null> = {
  field: 'invoiceId',
  spans: [DATE_INVOICE, LEAD_LINE],
  pattern: FIELD_PATTERNS.nineDigits,
  coerce: asText,
  fallback: null,
};

const TRANSACTION_DATE: FieldRule<string> = {
  field: 'transactionDate',
  spans: [ENTITY, DATE_INVOICE, LEAD_LINE],
  pattern: FIELD_PATTERNS.usDate,
  coerce: asIsoDate,
  fallback: SENTINEL_DATE,
};

const DUN_ID: FieldRule<string | null> = {
  field: 'dunId',
  spans: [PREAMBLE],
  pattern: FIELD_PATTERNS.dunId,
  coerce: asText,
  fallback: null,
};

const ADDRESS_LABELS = /\b(?:INVOICE|SOLD|SHIP)\s+TO:/gi;

const asAddress = (raw: string): string | null => {
  const joined = raw
    .replace(ADDRESS_LABELS, ' ')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean)
    .join(' ');
  return joined || null;
};

const addressRule = (field: string, from: number): FieldRule<string> => ({
  field,
  spans: [[from, from + 2]],
  pattern: FIELD_PATTERNS.anything,
  coerce: asAddress,
  fallback: '',
});

// Address block lines: 0 is the INVOICE TO caption, then three lines per party, currency last.
const ADDRESS_RULES = {
  invoiceTo: addressRule('invoiceTo', 1),
  soldTo: addressRule('soldTo', 4),
  shipTo: addressRule('shipTo', 7),
  currency: {
    field: 'currency',
    spans: [-1],
    pattern: FIELD_PATTERNS.currency,
    coerce: asText,
    fallback: '',
  },
} satisfies Record<string, FieldRule<string>>;

const textRule = (field: string, span: number, pattern: RegExp): FieldRule<string> => ({
  field,
  spans: [span],
  pattern,
  coerce: asText,
  fallback: '',
});

const numberRule = (
  field: string,
  span: number,
  pattern: RegExp,
  coerce: (raw: string) => number | null,
): FieldRule<number> => ({ field, spans: [span], pattern, coerce, fallback: 0 });

// Commercial terms lines, labels printed after their values.
const COMMERCIAL_RULES = {
  customerId: textRule('customerId', 0, FIELD_PATTERNS.eightDigits),
  terms: textRule('terms', 0, /^(?<value>.*?)\s*\bTerms\b/),
  salesOrderId: textRule('salesOrderId', 2, FIELD_PATTERNS.nineDigits),
  customerPo: textRule('customerPo', 3, /No\. of Cartons\s*(?<value>.*?)\s*Customer PO/),
  cartonsCount: numberRule('cartonsCount', 3, /^\s*(?<value>\d+)\s*No\. of Cartons/, asInteger),
  netWeight: numberRule('cartonsNetWeight', 4, /Net Weight\s*:\s*(?<value>\d+\.\d{3})/, asDecimal),
  netWeightUnit: textRule(
    'cartonsNetWeightUnit',
    4,
    /Net Weight\s*:\s*\d+\.\d{3}\s*(?<value>[A-Z]{2})\b/,
  ),
  grossWeight: numberRule(
    'cartonsGrossWeight',
    5,
    /(?<value>\d+\.\d{3})[^\n]*?Gross Weight/,
    asDecimal,
  ),
  grossWeightUnit: textRule(
    'cartonsGrossWeightUnit',
    5,
    /\d+\.\d{3}\s*(?<value>[A-Z]{2})\s*Gross Weight/,
  ),
};

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

type AddressFields = Pick<InvoiceHeader, 'invoiceTo' | 'soldTo' | 'shipTo' | 'currency'>;

type CommercialFields = Pick<
  InvoiceHeader,
  | 'customerId'
  | 'salesOrderId'
  | 'customerPo'
  | 'terms'
  | 'cartonsCount'
  | 'cartonsNetWeight'
  | 'cartonsGrossWeight'
>;

export interface HeaderResolveOptions {
  tableGrids?: readonly TableGrid[];
  /** Lets table cell values override the same fields read from running text. */
  preferTableGrids?: boolean;
}

export interface HeaderResolution {
  header: InvoiceHeader;
  issues: ParseIssue[];
}

/**
 * Builds the invoice header from the first page. Every field is read independently and
 * falls back to its zero value; only a missing invoice number stops resolution early.
 */
@Injectable()
export class HeaderResolver {
  private readonly logger = new Logger(HeaderResolver.name);

  resolve(
    pageIndex: number,
    sections: PageSections,
    options: HeaderResolveOptions = {},
  ): HeaderResolution {
    const [entity, dateInvoice] = splitOnce(sections.preamble, ' Date') ?? [sections.preamble, ''];
    const leadLine = splitBlocks(sections.remainder)[0] ?? '';
    const strip = [entity, dateInvoice, leadLine, sections.preamble];

    const identity = {
      reportEntity: this.reportEntityFrom(entity),
      transactionDate: this.read(strip, TRANSACTION_DATE, pageIndex),
      dunId: this.read(strip, DUN_ID, pageIndex),
    };

    const invoiceId = extractField(strip, INVOICE_ID).value;
    if (invoiceId === null) {
      const message = `Page ${pageIndex}: invoice number not found, header left at defaults`;
      this.logger.warn(message);
      return {
        header: createDefaultHeader(identity),
        issues: [{ code: ParseIssueCode.FieldMalformed, pageIndex, field: 'invoiceId', message }],
      };
    }

    const tables: TableHeaderFields =
      options.preferTableGrids && options.tableGrids
        ? readTableHeaderFields(options.tableGrids)
        : {};

    const address = sections.addressSection;
    const header = createDefaultHeader({
      ...identity,
      invoiceId,
      ...(address !== null ? this.readAddress(address, pageIndex) : {}),
      ...(address !== null ? this.readCommercial(sections.bodySection, pageIndex) : {}),
      ...this.definedTableFields(tables),
    });

    this.logger.debug(`Page ${pageIndex}: resolved header for invoice ${header.invoiceId}`);
    return { header, issues: [] };
  }

  private readAddress(addressSection: string, pageIndex: number): AddressFields {
    const lines = splitBlocks(addressSection);
    return {
      invoiceTo: this.read(lines, ADDRESS_RULES.invoiceTo, pageIndex),
      soldTo: this.read(lines, ADDRESS_RULES.soldTo, pageIndex),
      shipTo: this.read(lines, ADDRESS_RULES.shipTo, pageIndex),
      currency: this.read(lines, ADDRESS_RULES.currency, pageIndex),
    };
  }

  private readCommercial(bodySection: string, pageIndex: number): CommercialFields {
    const lines = splitBlocks(bodySection);
    const measure = (value: FieldRule<number>, unit: FieldRule<string>): Measure =>
      Object.freeze({
        value: this.read(lines, value, pageIndex),
        unit: this.read(lines, unit, pageIndex),
      });

    return {
      customerId: this.read(lines, COMMERCIAL_RULES.customerId, pageIndex),
      terms: this.read(lines, COMMERCIAL_RULES.terms, pageIndex),
      salesOrderId: this.read(lines, COMMERCIAL_RULES.salesOrderId, pageIndex),
      customerPo: this.read(lines, COMMERCIAL_RULES.customerPo, pageIndex),
      cartonsCount: this.read(lines, COMMERCIAL_RULES.cartonsCount, pageIndex),
      cartonsNetWeight: measure(COMMERCIAL_RULES.netWeight, COMMERCIAL_RULES.netWeightUnit),
      cartonsGrossWeight: measure(COMMERCIAL_RULES.grossWeight, COMMERCIAL_RULES.grossWeightUnit),
    };
  }

  private definedTableFields(tables: TableHeaderFields): Partial<CommercialFields> {
    const fields: Partial<Mutable<CommercialFields>> = {};
    if (tables.customerId !== undefined) fields.customerId = tables.customerId;
    if (tables.salesOrderId !== undefined) fields.salesOrderId = tables.salesOrderId;
    if (tables.customerPo !== undefined) fields.customerPo = tables.customerPo;
    if (tables.cartonsCount !== undefined) fields.cartonsCount = tables.cartonsCount;
    if (tables.cartonsNetWeight !== undefined) {
      fields.cartonsNetWeight = Object.freeze({ ...tables.cartonsNetWeight });
    }
    if (tables.cartonsGrossWeight !== undefined) {
      fields.cartonsGrossWeight = Object.freeze({ ...tables.cartonsGrossWeight });
    }
    return fields;
  }

  /** Entity lines without the date and DUN tokens; the first line is the page caption. */
  private reportEntityFrom(entity: string): string {
    const lines = entity
      .replace(FIELD_PATTERNS.usDate, '')
      .replace(/DUN#\s*\d*/, '')
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
    return (lines.length > 1 ? lines.slice(1) : lines).join(' ');
  }

  private read<T>(blocks: readonly string[], rule: FieldRule<T>, pageIndex: number): T {
    const result = extractField(blocks, rule);
    if (!result.present) {
      this.logger.debug(`Page ${pageIndex}: ${result.reason}`);
    }
    return result.value;
  }
}
