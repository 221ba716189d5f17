import type { InvoiceHeader, LineItem, SummaryRecord } from './invoice.interface';

export const ParseIssueCode = {
  FieldAbsent: 'FieldAbsent',
  FieldMalformed: 'FieldMalformed',
  AnchorSearchExhausted: 'AnchorSearchExhausted',
  ClassificationAmbiguous: 'ClassificationAmbiguous',
  HeaderReappeared: 'HeaderReappeared',
  HeaderMissing: 'HeaderMissing',
  NoLineItems: 'NoLineItems',
} as const;

export type ParseIssueCode = (typeof ParseIssueCode)[keyof typeof ParseIssueCode];

export type ParseStage = 'classify' | 'header' | 'line-items' | 'summary' | 'assemble';

export interface ParseIssue {
  code: ParseIssueCode;
  /** Null for document-level issues. */
  pageIndex: number | null;
  field?: string;
  message: string;
}

export interface ParsedInvoice {
  header: InvoiceHeader;
  lineItems: LineItem[];
  summary: SummaryRecord | null;
  warnings: ParseIssue[];
}

export interface ParseFailure {
  stage: ParseStage;
  code: typeof ParseIssueCode.HeaderReappeared;
  pageIndex: number;
  message: string;
}

export type ParseOutcome =
  | { ok: true; invoice: ParsedInvoice }
  | { ok: false; failure: ParseFailure; warnings: ParseIssue[] };

/** Service-wide parser settings, from the environment. */
export interface ParserOptions {
  deliverySearchCap: number;
  preferTableGrids: boolean;
}
