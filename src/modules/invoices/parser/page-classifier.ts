import { PageSections, segmentPage } from './tokenizer';

export const REMIT_PAYMENT_MARKER = /REMIT\s+PAYMENT\s+TO/i;

export type PageRole =
  | { kind: 'first'; alsoLast: boolean }
  | { kind: 'last' }
  | { kind: 'continuation'; unmarked: boolean };

export interface PageClassification {
  role: PageRole;
  sections: PageSections;
}

/**
 * Assigns a role from a single page's text. A page carrying both the header block and the
 * remittance trailer is a single-page invoice and classifies as `first` with `alsoLast`.
 */
export const classifyPage = (text: string): PageClassification => {
  const sections = segmentPage(text);
  const isFirst = sections.hasHeaderMarker && sections.addressSection !== null;
  const isLast = REMIT_PAYMENT_MARKER.test(sections.remainder);

  if (isFirst) {
    return { role: { kind: 'first', alsoLast: isLast }, sections };
  }
  if (isLast) {
    return { role: { kind: 'last' }, sections };
  }
  return { role: { kind: 'continuation', unmarked: !sections.hasHeaderMarker }, sections };
};
