import {
  CONTINUATION_PAGE_TEXT,
  FIRST_PAGE_TEXT,
  LAST_PAGE_TEXT,
  SINGLE_PAGE_TEXT,
} from './__fixtures__/invoice-pages';
import { classifyPage } from './page-classifier';

describe('classifyPage', () => {
  it('recognises the page carrying the address block as first', () => {
    expect(classifyPage(FIRST_PAGE_TEXT).role).toEqual({ kind: 'first', alsoLast: false });
  });

  it('flags a single-page invoice as first and last', () => {
    expect(classifyPage(SINGLE_PAGE_TEXT).role).toEqual({ kind: 'first', alsoLast: true });
  });

  it('recognises the remittance page as last', () => {
    expect(classifyPage(LAST_PAGE_TEXT).role).toEqual({ kind: 'last' });
  });

  it('matches the remittance marker regardless of case and spacing', () => {
    expect(classifyPage('X Invoice #\nremit   payment\nto').role).toEqual({ kind: 'last' });
  });

  it('only looks for the remittance marker after the header strip', () => {
    expect(classifyPage('REMIT PAYMENT TO\nX Invoice #\nbody').role).toEqual({
      kind: 'continuation',
      unmarked: false,
    });
  });

  it('defaults to continuation', () => {
    expect(classifyPage(CONTINUATION_PAGE_TEXT).role).toEqual({
      kind: 'continuation',
      unmarked: false,
    });
    expect(classifyPage('157318-002 Fleece').role).toEqual({
      kind: 'continuation',
      unmarked: true,
    });
  });
});
