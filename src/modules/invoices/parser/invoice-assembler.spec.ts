import { ParseIssueCode, ParseOutcome, ParsedInvoice } from '../interfaces';
import {
  CONTINUATION_PAGE_TEXT,
  FIRST_PAGE_HEADER,
  FIRST_PAGE_TEXT,
  LAST_PAGE_TEXT,
  SINGLE_PAGE_TEXT,
  threePageInvoice,
} from './__fixtures__/invoice-pages';
import { HeaderResolver } from './header-resolver';
import { InvoiceAssembler } from './invoice-assembler';
import { LineItemWalker } from './line-item-walker';
import { SummaryResolver } from './summary-resolver';

const LOOSE_ITEM_TEXT = '157399-001 Loose Item\nL\n2\nUS Country of Origin:\nDelivery # 1.00 2.00';

const invoiceOf = (outcome: ParseOutcome): ParsedInvoice => {
  if (!outcome.ok) {
    throw new Error(`expected a parsed invoice, got ${outcome.failure.code}`);
  }
  return outcome.invoice;
};

describe('InvoiceAssembler', () => {
  let assembler: InvoiceAssembler;

  beforeEach(() => {
    assembler = new InvoiceAssembler(new HeaderResolver(), new LineItemWalker(), new SummaryResolver());
  });

  describe('three-page invoice', () => {
    it('collects the line items of every page in order', () => {
      const invoice = invoiceOf(assembler.assemble(threePageInvoice()));

      expect(invoice.lineItems.map((item) => item.styleColor)).toEqual([
        '157317-001',
        '157318-002',
        '157319-003',
        '157320-004',
      ]);
      expect(invoice.lineItems.map((item) => item.qty)).toEqual([12, 8, 24, 20]);
      expect(invoice.warnings).toEqual([]);
    });

    it('binds every line item to the one header instance', () => {
      const invoice = invoiceOf(assembler.assemble(threePageInvoice()));

      expect(invoice.header.invoiceId).toBe('987654321');
      invoice.lineItems.forEach((item) => expect(item.header).toBe(invoice.header));
    });

    it('reads the continuation page items', () => {
      const [, fleece, cap] = invoiceOf(assembler.assemble(threePageInvoice())).lineItems;

      expect(fleece).toMatchObject({
        styleColorDescr: 'Summit Fleece',
        size: 'XL',
        productFamily: 'HBG',
        countryOfOrigin: null,
        rdsCertified: false,
        tariffCode: '6110.30.3059',
        deliveryId: '0081234568',
        otherDescr: 'Main Body: 100% Polyester Trim 1: Nylon Webbing Trim 2: YKK Zipper',
        price: 30,
        extPrice: 240,
      });
      expect(cap).toMatchObject({
        size: 'OS',
        productFamily: null,
        countryOfOrigin: 'VN',
        rdsCertified: true,
        tariffCode: '6505.00.2060',
        otherDescr: 'Main Body: 100% Cotton',
        price: 9.5,
        extPrice: 228,
      });
    });

    it('reads the summary from the last page', () => {
      const invoice = invoiceOf(assembler.assemble(threePageInvoice()));

      expect(invoice.summary).toEqual({
        totalUnits: 64,
        merchandiseTotal: { value: 1248, unit: 'USD' },
        freightTotal: { value: 35.5, unit: 'USD' },
        totalInvoice: { value: 1283.5, unit: 'USD' },
      });
    });

    it('gives identical output for the same input', () => {
      const first = JSON.stringify(assembler.assemble(threePageInvoice()));
      const second = JSON.stringify(assembler.assemble(threePageInvoice()));

      expect(second).toBe(first);
    });
  });

  it('parses a single page that is both first and last', () => {
    const invoice = invoiceOf(assembler.assemble([{ pageIndex: 0, text: SINGLE_PAGE_TEXT }]));

    expect(invoice.header.invoiceId).toBe('987654321');
    expect(invoice.lineItems).toHaveLength(1);
    expect(invoice.lineItems[0].extPrice).toBe(540);
    expect(invoice.summary).toEqual({
      totalUnits: 12,
      merchandiseTotal: { value: 540, unit: 'USD' },
      freightTotal: { value: 10, unit: 'USD' },
      totalInvoice: { value: 550, unit: 'USD' },
    });
    expect(invoice.warnings).toEqual([]);
  });

  it('fails when a second header block appears', () => {
    const outcome = assembler.assemble([
      { pageIndex: 0, text: FIRST_PAGE_TEXT },
      { pageIndex: 1, text: FIRST_PAGE_TEXT },
    ]);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure).toMatchObject({
        stage: 'classify',
        code: ParseIssueCode.HeaderReappeared,
        pageIndex: 1,
      });
    }
  });

  it('ignores pages after the remittance page', () => {
    const invoice = invoiceOf(
      assembler.assemble([
        { pageIndex: 0, text: FIRST_PAGE_TEXT },
        { pageIndex: 1, text: LAST_PAGE_TEXT },
        { pageIndex: 2, text: CONTINUATION_PAGE_TEXT },
      ]),
    );

    expect(invoice.lineItems.map((item) => item.styleColor)).toEqual(['157317-001', '157320-004']);
    expect(invoice.warnings).toHaveLength(1);
    expect(invoice.warnings[0]).toMatchObject({
      code: ParseIssueCode.ClassificationAmbiguous,
      pageIndex: 2,
    });
  });

  it('fails when a later page repeats the header block next to the remittance marker', () => {
    const outcome = assembler.assemble([
      { pageIndex: 0, text: FIRST_PAGE_TEXT },
      { pageIndex: 1, text: SINGLE_PAGE_TEXT },
    ]);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.failure).toMatchObject({ code: ParseIssueCode.HeaderReappeared, pageIndex: 1 });
    }
  });

  it('reads a later first-and-last page as a continuation when no header block came before', () => {
    const invoice = invoiceOf(
      assembler.assemble([
        { pageIndex: 0, text: LOOSE_ITEM_TEXT },
        { pageIndex: 1, text: SINGLE_PAGE_TEXT },
      ]),
    );

    expect(invoice.lineItems.map((item) => item.styleColor)).toEqual(['157399-001', '157317-001']);
    expect(invoice.summary).toBeNull();
    expect(invoice.warnings.map((issue) => [issue.code, issue.pageIndex])).toEqual([
      [ParseIssueCode.ClassificationAmbiguous, 0],
      [ParseIssueCode.ClassificationAmbiguous, 1],
      [ParseIssueCode.HeaderMissing, null],
    ]);
  });

  it('resolves the identification strip of a leading page without the address block', () => {
    const invoice = invoiceOf(
      assembler.assemble([
        {
          pageIndex: 0,
          text: 'ACME APPAREL LTD Invoice #\n123456789 01/15/2024\n157317-001 Style Name\nM\n12\nHBG CN\nDelivery # 1.00 12.00',
        },
      ]),
    );

    expect(invoice.header).toMatchObject({
      reportEntity: 'ACME APPAREL LTD',
      invoiceId: '123456789',
      transactionDate: '2024-01-15',
      currency: '',
      customerId: '',
      cartonsCount: 0,
    });
    expect(invoice.lineItems).toHaveLength(1);
    expect(invoice.lineItems[0].header).toBe(invoice.header);
    expect(invoice.warnings).toEqual([]);
  });

  it('lets a later address block replace a header read from the strip alone', () => {
    const invoice = invoiceOf(
      assembler.assemble([
        { pageIndex: 0, text: CONTINUATION_PAGE_TEXT },
        { pageIndex: 1, text: FIRST_PAGE_TEXT },
      ]),
    );

    expect(invoice.header.customerId).toBe('12345678');
    expect(invoice.lineItems).toHaveLength(3);
    invoice.lineItems.forEach((item) => expect(item.header).toBe(invoice.header));
    expect(invoice.warnings.map((issue) => [issue.code, issue.pageIndex])).toEqual([
      [ParseIssueCode.ClassificationAmbiguous, 1],
    ]);
  });

  it('warns about a page without the header strip and still reads it', () => {
    const invoice = invoiceOf(
      assembler.assemble([
        { pageIndex: 0, text: FIRST_PAGE_TEXT },
        { pageIndex: 1, text: LOOSE_ITEM_TEXT },
      ]),
    );

    expect(invoice.lineItems[1]).toMatchObject({
      styleColor: '157399-001',
      countryOfOrigin: 'US',
      extPrice: 2,
    });
    expect(invoice.warnings.map((issue) => [issue.code, issue.pageIndex])).toEqual([
      [ParseIssueCode.ClassificationAmbiguous, 1],
    ]);
  });

  it('uses a default header when no page carries one', () => {
    const invoice = invoiceOf(assembler.assemble([{ pageIndex: 0, text: LOOSE_ITEM_TEXT }]));

    expect(invoice.header.invoiceId).toBe('');
    expect(invoice.header.transactionDate).toBe('9999-12-31');
    expect(invoice.lineItems).toHaveLength(1);
    expect(invoice.lineItems[0].header).toBe(invoice.header);
    expect(invoice.summary).toBeNull();
    expect(invoice.warnings.map((issue) => issue.code)).toEqual([
      ParseIssueCode.ClassificationAmbiguous,
      ParseIssueCode.HeaderMissing,
    ]);
  });

  it('warns when the document has no line items', () => {
    const invoice = invoiceOf(
      assembler.assemble([{ pageIndex: 0, text: FIRST_PAGE_HEADER.join('\n') }]),
    );

    expect(invoice.lineItems).toEqual([]);
    expect(invoice.warnings.map((issue) => issue.code)).toEqual([ParseIssueCode.NoLineItems]);
  });

  it('passes the search cap down to the walker', () => {
    const pages = [
      {
        pageIndex: 0,
        text: FIRST_PAGE_TEXT.replace('Main Body: 100% Nylon\n', 'Main Body: 100% Nylon\nLining A\nLining B\n'),
      },
    ];

    const invoice = invoiceOf(assembler.assemble(pages, { deliverySearchCap: 2 }));

    expect(invoice.lineItems[0].deliveryId).toBeNull();
    expect(invoice.warnings.map((issue) => issue.code)).toEqual([ParseIssueCode.AnchorSearchExhausted]);
  });
});
