import type { RawPage } from '../../interfaces';

const page = (...lines: string[]) => lines.join('\n');

const stripFor = (pageNumber: number) => [
  `Page ${pageNumber} of 3`,
  'NORTHWIND OUTFITTERS INC',
  '01/15/2024 Date 987654321 Invoice #',
];

export const FIRST_PAGE_HEADER = [
  'Page 1 of 3',
  'NORTHWIND OUTFITTERS INC',
  'DUN#123456789 01/15/2024 Date 987654321 Invoice #',
  'INVOICE TO:',
  'Harbor Retail Group',
  '100 Market Street',
  'Springfield, IL 62701 SOLD TO:',
  'Harbor Retail Group',
  '200 Commerce Way',
  'Springfield, IL 62702 SHIP TO:',
  'Harbor DC East',
  '300 Logistics Pkwy',
  'Columbus, OH 43004',
  'USD Currency',
  'NET 30 DAYS Terms 12345678 Customer #',
  'Store 42',
  '456789123 Sales Order #',
  '12 No. of Cartons PO-7788 Customer PO',
  'Net Weight : 120.500 LB',
  '140.250 LB Gross Weight :',
];

export const FIRST_PAGE_ITEMS = [
  '157317-001 Trail Jacket Size',
  'M',
  '12',
  'HBG CN Country of Origin:',
  'Main Body: 100% Nylon',
  'Lining: 100% Polyester 6201.40.2010 Tariff code: 0081234567 Delivery # RDS Certified 45.00 540.00',
];

export const TOTALS_TRAILER = [
  'Total Units 64',
  'Merchandise Total 1248.00 USD',
  'Freight 35.50 USD',
  'Invoice 1283.50 USD',
  'NO RETURNS ACCEPTED WITHOUT AUTHORIZATION.',
  'REMIT PAYMENT  TO',
  'Northwind Outfitters Inc',
];

export const FIRST_PAGE_TEXT = page(...FIRST_PAGE_HEADER, ...FIRST_PAGE_ITEMS);

export const CONTINUATION_PAGE_TEXT = page(
  ...stripFor(2),
  '157318-002 Summit Fleece Size',
  'XL',
  '8',
  'HBG Country of Origin:',
  'Main Body: 100% Polyester',
  'Trim 1: Nylon Webbing',
  'Trim 2: YKK Zipper 6110.30.3059 Tariff code: 0081234568 Delivery # 30.00 240.00',
  '157319-003 Ridge Cap Size',
  'OS',
  '24',
  'VN Country of Origin:',
  'Main Body: 100% Cotton 6505.00.2060 Tariff code: 0081234569 Delivery # RDS Certified 9.50 228.00',
);

export const LAST_PAGE_TEXT = page(
  ...stripFor(3),
  '157320-004 Basecamp Tee Size',
  'S',
  '20',
  'Country of Origin:',
  'Main Body: 100% Cotton Delivery # 12.00 240.00',
  ...TOTALS_TRAILER,
);

export const SINGLE_PAGE_TEXT = page(
  ...FIRST_PAGE_HEADER,
  ...FIRST_PAGE_ITEMS,
  'Total Units 12',
  'Merchandise Total 540.00 USD',
  'Freight 10.00 USD',
  'Invoice 550.00 USD',
  'NO RETURNS ACCEPTED WITHOUT AUTHORIZATION.',
  'REMIT PAYMENT TO',
  'Northwind Outfitters Inc',
);

export type FixturePage = Pick<RawPage, 'pageIndex' | 'text'>;

export const threePageInvoice = (): FixturePage[] => [
  { pageIndex: 0, text: FIRST_PAGE_TEXT },
  { pageIndex: 1, text: CONTINUATION_PAGE_TEXT },
  { pageIndex: 2, text: LAST_PAGE_TEXT },
];
