export type TableGrid = readonly (readonly string[])[];

export interface RawPage {
  pageIndex: number;
  text: string;
  tableGrids?: readonly TableGrid[];
}

/** A decimal quantity with the unit printed next to it (`LB`, `USD`, ...). */
export interface Measure {
  readonly value: number;
  readonly unit: string;
}

export interface InvoiceHeader {
  readonly reportEntity: string;
  /** ISO date, or `9999-12-31` when the printed date is missing or invalid. */
  readonly transactionDate: string;
  readonly invoiceId: string;
  readonly dunId: string | null;
  readonly invoiceTo: string;
  readonly soldTo: string;
  readonly shipTo: string;
  readonly currency: string;
  readonly customerId: string;
  readonly salesOrderId: string;
  readonly customerPo: string;
  readonly terms: string;
  readonly cartonsCount: number;
  readonly cartonsNetWeight: Measure;
  readonly cartonsGrossWeight: Measure;
}

export interface LineItemFields {
  styleColor: string;
  styleColorDescr: string;
  size: string | null;
  qty: number;
  productFamily: string | null;
  countryOfOrigin: string | null;
  rdsCertified: boolean;
  tariffCode: string | null;
  deliveryId: string | null;
  otherDescr: string;
  price: number | null;
  extPrice: number | null;
}

export interface LineItem extends LineItemFields {
  readonly header: InvoiceHeader;
}

export interface SummaryRecord {
  totalUnits: number;
  merchandiseTotal: Measure;
  freightTotal: Measure;
  totalInvoice: Measure;
}
