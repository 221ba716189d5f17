import type { InvoiceHeader, LineItemFields, ParsedInvoice, ParseIssue, SummaryRecord } from '../interfaces';

/** Wire form of a parsed invoice. Line items drop their header reference. */
export interface InvoicePayload {
  header: InvoiceHeader;
  lineItems: LineItemFields[];
  summary: SummaryRecord | null;
  warnings: ParseIssue[];
}

export interface HeaderIdentityRow {
  report_entity: string;
  transaction_date: string;
  invoice_id: string;
  dun_id: string | null;
  invoice_to: string;
  sold_to: string;
  ship_to: string;
}

export interface LineRow extends HeaderIdentityRow {
  currency: string;
  customer_id: string;
  sales_order_id: string;
  customer_po: string;
  terms_str: string;
  cartons_count: number;
  cartons_net_weight: number;
  cartons_net_weight_unit: string;
  cartons_gross_weight: number;
  cartons_gross_weight_unit: string;
  style_color: string;
  style_color_descr: string;
  size: string | null;
  qty: number;
  product_family: string | null;
  country_of_origin: string | null;
  rds_certified: 0 | 1;
  tariff_code: string | null;
  delivery_id: string | null;
  other_descr: string;
  price: number | null;
  ext_price: number | null;
}

export interface SummaryRow extends HeaderIdentityRow {
  total_units: number;
  merchandise_total: number;
  merchandise_total_unit: string;
  freight_total: number;
  freight_total_unit: string;
  total_invoice: number;
  total_invoice_unit: string;
}

export interface InvoiceRows {
  lines: LineRow[];
  summary: SummaryRow[];
  warnings: ParseIssue[];
}

export const toInvoicePayload = ({ header, lineItems, summary, warnings }: ParsedInvoice): InvoicePayload => ({
  header,
  lineItems: lineItems.map(({ header: _header, ...fields }) => fields),
  summary,
  warnings,
});

const identityRow = (header: InvoiceHeader): HeaderIdentityRow => ({
  report_entity: header.reportEntity,
  transaction_date: header.transactionDate,
  invoice_id: header.invoiceId,
  dun_id: header.dunId,
  invoice_to: header.invoiceTo,
  sold_to: header.soldTo,
  ship_to: header.shipTo,
});

export const toLineRows = ({ header, lineItems }: ParsedInvoice): LineRow[] =>
  lineItems.map((item) => ({
    ...identityRow(header),
    currency: header.currency,
    customer_id: header.customerId,
    sales_order_id: header.salesOrderId,
    customer_po: header.customerPo,
    terms_str: header.terms,
    cartons_count: header.cartonsCount,
    cartons_net_weight: header.cartonsNetWeight.value,
    cartons_net_weight_unit: header.cartonsNetWeight.unit,
    cartons_gross_weight: header.cartonsGrossWeight.value,
    cartons_gross_weight_unit: header.cartonsGrossWeight.unit,
    style_color: item.styleColor,
    style_color_descr: item.styleColorDescr,
    size: item.size,
    qty: item.qty,
    product_family: item.productFamily,
    country_of_origin: item.countryOfOrigin,
    rds_certified: item.rdsCertified ? 1 : 0,
    tariff_code: item.tariffCode,
    delivery_id: item.deliveryId,
    other_descr: item.otherDescr,
    price: item.price,
    ext_price: item.extPrice,
  }));

/** One row when the document reached its remittance page, none otherwise. */
export const toSummaryRows = ({ header, summary }: ParsedInvoice): SummaryRow[] =>
  summary === null
    ? []
    : [
        {
          ...identityRow(header),
          total_units: summary.totalUnits,
          merchandise_total: summary.merchandiseTotal.value,
          merchandise_total_unit: summary.merchandiseTotal.unit,
          freight_total: summary.freightTotal.value,
          freight_total_unit: summary.freightTotal.unit,
          total_invoice: summary.totalInvoice.value,
          total_invoice_unit: summary.totalInvoice.unit,
        },
      ];

export const toInvoiceRows = (invoice: ParsedInvoice): InvoiceRows => ({
  lines: toLineRows(invoice),
  summary: toSummaryRows(invoice),
  warnings: invoice.warnings,
});
