export const NATS_SERVICE = 'NATS_SERVICE';
export const PARSER_OPTIONS = 'PARSER_OPTIONS';

export const InvoiceParserSubjects = {
  parse: 'invoice-parser.parse',
  parseBatch: 'invoice-parser.parseBatch',
  health: 'invoice-parser.health.check',
} as const;

export const InvoiceParserEvents = {
  parsed: 'invoices.parsed',
} as const;
