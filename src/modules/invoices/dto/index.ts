export * from './raw-page.dto';
export * from './parse-invoice.dto';
export * from './parse-batch.dto';
