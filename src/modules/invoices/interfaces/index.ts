export * from './invoice.interface';
export * from './parse-result.interface';
