import type { Measure, TableGrid } from '../interfaces';
import { asInteger, asText, extractFromText, FIELD_PATTERNS } from './field-extractor';

/** Header values that some documents print as a table instead of running text. */
export interface TableHeaderFields {
  customerId?: string;
  salesOrderId?: string;
  customerPo?: string;
  cartonsCount?: number;
  cartonsNetWeight?: Measure;
  cartonsGrossWeight?: Measure;
}

type ColumnField = 'customerId' | 'salesOrderId' | 'customerPo';

const COLUMN_FIELDS: ReadonlyArray<{ label: string; field: ColumnField; pattern: RegExp }> = [
  { label: 'CUSTOMER #', field: 'customerId', pattern: FIELD_PATTERNS.eightDigits },
  { label: 'SALES ORDER #', field: 'salesOrderId', pattern: FIELD_PATTERNS.nineDigits },
  { label: 'CUSTOMER PO', field: 'customerPo', pattern: FIELD_PATTERNS.anything },
];

const CARTONS_LABEL = 'NO. OF CARTONS';
const NET_WEIGHT_LABEL = 'NET WEIGHT';
const GROSS_WEIGHT_LABEL = 'GROSS WEIGHT';

const weightRegex = /(?<value>\d+(?:\.\d+)?)\s*(?<unit>[A-Z]{2})?\b/;

const readMeasure = (text: string): Measure | undefined => {
  const match = weightRegex.exec(text.replace(/,/g, ''));
  const value = match?.groups?.['value'];
  if (value === undefined) {
    return undefined;
  }
  return { value: Number.parseFloat(value), unit: match?.groups?.['unit'] ?? '' };
};

/**
 * The value of a labelled cell: text after the label inside the same cell, else the next
 * cell on the row, else the first cell of the following row.
 */
const labelledValue = (grid: TableGrid, row: number, col: number, label: string): string => {
  const cell = grid[row][col].trim();
  const inline = cell.slice(cell.toUpperCase().indexOf(label) + label.length).replace(/^\s*:/, '');
  if (inline.trim()) {
    return inline.trim();
  }
  if (col + 1 < grid[row].length) {
    return grid[row][col + 1].trim();
  }
  const next = grid[row + 1];
  return next && next.length > 0 ? next[0].trim() : '';
};

const readColumnFields = (grid: TableGrid, fields: TableHeaderFields) => {
  if (grid.length < 2) {
    return;
  }
  const headings = grid[0].map((cell) => cell.trim().toUpperCase());
  const values = grid[1];

  headings.forEach((heading, idx) => {
    const column = COLUMN_FIELDS.find((candidate) => heading.includes(candidate.label));
    if (!column || fields[column.field] !== undefined || idx >= values.length) {
      return;
    }
    const result = extractFromText<string | null>(values[idx], {
      field: column.field,
      pattern: column.pattern,
      coerce: asText,
      fallback: null,
    });
    if (result.present && result.value !== null) {
      fields[column.field] = result.value;
    }
  });
};

const readLabelledCells = (grid: TableGrid, fields: TableHeaderFields) => {
  grid.forEach((cells, row) => {
    cells.forEach((cell, col) => {
      const upper = cell.trim().toUpperCase();

      if (fields.cartonsCount === undefined && upper.includes(CARTONS_LABEL)) {
        const digits = /\d+/.exec(labelledValue(grid, row, col, CARTONS_LABEL).replace(/,/g, ''));
        const count = digits ? asInteger(digits[0]) : null;
        if (count !== null) {
          fields.cartonsCount = count;
        }
      }
      if (fields.cartonsGrossWeight === undefined && upper.includes(GROSS_WEIGHT_LABEL)) {
        fields.cartonsGrossWeight = readMeasure(labelledValue(grid, row, col, GROSS_WEIGHT_LABEL));
      }
      if (fields.cartonsNetWeight === undefined && upper.includes(NET_WEIGHT_LABEL)) {
        fields.cartonsNetWeight = readMeasure(labelledValue(grid, row, col, NET_WEIGHT_LABEL));
      }
    });
  });
};

/** Reads header fields from a page's table grids. Earlier grids win over later ones. */
export const readTableHeaderFields = (grids: readonly TableGrid[]): TableHeaderFields => {
  const fields: TableHeaderFields = {};
  for (const grid of grids) {
    readColumnFields(grid, fields);
    readLabelledCells(grid, fields);
  }
  return fields;
};
