import { Transform } from 'class-transformer';
import {
  buildMessage,
  IsInt,
  IsOptional,
  IsString,
  Min,
  ValidateBy,
  ValidationOptions,
} from 'class-validator';

import type { RawPage } from '../interfaces';

const asCell = (cell: unknown): unknown =>
  typeof cell === 'number' || typeof cell === 'boolean' ? String(cell) : cell ?? '';

// Table extractors emit numeric and empty cells; the parser only reads strings.
const normalizeGrids = (value: unknown): unknown =>
  Array.isArray(value)
    ? value.map((grid: unknown) =>
        Array.isArray(grid)
          ? grid.map((row: unknown) => (Array.isArray(row) ? row.map(asCell) : row))
          : grid,
      )
    : value;

export const isTableGrids = (value: unknown): value is string[][][] =>
  Array.isArray(value) &&
  value.every(
    (grid: unknown) =>
      Array.isArray(grid) &&
      grid.every(
        (row: unknown) =>
          Array.isArray(row) && row.every((cell: unknown) => typeof cell === 'string'),
      ),
  );

export const IsTableGrids = (validationOptions?: ValidationOptions): PropertyDecorator =>
  ValidateBy(
    {
      name: 'isTableGrids',
      validator: {
        validate: (value: unknown) => isTableGrids(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a list of grids made of rows of text cells`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );

export class RawPageDto implements RawPage {
  @IsInt()
  @Min(0)
  pageIndex!: number;

  @IsString()
  text!: string;

  @IsOptional()
  @Transform(({ value }) => normalizeGrids(value))
  @IsTableGrids()
  tableGrids?: string[][][];
}
