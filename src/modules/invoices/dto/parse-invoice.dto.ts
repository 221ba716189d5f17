import { Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

import { RawPageDto } from './raw-page.dto';

export const INVOICE_FORMATS = ['structured', 'rows'] as const;
export type InvoiceFormat = (typeof INVOICE_FORMATS)[number];

export class ParseInvoiceDto {
  @IsOptional()
  @IsString()
  documentId?: string;

  @IsArray()
  @ArrayMinSize(1, { message: 'A document needs at least one page' })
  @ValidateNested({ each: true })
  @Type(() => RawPageDto)
  pages!: RawPageDto[];

  @IsOptional()
  @IsBoolean()
  preferTableGrids?: boolean;

  @IsOptional()
  @IsIn(INVOICE_FORMATS)
  format?: InvoiceFormat;
}
