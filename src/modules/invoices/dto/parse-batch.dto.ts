import { Type } from 'class-transformer';
import { IsArray, ValidateNested, ArrayMinSize, ArrayMaxSize } from 'class-validator';
import { ParseInvoiceDto } from './parse-invoice.dto';

export const MAX_BATCH_DOCUMENTS = 50;

export class ParseBatchDto {
  @IsArray()
  @ArrayMinSize(1, { message: 'A batch needs at least one document' })
  @ArrayMaxSize(MAX_BATCH_DOCUMENTS, { message: `A batch holds at most ${MAX_BATCH_DOCUMENTS} documents` })
  @ValidateNested({ each: true })
  @Type(() => ParseInvoiceDto)
  documents!: ParseInvoiceDto[];
}
