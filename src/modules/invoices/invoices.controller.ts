import { Controller } from '@nestjs/common';
import { MessagePattern, Payload } from '@nestjs/microservices';

import { InvoiceParserSubjects } from '../../config/services';
import { InvoicesService } from './invoices.service';
import { ParseBatchDto, ParseInvoiceDto } from './dto';

@Controller()
export class InvoicesController {
  constructor(private readonly invoicesService: InvoicesService) {}

  @MessagePattern(InvoiceParserSubjects.parse)
  parse(@Payload() payload: ParseInvoiceDto) {
    return this.invoicesService.parse(payload);
  }

  @MessagePattern(InvoiceParserSubjects.parseBatch)
  parseBatch(@Payload() payload: ParseBatchDto) {
    return this.invoicesService.parseBatch(payload);
  }

  @MessagePattern(InvoiceParserSubjects.health)
  health() {
    return this.invoicesService.health();
  }
}
