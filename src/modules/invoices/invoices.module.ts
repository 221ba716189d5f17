import { Module } from '@nestjs/common';

import { envs, PARSER_OPTIONS } from '../../config';
import { NatsModule } from '../../transports/nats.module';
import type { ParserOptions } from './interfaces';
import { InvoicesController } from './invoices.controller';
import { InvoicesService } from './invoices.service';
import { HeaderResolver } from './parser/header-resolver';
import { InvoiceAssembler } from './parser/invoice-assembler';
import { LineItemWalker } from './parser/line-item-walker';
import { SummaryResolver } from './parser/summary-resolver';

@Module({
  imports: [NatsModule],
  controllers: [InvoicesController],
  providers: [
    InvoicesService,
    InvoiceAssembler,
    HeaderResolver,
    LineItemWalker,
    SummaryResolver,
    {
      provide: PARSER_OPTIONS,
      useFactory: (): ParserOptions => ({
        deliverySearchCap: envs.deliverySearchCap,
        preferTableGrids: envs.preferTableGrids,
      }),
    },
  ],
})
export class InvoicesModule {}
