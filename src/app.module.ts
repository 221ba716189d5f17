import { Module } from '@nestjs/common';

import { InvoicesModule } from './modules/invoices/invoices.module';
import { NatsModule } from './transports/nats.module';

@Module({
  imports: [NatsModule, InvoicesModule],
})
export class AppModule {}
