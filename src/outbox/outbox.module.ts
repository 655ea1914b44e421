import { Module } from '@nestjs/common';
import { BrokerModule } from '../broker/broker.module';
import { OutboxService } from './outbox.service';
import { OutboxRelay } from './outbox.relay';

@Module({
  imports: [BrokerModule],
  providers: [OutboxService, OutboxRelay],
  exports: [OutboxService],
})
export class OutboxModule {}
