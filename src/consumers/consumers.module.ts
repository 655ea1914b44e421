import { Module } from '@nestjs/common';
import { BrokerModule } from '../broker/broker.module';
import { OrdersModule } from '../orders/orders.module';
import { OrderEventsConsumer } from './order-events.consumer';

@Module({
  imports: [BrokerModule, OrdersModule],
  providers: [OrderEventsConsumer],
})
export class ConsumersModule {}
