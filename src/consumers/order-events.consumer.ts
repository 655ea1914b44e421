import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BrokerService, EventHandlers } from '../broker/broker.service';
import { AppConfiguration } from '../config/configuration';
import { OrderStatus } from '../entities/order.entity';
import { OrdersGateway } from '../orders/orders.gateway';
import { OrdersService } from '../orders/orders.service';
import { DeliveryCreatedEventDto, OrderEventDto } from './dto/order-event.dto';
import { parseEvent } from './parse-event';

export const OrderEvents = {
  ORDER_RESERVED: 'orders.order_reserved',
  ORDER_REJECTED: 'orders.order_rejected',
  ORDER_CANCELLED: 'orders.order_cancelled',
  DELIVERY_CREATED: 'orders.delivery_created',
  DELIVERY_SUCCESS: 'orders.delivery_success',
} as const;

/**
 * Applies the inventory and delivery services' answers to orders and pushes
 * each change to the order's real-time subscribers.
 */
@Injectable()
export class OrderEventsConsumer implements OnModuleInit {
  private readonly logger = new Logger(OrderEventsConsumer.name);
  private readonly queue: string;

  constructor(
    private brokerService: BrokerService,
    private ordersService: OrdersService,
    private ordersGateway: OrdersGateway,
    configService: ConfigService<AppConfiguration, true>,
  ) {
    this.queue = configService.get('broker', { infer: true }).queue;
  }

  async onModuleInit() {
    await this.brokerService.subscribe(this.queue, this.handlers());
  }

  handlers(): EventHandlers {
    return {
      [OrderEvents.ORDER_RESERVED]: (payload) => this.changeStatus(payload, OrderStatus.RESERVED),
      [OrderEvents.ORDER_REJECTED]: (payload) => this.changeStatus(payload, OrderStatus.REJECTED),
      [OrderEvents.ORDER_CANCELLED]: (payload) => this.changeStatus(payload, OrderStatus.CANCELLED),
      [OrderEvents.DELIVERY_CREATED]: (payload) => this.deliveryCreated(payload),
      [OrderEvents.DELIVERY_SUCCESS]: (payload) => this.changeStatus(payload, OrderStatus.DELIVERED),
    };
  }

  private async changeStatus(payload: unknown, status: OrderStatus): Promise<void> {
    const event = await parseEvent(OrderEventDto, payload);
    await this.ordersService.updateStatus(event.order_id, status);
    this.logger.log(`Order ${event.order_id} is now ${status}`);
    this.ordersGateway.notifyOrderUpdated(event.order_id, { status });
  }

  private async deliveryCreated(payload: unknown): Promise<void> {
    const event = await parseEvent(DeliveryCreatedEventDto, payload);
    await this.ordersService.assignDelivery(event.order_id, event.delivery_id);
    this.logger.log(`Order ${event.order_id} assigned to delivery ${event.delivery_id}`);
    this.ordersGateway.notifyOrderUpdated(event.order_id, { deliveryId: event.delivery_id });
  }
}
