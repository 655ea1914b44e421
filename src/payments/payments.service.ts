import { ConflictException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Order, OrderStatus } from '../entities/order.entity';
import { Payment, PaymentStatus } from '../entities/payment.entity';
import { OutboxService } from '../outbox/outbox.service';
import { DeliveryEvents, DeliveryRequestPayload } from '../orders/order-events';

export interface PaidPayment {
  updatedPayment: Payment;
  updatedOrder: Order;
}

@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(
    private dataSource: DataSource,
    private outboxService: OutboxService,
  ) {}

  /**
   * Settles a pending payment without a real provider and hands the order
   * over to the delivery service.
   */
  async mockPay(id: string): Promise<PaidPayment> {
    const result = await this.dataSource.transaction(async (manager) => {
      const payment = await manager.findOne(Payment, {
        where: { id, status: PaymentStatus.PENDING },
        lock: { mode: 'pessimistic_write' },
      });
      if (!payment) {
        throw new NotFoundException('Pending payment not found');
      }

      const order = await manager.findOne(Order, {
        where: { id: payment.orderId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!order || order.status !== OrderStatus.PAYMENT_PENDING) {
        throw new ConflictException('Order is not awaiting payment');
      }

      payment.status = PaymentStatus.PAID;
      const updatedPayment = await manager.save(payment);
      order.status = OrderStatus.DELIVERY_PENDING;
      const updatedOrder = await manager.save(order);

      const request: DeliveryRequestPayload = {
        delivery_address: order.deliveryAddress,
        order_id: order.id,
        order_type: order.orderType,
      };
      await this.outboxService.publish(manager, DeliveryEvents.ORDER_REQUEST, request);

      return { updatedPayment, updatedOrder };
    });

    this.logger.log(`Payment ${id} paid, order ${result.updatedOrder.id} awaiting delivery`);
    return result;
  }
}
