import { ConflictException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { Order, OrderStatus, OrderType } from '../entities/order.entity';
import { Payment, PaymentStatus } from '../entities/payment.entity';
import { OutboxService } from '../outbox/outbox.service';
import { PaymentsService } from './payments.service';

const PAYMENT_ID = '0d6f3a8e-1b2c-4d5e-8f90-123456789abc';
const at = new Date('2025-10-17T10:00:00Z');

function payment(): Payment {
  return {
    id: PAYMENT_ID,
    orderId: 11,
    amount: 9,
    status: PaymentStatus.PENDING,
    provider: 'qr_payment',
    providerRef: null,
    failureReason: null,
    createdAt: at,
    updatedAt: at,
  };
}

function order(status: OrderStatus): Order {
  return {
    id: 11,
    cartId: 3,
    patientId: 42,
    status,
    orderType: OrderType.DELIVERY,
    deliveryId: null,
    deliveryAddress: { id: 8, street: '1 Main St' },
    createdAt: at,
    updatedAt: at,
    deletedAt: null,
  };
}

describe('PaymentsService', () => {
  let service: PaymentsService;

  const outboxService = { publish: jest.fn() };
  const manager = { findOne: jest.fn(), save: jest.fn() };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    manager.save.mockImplementation(async (entity: object) => entity);

    const moduleRef = await Test.createTestingModule({
      providers: [
        PaymentsService,
        { provide: DataSource, useValue: dataSource },
        { provide: OutboxService, useValue: outboxService },
      ],
    }).compile();

    service = moduleRef.get(PaymentsService);
  });

  it('marks the payment paid and requests the delivery', async () => {
    manager.findOne.mockResolvedValueOnce(payment()).mockResolvedValueOnce(order(OrderStatus.PAYMENT_PENDING));

    const result = await service.mockPay(PAYMENT_ID);

    expect(manager.findOne).toHaveBeenNthCalledWith(1, Payment, {
      where: { id: PAYMENT_ID, status: PaymentStatus.PENDING },
      lock: { mode: 'pessimistic_write' },
    });
    expect(result.updatedPayment.status).toBe(PaymentStatus.PAID);
    expect(result.updatedOrder.status).toBe(OrderStatus.DELIVERY_PENDING);
    expect(outboxService.publish).toHaveBeenCalledWith(manager, 'delivery.order_request', {
      delivery_address: { id: 8, street: '1 Main St' },
      order_id: 11,
      order_type: 'DELIVERY',
    });
  });

  it('returns 404 when no pending payment has this id', async () => {
    manager.findOne.mockResolvedValueOnce(null);

    await expect(service.mockPay(PAYMENT_ID)).rejects.toThrow(NotFoundException);
    expect(manager.save).not.toHaveBeenCalled();
  });

  it('refuses orders that are not awaiting payment', async () => {
    manager.findOne.mockResolvedValueOnce(payment()).mockResolvedValueOnce(order(OrderStatus.CANCEL_PENDING));

    await expect(service.mockPay(PAYMENT_ID)).rejects.toThrow(ConflictException);
    expect(outboxService.publish).not.toHaveBeenCalled();
  });
});
