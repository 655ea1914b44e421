import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, In, IsNull } from 'typeorm';
import { Cart } from '../entities/cart.entity';
import { CartItem } from '../entities/cart-item.entity';
import { Order, OrderStatus, OrderType } from '../entities/order.entity';
import { Payment, PaymentStatus } from '../entities/payment.entity';
import { InventoryClient } from '../clients/inventory.client';
import { DeliveryClient } from '../clients/delivery.client';
import { OutboxService } from '../outbox/outbox.service';
import { OrdersService } from './orders.service';

const at = new Date('2025-10-17T10:00:00Z');

function order(overrides: Partial<Order> = {}): Order {
  return {
    id: 11,
    cartId: 3,
    patientId: 42,
    status: OrderStatus.PENDING,
    orderType: OrderType.PICKUP,
    deliveryId: null,
    deliveryAddress: null,
    createdAt: at,
    updatedAt: at,
    deletedAt: null,
    ...overrides,
  };
}

function item(cartId: number, productId: number, quantity: number): CartItem {
  return { cartId, productId, quantity, createdAt: at, updatedAt: at };
}

describe('OrdersService', () => {
  let service: OrdersService;

  const orderRepository = { find: jest.fn(), findOne: jest.fn(), save: jest.fn() };
  const cartRepository = { findOne: jest.fn() };
  const cartItemRepository = { find: jest.fn() };
  const outboxService = { publish: jest.fn() };
  const inventoryClient = { getUnitPrices: jest.fn() };
  const deliveryClient = { getOwnedDeliveryAddress: jest.fn() };
  const manager = {
    create: jest.fn((_entity: unknown, data: object) => ({ ...data })),
    save: jest.fn(),
    find: jest.fn(),
    findOne: jest.fn(),
  };
  const dataSource = {
    transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    inventoryClient.getUnitPrices.mockResolvedValue(
      new Map([
        [1, 2.5],
        [2, 4],
      ]),
    );
    manager.save.mockImplementation(async (entity: object) => entity);

    const moduleRef = await Test.createTestingModule({
      providers: [
        OrdersService,
        { provide: getRepositoryToken(Order), useValue: orderRepository },
        { provide: getRepositoryToken(Cart), useValue: cartRepository },
        { provide: getRepositoryToken(CartItem), useValue: cartItemRepository },
        { provide: DataSource, useValue: dataSource },
        { provide: OutboxService, useValue: outboxService },
        { provide: InventoryClient, useValue: inventoryClient },
        { provide: DeliveryClient, useValue: deliveryClient },
      ],
    }).compile();

    service = moduleRef.get(OrdersService);
  });

  describe('findMine', () => {
    it('attaches the items of each order cart, most recently updated first', async () => {
      orderRepository.find.mockResolvedValue([order({ id: 12, cartId: 4 }), order({ id: 11, cartId: 3 })]);
      cartItemRepository.find.mockResolvedValue([item(3, 1, 2), item(4, 2, 1)]);

      const result = await service.findMine(42);

      expect(orderRepository.find).toHaveBeenCalledWith({ where: { patientId: 42 }, order: { updatedAt: 'DESC' } });
      expect(cartItemRepository.find).toHaveBeenCalledWith({
        where: { cartId: In([4, 3]) },
        order: { productId: 'ASC' },
      });
      expect(result.map((entry) => [entry.order.id, entry.orderItems, entry.totalPrice])).toEqual([
        [12, [item(4, 2, 1)], 4],
        [11, [item(3, 1, 2)], 5],
      ]);
    });
  });

  describe('findOne', () => {
    it('returns 404 for orders of other patients', async () => {
      orderRepository.findOne.mockResolvedValue(null);

      await expect(service.findOne(11, 7)).rejects.toThrow(NotFoundException);
      expect(orderRepository.findOne).toHaveBeenCalledWith({ where: { id: 11, patientId: 7 } });
    });

    it('prices the order from its cart items', async () => {
      orderRepository.findOne.mockResolvedValue(order());
      cartItemRepository.find.mockResolvedValue([item(3, 1, 2), item(3, 2, 3)]);

      const result = await service.findOne(11, 42);

      expect(result.totalPrice).toBe(17);
    });
  });

  describe('create', () => {
    beforeEach(() => {
      cartRepository.findOne.mockResolvedValue({ id: 3, patientId: 42, createdAt: at, updatedAt: at });
      manager.find.mockResolvedValue([item(3, 1, 2), item(3, 2, 1)]);
      manager.save.mockImplementation(async (entity: object) => ({ id: 11, ...entity }));
    });

    it('inserts a pending order and stages the reservation request', async () => {
      const result = await service.create(42, { cartId: 3 });

      expect(manager.create).toHaveBeenCalledWith(Order, {
        cartId: 3,
        patientId: 42,
        status: OrderStatus.PENDING,
        orderType: OrderType.PICKUP,
        deliveryAddress: null,
      });
      expect(outboxService.publish).toHaveBeenCalledWith(manager, 'inventory.reserve_order', {
        order_id: 11,
        order_items: [
          { product_id: 1, quantity: 2 },
          { product_id: 2, quantity: 1 },
        ],
      });
      expect(result.id).toBe(11);
    });

    it('snapshots the delivery address of delivery orders', async () => {
      const address = { id: 8, patient_id: 42, street: '1 Main St' };
      deliveryClient.getOwnedDeliveryAddress.mockResolvedValue(address);

      await service.create(42, { cartId: 3, orderType: OrderType.DELIVERY, deliveryAddressId: 8 });

      expect(deliveryClient.getOwnedDeliveryAddress).toHaveBeenCalledWith(8, 42);
      expect(manager.create).toHaveBeenCalledWith(Order, expect.objectContaining({ deliveryAddress: address }));
    });

    it('requires an address for delivery orders', async () => {
      await expect(service.create(42, { cartId: 3, orderType: OrderType.DELIVERY })).rejects.toThrow(
        BadRequestException,
      );
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });

    it('propagates the ownership check of the delivery address', async () => {
      deliveryClient.getOwnedDeliveryAddress.mockRejectedValue(
        new ForbiddenException('Patient does not own this delivery address'),
      );

      await expect(service.create(42, { cartId: 3, deliveryAddressId: 8 })).rejects.toThrow(ForbiddenException);
      expect(outboxService.publish).not.toHaveBeenCalled();
    });

    it('rejects carts of other patients', async () => {
      cartRepository.findOne.mockResolvedValue(null);

      await expect(service.create(7, { cartId: 3 })).rejects.toThrow(NotFoundException);
      expect(cartRepository.findOne).toHaveBeenCalledWith({ where: { id: 3, patientId: 7 } });
    });
  });

  describe('cancel', () => {
    it('moves a reserved order to CANCEL_PENDING and asks the inventory to release it', async () => {
      manager.findOne.mockResolvedValue(order({ status: OrderStatus.RESERVED }));
      manager.find.mockResolvedValue([item(3, 1, 2)]);

      const result = await service.cancel(11, 42);

      expect(manager.findOne).toHaveBeenCalledWith(Order, {
        where: { id: 11, patientId: 42, status: OrderStatus.RESERVED, deletedAt: IsNull() },
        lock: { mode: 'pessimistic_write' },
      });
      expect(result.status).toBe(OrderStatus.CANCEL_PENDING);
      expect(result.deletedAt).toBeInstanceOf(Date);
      expect(outboxService.publish).toHaveBeenCalledWith(manager, 'inventory.cancel_order', {
        order_id: 11,
        order_items: [{ product_id: 1, quantity: 2 }],
      });
    });

    it('returns 404 when no active reserved order matches', async () => {
      manager.findOne.mockResolvedValue(null);

      await expect(service.cancel(11, 42)).rejects.toThrow(NotFoundException);
      expect(outboxService.publish).not.toHaveBeenCalled();
    });
  });

  describe('createPayment', () => {
    it('rejects unknown providers', async () => {
      await expect(service.createPayment(11, 42, { provider: 'cash' })).rejects.toThrow(
        'cash is not a valid payment provider',
      );
      expect(orderRepository.findOne).not.toHaveBeenCalled();
    });

    it('returns 404 unless the order is reserved', async () => {
      orderRepository.findOne.mockResolvedValue(null);

      await expect(service.createPayment(11, 42, { provider: 'qr_payment' })).rejects.toThrow(NotFoundException);
      expect(orderRepository.findOne).toHaveBeenCalledWith({
        where: { id: 11, patientId: 42, status: OrderStatus.RESERVED },
      });
    });

    it('opens a pending payment for the order total', async () => {
      orderRepository.findOne.mockResolvedValue(order({ status: OrderStatus.RESERVED }));
      cartItemRepository.find.mockResolvedValue([item(3, 1, 2), item(3, 2, 1)]);
      manager.findOne.mockResolvedValue(order({ status: OrderStatus.RESERVED }));

      const result = await service.createPayment(11, 42, { provider: 'qr_payment' });

      expect(manager.create).toHaveBeenCalledWith(Payment, {
        orderId: 11,
        amount: 9,
        status: PaymentStatus.PENDING,
        provider: 'qr_payment',
      });
      expect(result.updatedOrder.status).toBe(OrderStatus.PAYMENT_PENDING);
      expect(result.payment).toEqual({ orderId: 11, amount: 9, status: PaymentStatus.PENDING, provider: 'qr_payment' });
    });

    it('reports a conflict when the order moved on before the lock', async () => {
      orderRepository.findOne.mockResolvedValue(order({ status: OrderStatus.RESERVED }));
      cartItemRepository.find.mockResolvedValue([]);
      manager.findOne.mockResolvedValue(null);

      await expect(service.createPayment(11, 42, { provider: 'qr_payment' })).rejects.toThrow(ConflictException);
    });
  });

  describe('event-driven updates', () => {
    it('updates the status of a known order', async () => {
      orderRepository.findOne.mockResolvedValue(order());
      orderRepository.save.mockImplementation(async (entity: Order) => entity);

      const result = await service.updateStatus(11, OrderStatus.RESERVED);

      expect(result.status).toBe(OrderStatus.RESERVED);
    });

    it('records the delivery id', async () => {
      orderRepository.findOne.mockResolvedValue(order());
      orderRepository.save.mockImplementation(async (entity: Order) => entity);

      const result = await service.assignDelivery(11, '5b0c7f2e-8d7a-4c3e-9f62-0a1b2c3d4e5f');

      expect(result.deliveryId).toBe('5b0c7f2e-8d7a-4c3e-9f62-0a1b2c3d4e5f');
    });

    it('fails for unknown orders', async () => {
      orderRepository.findOne.mockResolvedValue(null);

      await expect(service.updateStatus(99, OrderStatus.DELIVERED)).rejects.toThrow(NotFoundException);
    });
  });
});
