import { BadRequestException, ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, IsNull, Repository } from 'typeorm';
import { Cart } from '../entities/cart.entity';
import { CartItem } from '../entities/cart-item.entity';
import { DeliveryAddress, Order, OrderStatus, OrderType } from '../entities/order.entity';
import { Payment, PaymentProvider, PaymentStatus } from '../entities/payment.entity';
import { InventoryClient } from '../clients/inventory.client';
import { DeliveryClient } from '../clients/delivery.client';
import { OutboxService } from '../outbox/outbox.service';
import { totalPrice } from '../carts/cart-pricing';
import { CreateOrderDto, CreatePaymentDto } from './dto/create-order.dto';
import { InventoryEvents, InventoryOrderPayload } from './order-events';

export interface OrderWithItems {
  order: Order;
  orderItems: CartItem[];
  totalPrice: number;
}

export interface CreatedPayment {
  payment: Payment;
  updatedOrder: Order;
}

const PAYMENT_PROVIDERS: string[] = [PaymentProvider.QR_PAYMENT];

function toInventoryPayload(orderId: number, items: CartItem[]): InventoryOrderPayload {
  return {
    order_id: orderId,
    order_items: items.map((item) => ({ product_id: item.productId, quantity: item.quantity })),
  };
}

@Injectable()
export class OrdersService {
  constructor(
    @InjectRepository(Order)
    private orderRepository: Repository<Order>,
    @InjectRepository(Cart)
    private cartRepository: Repository<Cart>,
    @InjectRepository(CartItem)
    private cartItemRepository: Repository<CartItem>,
    private dataSource: DataSource,
    private outboxService: OutboxService,
    private inventoryClient: InventoryClient,
    private deliveryClient: DeliveryClient,
  ) {}

  async findAll(): Promise<Order[]> {
    return this.orderRepository.find({ order: { id: 'ASC' } });
  }

  async findMine(patientId: number): Promise<OrderWithItems[]> {
    const orders = await this.orderRepository.find({
      where: { patientId },
      order: { updatedAt: 'DESC' },
    });
    if (orders.length === 0) {
      return [];
    }

    const items = await this.cartItemRepository.find({
      where: { cartId: In([...new Set(orders.map((order) => order.cartId))]) },
      order: { productId: 'ASC' },
    });
    const unitPrices = await this.inventoryClient.getUnitPrices(items.map((item) => item.productId));

    return orders.map((order) => {
      const orderItems = items.filter((item) => item.cartId === order.cartId);
      return { order, orderItems, totalPrice: totalPrice(orderItems, unitPrices) };
    });
  }

  async findOne(id: number, patientId: number): Promise<OrderWithItems> {
    const order = await this.orderRepository.findOne({ where: { id, patientId } });
    if (!order) {
      throw new NotFoundException('Order not found');
    }
    return this.withItems(order);
  }

  /** Lookup for other services: no ownership check. */
  async findById(id: number): Promise<OrderWithItems> {
    const order = await this.orderRepository.findOne({ where: { id } });
    if (!order) {
      throw new NotFoundException('Order not found');
    }
    return this.withItems(order);
  }

  /**
   * Places an order on one of the patient's carts. The order starts PENDING
   * and asks the inventory to reserve the cart's products.
   */
  async create(patientId: number, dto: CreateOrderDto): Promise<Order> {
    const cart = await this.cartRepository.findOne({ where: { id: dto.cartId, patientId } });
    if (!cart) {
      throw new NotFoundException('Cart not found');
    }

    const orderType = dto.orderType ?? OrderType.PICKUP;
    let deliveryAddress: DeliveryAddress | null = null;
    if (dto.deliveryAddressId !== undefined) {
      deliveryAddress = await this.deliveryClient.getOwnedDeliveryAddress(dto.deliveryAddressId, patientId);
    }
    if (orderType === OrderType.DELIVERY && !deliveryAddress) {
      throw new BadRequestException('Delivery orders require a delivery address');
    }

    return this.dataSource.transaction(async (manager) => {
      const order = await manager.save(
        manager.create(Order, {
          cartId: cart.id,
          patientId,
          status: OrderStatus.PENDING,
          orderType,
          deliveryAddress,
        }),
      );

      const items = await this.cartItems(manager, cart.id);
      await this.outboxService.publish(manager, InventoryEvents.RESERVE_ORDER, toInventoryPayload(order.id, items));
      return order;
    });
  }

  /** Only a reserved, active order can be cancelled; the inventory then releases it. */
  async cancel(id: number, patientId: number): Promise<Order> {
    return this.dataSource.transaction(async (manager) => {
      const order = await manager.findOne(Order, {
        where: { id, patientId, status: OrderStatus.RESERVED, deletedAt: IsNull() },
        lock: { mode: 'pessimistic_write' },
      });
      if (!order) {
        throw new NotFoundException('Order not found or not cancellable');
      }

      order.status = OrderStatus.CANCEL_PENDING;
      order.deletedAt = new Date();
      const updatedOrder = await manager.save(order);

      const items = await this.cartItems(manager, order.cartId);
      await this.outboxService.publish(manager, InventoryEvents.CANCEL_ORDER, toInventoryPayload(order.id, items));
      return updatedOrder;
    });
  }

  async createPayment(id: number, patientId: number, dto: CreatePaymentDto): Promise<CreatedPayment> {
    if (!PAYMENT_PROVIDERS.includes(dto.provider)) {
      throw new BadRequestException(`${dto.provider} is not a valid payment provider`);
    }

    const order = await this.orderRepository.findOne({
      where: { id, patientId, status: OrderStatus.RESERVED },
    });
    if (!order) {
      throw new NotFoundException('Order not found or not awaiting payment');
    }
    const { totalPrice: amount } = await this.withItems(order);

    return this.dataSource.transaction(async (manager) => {
      // Re-read under lock: a consumer may have moved the order meanwhile
      const locked = await manager.findOne(Order, {
        where: { id, status: OrderStatus.RESERVED },
        lock: { mode: 'pessimistic_write' },
      });
      if (!locked) {
        throw new ConflictException('Order is no longer awaiting payment');
      }

      locked.status = OrderStatus.PAYMENT_PENDING;
      const updatedOrder = await manager.save(locked);
      const payment = await manager.save(
        manager.create(Payment, {
          orderId: id,
          amount,
          status: PaymentStatus.PENDING,
          provider: dto.provider,
        }),
      );
      return { payment, updatedOrder };
    });
  }

  /** Status change driven by another service's event. */
  async updateStatus(id: number, status: OrderStatus): Promise<Order> {
    const order = await this.orderRepository.findOne({ where: { id } });
    if (!order) {
      throw new NotFoundException(`Order ${id} not found`);
    }
    order.status = status;
    return this.orderRepository.save(order);
  }

  async assignDelivery(id: number, deliveryId: string): Promise<Order> {
    const order = await this.orderRepository.findOne({ where: { id } });
    if (!order) {
      throw new NotFoundException(`Order ${id} not found`);
    }
    order.deliveryId = deliveryId;
    return this.orderRepository.save(order);
  }

  private async withItems(order: Order): Promise<OrderWithItems> {
    const orderItems = await this.cartItemRepository.find({
      where: { cartId: order.cartId },
      order: { productId: 'ASC' },
    });
    const unitPrices = await this.inventoryClient.getUnitPrices(orderItems.map((item) => item.productId));
    return { order, orderItems, totalPrice: totalPrice(orderItems, unitPrices) };
  }

  private cartItems(manager: EntityManager, cartId: number): Promise<CartItem[]> {
    return manager.find(CartItem, { where: { cartId }, order: { productId: 'ASC' } });
  }
}
