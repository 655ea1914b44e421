import { Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { Cart } from '../entities/cart.entity';
import { CartItem } from '../entities/cart-item.entity';
import { InventoryClient } from '../clients/inventory.client';
import { SaveCartDto } from './dto/cart.dto';
import { normalizeLines, totalPrice } from './cart-pricing';

export interface CartWithItems {
  cart: Cart;
  cartItems: CartItem[];
  totalPrice: number;
}

export interface CreatedCart {
  cart: Cart;
  cartItems: CartItem[];
}

export interface UpdatedCart {
  deletedItems: CartItem[];
  updatedItems: CartItem[];
  updatedCart: Cart;
}

@Injectable()
export class CartsService {
  constructor(
    @InjectRepository(Cart)
    private cartRepository: Repository<Cart>,
    @InjectRepository(CartItem)
    private cartItemRepository: Repository<CartItem>,
    private dataSource: DataSource,
    private inventoryClient: InventoryClient,
  ) {}

  async findAll(): Promise<Cart[]> {
    return this.cartRepository.find({ order: { id: 'ASC' } });
  }

  async findOne(id: number, patientId: number): Promise<CartWithItems> {
    const cart = await this.cartRepository.findOne({ where: { id, patientId } });
    if (!cart) {
      throw new NotFoundException('Cart not found');
    }

    const cartItems = await this.cartItemRepository.find({
      where: { cartId: cart.id },
      order: { productId: 'ASC' },
    });
    const unitPrices = await this.inventoryClient.getUnitPrices(cartItems.map((item) => item.productId));

    return { cart, cartItems, totalPrice: totalPrice(cartItems, unitPrices) };
  }

  async findMine(patientId: number): Promise<CartWithItems[]> {
    const carts = await this.cartRepository.find({ where: { patientId }, order: { id: 'ASC' } });
    if (carts.length === 0) {
      return [];
    }

    const items = await this.cartItemRepository.find({
      where: { cartId: In(carts.map((cart) => cart.id)) },
      order: { productId: 'ASC' },
    });
    const unitPrices = await this.inventoryClient.getUnitPrices(items.map((item) => item.productId));

    const itemsByCart = new Map<number, CartItem[]>();
    for (const item of items) {
      const group = itemsByCart.get(item.cartId) ?? [];
      group.push(item);
      itemsByCart.set(item.cartId, group);
    }

    return carts.map((cart) => {
      const cartItems = itemsByCart.get(cart.id) ?? [];
      return { cart, cartItems, totalPrice: totalPrice(cartItems, unitPrices) };
    });
  }

  async create(patientId: number, dto: SaveCartDto): Promise<CreatedCart> {
    return this.dataSource.transaction(async (manager) => {
      const cart = await manager.save(manager.create(Cart, { patientId }));

      const lines = normalizeLines(dto.cartItems);
      if (lines.length === 0) {
        return { cart, cartItems: [] };
      }

      const cartItems = await manager.save(
        lines.map((line) => manager.create(CartItem, { cartId: cart.id, ...line })),
      );
      return { cart, cartItems };
    });
  }

  /**
   * Replaces the cart's content: products missing from the body are removed,
   * the others are inserted or get their quantity overwritten.
   */
  async update(id: number, patientId: number, dto: SaveCartDto): Promise<UpdatedCart> {
    return this.dataSource.transaction(async (manager) => {
      const cart = await manager.findOne(Cart, {
        where: { id, patientId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!cart) {
        throw new NotFoundException('Cart not found');
      }

      const lines = normalizeLines(dto.cartItems);
      const keep = new Set(lines.map((line) => line.productId));

      const existing = await manager.find(CartItem, { where: { cartId: id } });
      const deletedItems = existing.filter((item) => !keep.has(item.productId));
      if (deletedItems.length > 0) {
        await manager.delete(CartItem, {
          cartId: id,
          productId: In(deletedItems.map((item) => item.productId)),
        });
      }

      if (lines.length > 0) {
        await manager
          .createQueryBuilder()
          .insert()
          .into(CartItem)
          .values(lines.map((line) => ({ cartId: id, ...line })))
          .orUpdate(['quantity'], ['cart_id', 'product_id'])
          .execute();
      }

      await manager.update(Cart, { id }, { updatedAt: () => 'NOW()' });

      const updatedCart = (await manager.findOne(Cart, { where: { id } })) ?? cart;
      const updatedItems = await manager.find(CartItem, {
        where: { cartId: id },
        order: { productId: 'ASC' },
      });

      return { deletedItems, updatedItems, updatedCart };
    });
  }

  /** Hard delete; items, orders and payments go with it. */
  async remove(id: number, patientId: number): Promise<Cart> {
    const cart = await this.cartRepository.findOne({ where: { id, patientId } });
    if (!cart) {
      throw new NotFoundException('Cart not found');
    }

    await this.cartRepository.delete({ id, patientId });
    return cart;
  }
}
