import { ApiProperty } from '@nestjs/swagger';
import { Entity, PrimaryColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Cart } from './cart.entity';

// Composite key: a product appears at most once per cart.
@Entity('cart_items')
export class CartItem {
  @ApiProperty()
  @PrimaryColumn({ name: 'cart_id', type: 'integer' })
  cartId!: number;

  @ApiProperty()
  @PrimaryColumn({ name: 'product_id', type: 'integer' })
  productId!: number;

  @ManyToOne(() => Cart, cart => cart.items, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'cart_id' })
  cart?: Cart;

  @ApiProperty()
  @Column({ type: 'integer', default: 1 })
  quantity!: number;

  @ApiProperty()
  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @ApiProperty()
  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
