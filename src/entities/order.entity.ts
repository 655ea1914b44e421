import { ApiProperty } from '@nestjs/swagger';
import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, OneToMany, JoinColumn } from 'typeorm';
import { Cart } from './cart.entity';
import { Payment } from './payment.entity';

export enum OrderStatus {
  PENDING = 'PENDING',
  RESERVED = 'RESERVED',
  REJECTED = 'REJECTED',
  PAYMENT_PENDING = 'PAYMENT_PENDING',
  DELIVERY_PENDING = 'DELIVERY_PENDING',
  DELIVERED = 'DELIVERED',
  CANCEL_PENDING = 'CANCEL_PENDING',
  CANCELLED = 'CANCELLED',
}

export enum OrderType {
  PICKUP = 'PICKUP',
  DELIVERY = 'DELIVERY',
}

/** Snapshot of a delivery address; its shape belongs to the delivery service. */
export type DeliveryAddress = Record<string, unknown>;

@Entity('orders')
export class Order {
  @ApiProperty()
  @PrimaryGeneratedColumn()
  id!: number;

  @ApiProperty()
  @Column({ name: 'cart_id', type: 'integer' })
  cartId!: number;

  @ManyToOne(() => Cart, cart => cart.orders, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'cart_id' })
  cart?: Cart;

  @ApiProperty()
  @Column({ name: 'patient_id', type: 'integer' })
  patientId!: number;

  // Stored as text, not a database enum
  @ApiProperty({ enum: OrderStatus })
  @Column({ type: 'text', default: OrderStatus.PENDING })
  status!: OrderStatus;

  @ApiProperty({ enum: OrderType })
  @Column({ name: 'order_type', type: 'text', default: OrderType.PICKUP })
  orderType!: OrderType;

  @ApiProperty({ type: String, format: 'uuid', nullable: true })
  @Column({ name: 'delivery_id', type: 'uuid', nullable: true })
  deliveryId!: string | null;

  @ApiProperty({ type: 'object', additionalProperties: true, nullable: true })
  @Column({ name: 'delivery_address', type: 'jsonb', nullable: true })
  deliveryAddress!: DeliveryAddress | null;

  @ApiProperty()
  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @ApiProperty()
  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;

  // Soft delete marker. Plain column: cancelled orders stay visible in listings.
  @ApiProperty({ type: Date, nullable: true })
  @Column({ name: 'deleted_at', type: 'timestamptz', nullable: true })
  deletedAt!: Date | null;

  @OneToMany(() => Payment, payment => payment.order)
  payments?: Payment[];
}
