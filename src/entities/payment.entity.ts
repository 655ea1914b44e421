import { ApiProperty } from '@nestjs/swagger';
import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, ManyToOne, JoinColumn } from 'typeorm';
import { Order } from './order.entity';

export enum PaymentStatus {
  PENDING = 'PENDING',
  PAID = 'PAID',
  FAILED = 'FAILED',
}

export enum PaymentProvider {
  INTERNAL = 'internal',
  QR_PAYMENT = 'qr_payment',
}

@Entity('payments')
export class Payment {
  // gen_random_uuid() default lives in the migration
  @ApiProperty({ format: 'uuid' })
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @ApiProperty()
  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @ManyToOne(() => Order, order => order.payments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'order_id' })
  order?: Order;

  @ApiProperty()
  @Column({ type: 'real' })
  amount!: number;

  @ApiProperty({ enum: PaymentStatus })
  @Column({ type: 'varchar', length: 32, default: PaymentStatus.PENDING })
  status!: PaymentStatus;

  @ApiProperty({ example: PaymentProvider.QR_PAYMENT })
  @Column({ type: 'varchar', length: 64, default: PaymentProvider.INTERNAL })
  provider!: string;

  @ApiProperty({ type: String, nullable: true })
  @Column({ name: 'provider_ref', type: 'varchar', length: 128, nullable: true })
  providerRef!: string | null;

  @ApiProperty({ type: String, nullable: true })
  @Column({ name: 'failure_reason', type: 'text', nullable: true })
  failureReason!: string | null;

  @ApiProperty()
  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @ApiProperty()
  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
