import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';

export enum OutboxStatus {
  PENDING = 'PENDING',
  SENT = 'SENT',
  FAILED = 'FAILED',
}

@Entity('outbox')
export class OutboxEvent {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'event_type', type: 'text' })
  eventType!: string;

  // Serialized JSON; consumers pick the shape from eventType
  @Column({ type: 'text' })
  payload!: string;

  @Column({ type: 'text', default: OutboxStatus.PENDING })
  status!: OutboxStatus;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
