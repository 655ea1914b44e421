import { Injectable } from '@nestjs/common';
import { DeepPartial } from 'typeorm';
import { OutboxEvent } from '../entities/outbox-event.entity';

/** The part of an EntityManager the outbox writes through. */
export interface OutboxWriter {
  create(entityClass: typeof OutboxEvent, plainObject: DeepPartial<OutboxEvent>): OutboxEvent;
  save(entity: OutboxEvent): Promise<OutboxEvent>;
}

@Injectable()
export class OutboxService {
  /**
   * Stages an event for the relay. Pass the manager of the transaction that
   * carries the state change so both commit or roll back together.
   */
  async publish<T extends object>(manager: OutboxWriter, eventType: string, payload: T): Promise<OutboxEvent> {
    const event = manager.create(OutboxEvent, {
      eventType,
      payload: JSON.stringify(payload),
    });
    return manager.save(event);
  }
}
