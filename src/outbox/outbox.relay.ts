import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { BrokerService } from '../broker/broker.service';
import { AppConfiguration, OutboxConfig } from '../config/configuration';
import { OutboxEvent, OutboxStatus } from '../entities/outbox-event.entity';

export interface RelayResult {
  sent: number;
  failed: number;
}

function isJson(payload: string): boolean {
  try {
    JSON.parse(payload);
    return true;
  } catch {
    return false;
  }
}

/**
 * Polls the outbox and forwards pending events to the broker, routing on event_type.
 * Rows are locked with SKIP LOCKED so several replicas can relay concurrently.
 */
@Injectable()
export class OutboxRelay implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OutboxRelay.name);
  private readonly config: OutboxConfig;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly dataSource: DataSource,
    private readonly broker: BrokerService,
    configService: ConfigService<AppConfiguration, true>,
  ) {
    this.config = configService.get('outbox', { infer: true });
  }

  onModuleInit() {
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error('Outbox relay failed', error instanceof Error ? error.stack : String(error));
      });
    }, this.config.pollIntervalMs);
  }

  onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async relayPending(): Promise<RelayResult> {
    return this.dataSource.transaction(async (manager) => {
      const events = await manager
        .getRepository(OutboxEvent)
        .createQueryBuilder('outbox')
        .where('outbox.status = :status', { status: OutboxStatus.PENDING })
        .orderBy('outbox.id', 'ASC')
        .limit(this.config.batchSize)
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .getMany();

      const result: RelayResult = { sent: 0, failed: 0 };

      for (const event of events) {
        if (!isJson(event.payload)) {
          this.logger.error(`Outbox event #${event.id} (${event.eventType}) has an unreadable payload`);
          await manager.update(OutboxEvent, { id: event.id }, { status: OutboxStatus.FAILED });
          result.failed++;
          continue;
        }

        try {
          await this.broker.publish(event.eventType, event.payload);
        } catch (error) {
          // Left PENDING; retried on the next tick
          this.logger.warn(
            `Could not publish outbox event #${event.id}: ${error instanceof Error ? error.message : String(error)}`,
          );
          break;
        }

        await manager.update(OutboxEvent, { id: event.id }, { status: OutboxStatus.SENT });
        result.sent++;
      }

      if (result.sent > 0 || result.failed > 0) {
        this.logger.log(`Relayed ${result.sent} outbox events (${result.failed} failed)`);
      }
      return result;
    });
  }

  private async tick(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      await this.relayPending();
    } finally {
      this.running = false;
    }
  }
}
