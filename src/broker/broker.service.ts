import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { connect, AmqpConnectionManager, ChannelWrapper } from 'amqp-connection-manager';
import { ConfirmChannel, ConsumeMessage } from 'amqplib';
import { AppConfiguration, BrokerConfig } from '../config/configuration';

export type EventHandler = (payload: unknown) => Promise<void>;

/** Handlers keyed by routing key. */
export type EventHandlers = Record<string, EventHandler>;

export interface IncomingMessage {
  content: Buffer;
  fields: { routingKey: string };
}

export interface MessageAcker<M> {
  ack(message: M): void;
  nack(message: M, allUpTo?: boolean, requeue?: boolean): void;
}

@Injectable()
export class BrokerService implements OnModuleDestroy {
  private readonly logger = new Logger(BrokerService.name);
  private readonly config: BrokerConfig;
  private connection: AmqpConnectionManager | null = null;
  private publisher: ChannelWrapper | null = null;
  private readonly consumers: ChannelWrapper[] = [];

  constructor(configService: ConfigService<AppConfiguration, true>) {
    this.config = configService.get('broker', { infer: true });
  }

  async publish(routingKey: string, body: string): Promise<void> {
    await this.getPublisher().publish(this.config.exchange, routingKey, Buffer.from(body), {
      persistent: true,
      contentType: 'application/json',
    });
  }

  async subscribe(queue: string, handlers: EventHandlers): Promise<void> {
    const { exchange } = this.config;
    const routingKeys = Object.keys(handlers);

    const channel = this.getConnection().createChannel({
      json: false,
      setup: async (ch: ConfirmChannel) => {
        await ch.assertExchange(exchange, 'topic', { durable: true });
        await ch.assertQueue(queue, { durable: true });
        for (const routingKey of routingKeys) {
          await ch.bindQueue(queue, exchange, routingKey);
        }
      },
    });
    this.consumers.push(channel);

    await channel.consume(queue, (message: ConsumeMessage) => {
      this.dispatch(message, handlers, channel).catch((error: unknown) => {
        this.logger.error(`Unhandled failure on ${queue}`, error instanceof Error ? error.stack : String(error));
      });
    });
    this.logger.log(`Consuming ${queue} for ${routingKeys.join(', ')}`);
  }

  /**
   * Runs the handler bound to the message's routing key. Acked on success;
   * dropped (nack, no requeue) on unknown keys, unparseable bodies or handler failure.
   */
  async dispatch<M extends IncomingMessage>(
    message: M,
    handlers: EventHandlers,
    acker: MessageAcker<M>,
  ): Promise<void> {
    const { routingKey } = message.fields;
    const handler = handlers[routingKey];

    if (!handler) {
      this.logger.warn(`No handler for ${routingKey}, dropping message`);
      acker.nack(message, false, false);
      return;
    }

    try {
      const payload: unknown = JSON.parse(message.content.toString('utf8'));
      await handler(payload);
      acker.ack(message);
    } catch (error) {
      this.logger.error(`Failed to handle ${routingKey}`, error instanceof Error ? error.stack : String(error));
      acker.nack(message, false, false);
    }
  }

  async onModuleDestroy() {
    for (const consumer of this.consumers) {
      await consumer.close();
    }
    if (this.publisher) {
      await this.publisher.close();
    }
    if (this.connection) {
      await this.connection.close();
    }
  }

  private getConnection(): AmqpConnectionManager {
    if (!this.connection) {
      this.connection = connect([this.config.url]);
      this.connection.on('connect', () => this.logger.log('Connected to broker'));
      this.connection.on('disconnect', ({ err }) => this.logger.warn(`Broker disconnected: ${err.message}`));
    }
    return this.connection;
  }

  private getPublisher(): ChannelWrapper {
    if (!this.publisher) {
      const { exchange } = this.config;
      // Without a timeout, publish stays pending for as long as the broker is down
      this.publisher = this.getConnection().createChannel({
        json: false,
        publishTimeout: this.config.publishTimeoutMs,
        setup: async (ch: ConfirmChannel) => {
          await ch.assertExchange(exchange, 'topic', { durable: true });
        },
      });
    }
    return this.publisher;
  }
}
