import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import configuration, { AppConfiguration } from './config/configuration';
import { buildDataSourceOptions } from './data-source';
import { AuthModule } from './auth/auth.module';
import { CartsModule } from './carts/carts.module';
import { OrdersModule } from './orders/orders.module';
import { PaymentsModule } from './payments/payments.module';
import { ConsumersModule } from './consumers/consumers.module';
import { OutboxModule } from './outbox/outbox.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [() => configuration()],
    }),
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService<AppConfiguration, true>) => ({
        ...buildDataSourceOptions(configService.get('database', { infer: true })),
        migrationsRun: true,
      }),
      inject: [ConfigService],
    }),
    AuthModule,
    CartsModule,
    OrdersModule,
    PaymentsModule,
    ConsumersModule,
    OutboxModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
