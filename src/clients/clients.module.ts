import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { AppConfiguration } from '../config/configuration';
import { DeliveryClient } from './delivery.client';
import { InventoryClient } from './inventory.client';
import { DELIVERY_HTTP, INVENTORY_HTTP } from './tokens';

const HTTP_TIMEOUT_MS = 5000;

@Module({
  providers: [
    {
      provide: INVENTORY_HTTP,
      useFactory: (configService: ConfigService<AppConfiguration, true>) =>
        axios.create({
          baseURL: configService.get('services', { infer: true }).inventoryUrl,
          timeout: HTTP_TIMEOUT_MS,
        }),
      inject: [ConfigService],
    },
    {
      provide: DELIVERY_HTTP,
      useFactory: (configService: ConfigService<AppConfiguration, true>) =>
        axios.create({
          baseURL: configService.get('services', { infer: true }).deliveryUrl,
          timeout: HTTP_TIMEOUT_MS,
        }),
      inject: [ConfigService],
    },
    InventoryClient,
    DeliveryClient,
  ],
  exports: [InventoryClient, DeliveryClient],
})
export class ClientsModule {}
