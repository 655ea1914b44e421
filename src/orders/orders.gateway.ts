import {
  WebSocketGateway,
  WebSocketServer,
  SubscribeMessage,
  ConnectedSocket,
  MessageBody,
  WsException,
} from '@nestjs/websockets';
import { Injectable, UsePipes, ValidationPipe } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { OrderStatus } from '../entities/order.entity';
import { OrderSubscriptionDto } from './dto/order-subscription.dto';

export interface OrderUpdate {
  status?: OrderStatus;
  deliveryId?: string;
}

export function orderRoom(orderId: number): string {
  return `order:${orderId}`;
}

// Rejections go back to the socket as an `exception` event instead of an HTTP error
export const subscriptionValidationPipe = new ValidationPipe({
  whitelist: true,
  exceptionFactory: (errors) =>
    new WsException(errors.flatMap((error) => Object.values(error.constraints ?? {})).join('; ')),
});

@Injectable()
@WebSocketGateway({
  cors: {
    origin: '*',
    credentials: true,
  },
  namespace: '/orders',
})
@UsePipes(subscriptionValidationPipe)
export class OrdersGateway {
  @WebSocketServer()
  server!: Server;

  @SubscribeMessage('subscribeToOrder')
  async handleSubscribeToOrder(@ConnectedSocket() client: Socket, @MessageBody() data: OrderSubscriptionDto) {
    await client.join(orderRoom(data.orderId));
    return { status: 'subscribed', orderId: data.orderId };
  }

  @SubscribeMessage('unsubscribeFromOrder')
  async handleUnsubscribeFromOrder(@ConnectedSocket() client: Socket, @MessageBody() data: OrderSubscriptionDto) {
    await client.leave(orderRoom(data.orderId));
    return { status: 'unsubscribed', orderId: data.orderId };
  }

  // Status changes and delivery assignment pushed by the event consumers
  notifyOrderUpdated(orderId: number, update: OrderUpdate) {
    this.server.to(orderRoom(orderId)).emit('orderUpdated', { orderId, ...update });
  }
}
