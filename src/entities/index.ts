import { Cart } from './cart.entity';
import { CartItem } from './cart-item.entity';
import { Order } from './order.entity';
import { Payment } from './payment.entity';
import { OutboxEvent } from './outbox-event.entity';

export const ENTITIES = [Cart, CartItem, Order, Payment, OutboxEvent];
