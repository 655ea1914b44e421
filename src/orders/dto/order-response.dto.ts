import { ApiProperty } from '@nestjs/swagger';
import { CartItem } from '../../entities/cart-item.entity';
import { Order } from '../../entities/order.entity';
import { Payment } from '../../entities/payment.entity';
import { CreatedPayment, OrderWithItems } from '../orders.service';

export class OrderWithItemsResponse implements OrderWithItems {
  @ApiProperty({ type: Order })
  order!: Order;

  @ApiProperty({ type: [CartItem], description: 'Items of the cart the order was placed on' })
  orderItems!: CartItem[];

  @ApiProperty({ example: 19.5 })
  totalPrice!: number;
}

export class CreatedPaymentResponse implements CreatedPayment {
  @ApiProperty({ type: Payment })
  payment!: Payment;

  @ApiProperty({ type: Order })
  updatedOrder!: Order;
}
