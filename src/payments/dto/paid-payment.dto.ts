import { ApiProperty } from '@nestjs/swagger';
import { Order } from '../../entities/order.entity';
import { Payment } from '../../entities/payment.entity';
import { PaidPayment } from '../payments.service';

export class PaidPaymentResponse implements PaidPayment {
  @ApiProperty({ type: Payment })
  updatedPayment!: Payment;

  @ApiProperty({ type: Order })
  updatedOrder!: Order;
}
