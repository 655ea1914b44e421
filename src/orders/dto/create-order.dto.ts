import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsInt, IsOptional, IsString, IsNotEmpty, Max, Min } from 'class-validator';
import { OrderType } from '../../entities/order.entity';
import { INT4_MAX } from '../../common/parse-id.pipe';

export class CreateOrderDto {
  @ApiProperty({ example: 3 })
  @IsInt()
  @Min(1)
  @Max(INT4_MAX)
  cartId!: number;

  @ApiPropertyOptional({ enum: OrderType, default: OrderType.PICKUP })
  @IsOptional()
  @IsEnum(OrderType)
  orderType?: OrderType;

  @ApiPropertyOptional({ description: 'Required for DELIVERY orders', example: 8 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(INT4_MAX)
  deliveryAddressId?: number;
}

export class CreatePaymentDto {
  // Checked against the supported providers by the service, for its error message
  @ApiProperty({ example: 'qr_payment' })
  @IsString()
  @IsNotEmpty()
  provider!: string;
}
