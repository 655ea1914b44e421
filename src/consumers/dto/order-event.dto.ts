import { IsInt, IsPositive, IsUUID, Max } from 'class-validator';
import { INT4_MAX } from '../../common/parse-id.pipe';

// Wire payloads keep the snake_case keys other services send

export class OrderEventDto {
  @IsInt()
  @IsPositive()
  @Max(INT4_MAX)
  order_id!: number;
}

export class DeliveryCreatedEventDto extends OrderEventDto {
  @IsUUID()
  delivery_id!: string;
}
