import { IsInt, Max, Min } from 'class-validator';
import { INT4_MAX } from '../../common/parse-id.pipe';

export class OrderSubscriptionDto {
  @IsInt()
  @Min(1)
  @Max(INT4_MAX)
  orderId!: number;
}
