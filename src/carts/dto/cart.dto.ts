import { ApiProperty } from '@nestjs/swagger';
import { IsArray, IsInt, Max, Min, ValidateNested } from 'class-validator';
import { Type } from 'class-transformer';
import { INT4_MAX } from '../../common/parse-id.pipe';

export class CartItemDto {
  @ApiProperty({ example: 1 })
  @IsInt()
  @Min(1)
  @Max(INT4_MAX)
  productId!: number;

  // Non-positive quantities are accepted and mean "not in the cart"
  @ApiProperty({ example: 2, description: 'Zero or less leaves the product out of the cart' })
  @IsInt()
  @Max(INT4_MAX)
  quantity!: number;
}

export class SaveCartDto {
  @ApiProperty({ type: [CartItemDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CartItemDto)
  cartItems!: CartItemDto[];
}
