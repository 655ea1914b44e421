import { ApiProperty } from '@nestjs/swagger';
import { Cart } from '../../entities/cart.entity';
import { CartItem } from '../../entities/cart-item.entity';
import { CartWithItems, CreatedCart, UpdatedCart } from '../carts.service';

export class CartWithItemsResponse implements CartWithItems {
  @ApiProperty({ type: Cart })
  cart!: Cart;

  @ApiProperty({ type: [CartItem] })
  cartItems!: CartItem[];

  @ApiProperty({ example: 19.5 })
  totalPrice!: number;
}

export class CreatedCartResponse implements CreatedCart {
  @ApiProperty({ type: Cart })
  cart!: Cart;

  @ApiProperty({ type: [CartItem] })
  cartItems!: CartItem[];
}

export class UpdatedCartResponse implements UpdatedCart {
  @ApiProperty({ type: [CartItem] })
  deletedItems!: CartItem[];

  @ApiProperty({ type: [CartItem] })
  updatedItems!: CartItem[];

  @ApiProperty({ type: Cart })
  updatedCart!: Cart;
}
