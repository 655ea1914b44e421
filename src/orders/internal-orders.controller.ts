import { Controller, Get, Param } from '@nestjs/common';
import { ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { ApiStdResponse } from '../common/api-std-response.decorator';
import { ParseIdPipe } from '../common/parse-id.pipe';
import { stdResponse } from '../common/std-response';
import { OrdersService } from './orders.service';
import { OrderWithItemsResponse } from './dto/order-response.dto';

/** Read access for sibling services; sits behind the internal network, no JWT. */
@ApiTags('internal')
@Controller('orders')
export class InternalOrdersController {
  constructor(private ordersService: OrdersService) {}

  @Get(':id')
  @ApiStdResponse(OrderWithItemsResponse)
  @ApiNotFoundResponse({ description: 'Order not found' })
  async findOne(@Param('id', ParseIdPipe) id: number) {
    return stdResponse(await this.ordersService.findById(id), 'Get order successfully');
  }
}
