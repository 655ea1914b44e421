import { Controller, Get, Post, Delete, Body, Param, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBadRequestResponse, ApiBearerAuth, ApiForbiddenResponse, ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { PatientId } from '../auth/patient-id.decorator';
import { ApiStdResponse } from '../common/api-std-response.decorator';
import { ParseIdPipe } from '../common/parse-id.pipe';
import { stdResponse } from '../common/std-response';
import { Order } from '../entities/order.entity';
import { OrdersService } from './orders.service';
import { CreateOrderDto, CreatePaymentDto } from './dto/create-order.dto';
import { CreatedPaymentResponse, OrderWithItemsResponse } from './dto/order-response.dto';

@ApiTags('orders')
@ApiBearerAuth()
@Controller('patients/orders')
@UseGuards(AuthGuard('jwt'))
export class OrdersController {
  constructor(private ordersService: OrdersService) {}

  @Get()
  @ApiStdResponse(Order, { isArray: true })
  async findAll() {
    return stdResponse(await this.ordersService.findAll(), 'Get orders successfully');
  }

  @Get('my-orders')
  @ApiStdResponse(OrderWithItemsResponse, { isArray: true })
  async findMine(@PatientId() patientId: number) {
    return stdResponse(await this.ordersService.findMine(patientId), 'Get my orders successfully');
  }

  @Get(':id')
  @ApiStdResponse(OrderWithItemsResponse)
  @ApiNotFoundResponse({ description: 'Order not found' })
  async findOne(@Param('id', ParseIdPipe) id: number, @PatientId() patientId: number) {
    return stdResponse(await this.ordersService.findOne(id, patientId), 'Get order successfully');
  }

  @Post()
  @ApiStdResponse(Order, { status: 201 })
  @ApiBadRequestResponse({ description: 'Delivery order without a delivery address' })
  @ApiForbiddenResponse({ description: 'Patient does not own this delivery address' })
  @ApiNotFoundResponse({ description: 'Cart not found' })
  async create(@Body() createOrderDto: CreateOrderDto, @PatientId() patientId: number) {
    return stdResponse(await this.ordersService.create(patientId, createOrderDto), 'Create order successfully');
  }

  @Delete(':id')
  @ApiStdResponse(Order, { description: 'The order, now CANCEL_PENDING' })
  @ApiNotFoundResponse({ description: 'No active reserved order with this id' })
  async cancel(@Param('id', ParseIdPipe) id: number, @PatientId() patientId: number) {
    return stdResponse(await this.ordersService.cancel(id, patientId), 'Cancelled order successfully');
  }

  @Post(':id/payment')
  @ApiStdResponse(CreatedPaymentResponse, { status: 201 })
  @ApiBadRequestResponse({ description: 'Unsupported payment provider' })
  @ApiNotFoundResponse({ description: 'Order not found or not awaiting payment' })
  async createPayment(
    @Param('id', ParseIdPipe) id: number,
    @Body() createPaymentDto: CreatePaymentDto,
    @PatientId() patientId: number,
  ) {
    return stdResponse(
      await this.ordersService.createPayment(id, patientId, createPaymentDto),
      'Created payment successfully',
    );
  }
}
