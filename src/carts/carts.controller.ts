import { Controller, Get, Post, Patch, Delete, Body, Param, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { ApiBearerAuth, ApiCreatedResponse, ApiNotFoundResponse, ApiOkResponse, ApiTags } from '@nestjs/swagger';
import { PatientId } from '../auth/patient-id.decorator';
import { ParseIdPipe } from '../common/parse-id.pipe';
import { Cart } from '../entities/cart.entity';
import { CartsService } from './carts.service';
import { SaveCartDto } from './dto/cart.dto';
import { CartWithItemsResponse, CreatedCartResponse, UpdatedCartResponse } from './dto/cart-response.dto';

@ApiTags('carts')
@ApiBearerAuth()
@Controller('patients/carts')
@UseGuards(AuthGuard('jwt'))
export class CartsController {
  constructor(private cartsService: CartsService) {}

  @Get()
  @ApiOkResponse({ type: [Cart] })
  async findAll() {
    return this.cartsService.findAll();
  }

  @Get('my-carts')
  @ApiOkResponse({ type: [CartWithItemsResponse] })
  async findMine(@PatientId() patientId: number) {
    return this.cartsService.findMine(patientId);
  }

  @Get(':id')
  @ApiOkResponse({ type: CartWithItemsResponse })
  @ApiNotFoundResponse({ description: 'Cart not found' })
  async findOne(@Param('id', ParseIdPipe) id: number, @PatientId() patientId: number) {
    return this.cartsService.findOne(id, patientId);
  }

  @Post()
  @ApiCreatedResponse({ type: CreatedCartResponse })
  async create(@Body() saveCartDto: SaveCartDto, @PatientId() patientId: number) {
    return this.cartsService.create(patientId, saveCartDto);
  }

  @Patch(':id')
  @ApiOkResponse({ type: UpdatedCartResponse })
  @ApiNotFoundResponse({ description: 'Cart not found' })
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() saveCartDto: SaveCartDto,
    @PatientId() patientId: number,
  ) {
    return this.cartsService.update(id, patientId, saveCartDto);
  }

  @Delete(':id')
  @ApiOkResponse({ type: Cart, description: 'The deleted cart' })
  @ApiNotFoundResponse({ description: 'Cart not found' })
  async remove(@Param('id', ParseIdPipe) id: number, @PatientId() patientId: number) {
    return this.cartsService.remove(id, patientId);
  }
}
