import { Test } from '@nestjs/testing';
import { OrdersController } from './orders.controller';
import { InternalOrdersController } from './internal-orders.controller';
import { OrdersService } from './orders.service';

describe('OrdersController', () => {
  let controller: OrdersController;
  let internalController: InternalOrdersController;

  const ordersService = {
    findAll: jest.fn(),
    findMine: jest.fn(),
    findOne: jest.fn(),
    findById: jest.fn(),
    create: jest.fn(),
    cancel: jest.fn(),
    createPayment: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [OrdersController, InternalOrdersController],
      providers: [{ provide: OrdersService, useValue: ordersService }],
    }).compile();

    controller = moduleRef.get(OrdersController);
    internalController = moduleRef.get(InternalOrdersController);
  });

  it('wraps listings in the response envelope', async () => {
    ordersService.findAll.mockResolvedValue([{ id: 1 }]);

    await expect(controller.findAll()).resolves.toEqual({ data: [{ id: 1 }], message: 'Get orders successfully' });
  });

  it('places orders for the authenticated patient', async () => {
    ordersService.create.mockResolvedValue({ id: 11 });

    const response = await controller.create({ cartId: 3 }, 42);

    expect(ordersService.create).toHaveBeenCalledWith(42, { cartId: 3 });
    expect(response).toEqual({ data: { id: 11 }, message: 'Create order successfully' });
  });

  it('cancels and pays through the patient scope', async () => {
    ordersService.cancel.mockResolvedValue({ id: 11 });
    ordersService.createPayment.mockResolvedValue({ payment: { amount: 9 } });

    await expect(controller.cancel(11, 42)).resolves.toEqual({
      data: { id: 11 },
      message: 'Cancelled order successfully',
    });
    await expect(controller.createPayment(11, { provider: 'qr_payment' }, 42)).resolves.toEqual({
      data: { payment: { amount: 9 } },
      message: 'Created payment successfully',
    });
    expect(ordersService.createPayment).toHaveBeenCalledWith(11, 42, { provider: 'qr_payment' });
  });

  it('serves any order to internal callers', async () => {
    ordersService.findById.mockResolvedValue({ order: { id: 5 }, orderItems: [], totalPrice: 0 });

    await expect(internalController.findOne(5)).resolves.toEqual({
      data: { order: { id: 5 }, orderItems: [], totalPrice: 0 },
      message: 'Get order successfully',
    });
  });
});
