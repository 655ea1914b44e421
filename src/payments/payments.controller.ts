import { Controller, Patch, Post, Param, ParseUUIDPipe } from '@nestjs/common';
import { ApiConflictResponse, ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { ApiStdResponse } from '../common/api-std-response.decorator';
import { stdResponse } from '../common/std-response';
import { PaymentsService } from './payments.service';
import { PaidPaymentResponse } from './dto/paid-payment.dto';

@ApiTags('payments')
@Controller('payments')
export class PaymentsController {
  constructor(private paymentsService: PaymentsService) {}

  @Patch(':id/mock-pay')
  @ApiStdResponse(PaidPaymentResponse)
  @ApiNotFoundResponse({ description: 'Pending payment not found' })
  @ApiConflictResponse({ description: 'Order is not awaiting payment' })
  async mockPay(@Param('id', ParseUUIDPipe) id: string) {
    return stdResponse(await this.paymentsService.mockPay(id), 'Payment paid successfully');
  }

  // Same operation for clients that cannot send PATCH
  @Post(':id/mock-pay')
  @ApiStdResponse(PaidPaymentResponse, { status: 201 })
  async mockPayByPost(@Param('id', ParseUUIDPipe) id: string) {
    return this.mockPay(id);
  }
}
