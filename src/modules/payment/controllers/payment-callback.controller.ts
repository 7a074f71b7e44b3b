import { Body, Controller, HttpCode, HttpStatus, Logger, Post, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { TransactionLedgerService } from '../services/transaction-ledger.service';
import { PaymentCallbackGuard } from '../guards/payment-callback.guard';
import { PaymentCallbackDto } from '../dto/payment-callback.dto';
import { TransactionResponse, presentTransaction } from '../presenters/payment.presenters';

export interface PaymentCallbackResponse {
  message: string;
  already_processed: boolean;
  transaction: TransactionResponse;
}

@ApiTags('payments')
@Controller('payments/callback')
export class PaymentCallbackController {
  private readonly logger = new Logger(PaymentCallbackController.name);

  constructor(private readonly ledger: TransactionLedgerService) {}

  @Post()
  @UseGuards(PaymentCallbackGuard)
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Payment gateway callback',
    description: 'Marks a transaction completed or failed; a completed payment activates its subscription or boost',
  })
  @ApiResponse({ status: 200, description: 'Callback applied, or already applied earlier' })
  @ApiResponse({ status: 400, description: 'Invalid payload or conflicting status' })
  @ApiResponse({ status: 404, description: 'Unknown transaction reference' })
  async handleCallback(@Body() dto: PaymentCallbackDto): Promise<PaymentCallbackResponse> {
    this.logger.log(`Received ${dto.status} callback for ${dto.transactionReference}`);

    const { transaction, alreadyProcessed } = await this.ledger.applyCallback({
      reference: dto.transactionReference,
      status: dto.status,
      providerReference: dto.paymentProviderReference,
      metadata: dto.metadata,
    });

    return {
      message: alreadyProcessed ? 'Payment callback already processed.' : 'Payment callback processed.',
      already_processed: alreadyProcessed,
      transaction: presentTransaction(transaction),
    };
  }
}
