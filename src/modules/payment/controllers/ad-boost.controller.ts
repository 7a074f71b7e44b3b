import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { AuthUser } from '../../../common/interfaces/authenticated-request.interface';
import { AdBoostService } from '../services/ad-boost.service';
import { PurchaseBoostDto } from '../dto/purchase-boost.dto';
import {
  AdBoostResponse,
  TransactionResponse,
  presentAdBoost,
  presentTransaction,
} from '../presenters/payment.presenters';
import { PaymentInstructions, paymentInstructionsFor } from '../utils/payment-instructions';

export interface BoostPurchaseResponse {
  message: string;
  ad_boost: AdBoostResponse;
  transaction: TransactionResponse;
  payment_instructions: PaymentInstructions;
}

@ApiTags('payments')
@Controller('payments/boosts')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class AdBoostController {
  constructor(private readonly adBoostService: AdBoostService) {}

  @Get()
  @ApiOperation({ summary: "List boosts on the caller's ads" })
  @ApiResponse({ status: 200, description: 'Boosts, newest first' })
  async listBoosts(@CurrentUser() user: AuthUser): Promise<AdBoostResponse[]> {
    const boosts = await this.adBoostService.listForSeller(user.id);
    return boosts.map((boost) => presentAdBoost(boost));
  }

  @Post('purchase')
  @ApiOperation({ summary: 'Start an ad boost purchase' })
  @ApiResponse({ status: 201, description: 'Pending boost and transaction with payment instructions' })
  @ApiResponse({ status: 400, description: 'Invalid request data or ad not owned by the caller' })
  async purchaseBoost(
    @CurrentUser() user: AuthUser,
    @Body() dto: PurchaseBoostDto,
  ): Promise<BoostPurchaseResponse> {
    const { adBoost, transaction } = await this.adBoostService.purchase(user.id, {
      adId: dto.adId,
      boostType: dto.boostType,
      durationDays: dto.durationDays,
      paymentMethod: dto.paymentMethod,
    });

    return {
      message: 'Ad boost purchase initiated.',
      ad_boost: presentAdBoost(adBoost),
      transaction: presentTransaction(transaction),
      payment_instructions: paymentInstructionsFor(transaction),
    };
  }
}
