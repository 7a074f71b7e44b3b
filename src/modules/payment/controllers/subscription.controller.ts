import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { CurrentUser } from '../../../common/decorators/current-user.decorator';
import { AuthUser } from '../../../common/interfaces/authenticated-request.interface';
import { SubscriptionService } from '../services/subscription.service';
import { PurchaseSubscriptionDto } from '../dto/purchase-subscription.dto';
import {
  SubscriptionResponse,
  TransactionResponse,
  presentSubscription,
  presentTransaction,
} from '../presenters/payment.presenters';
import { PaymentInstructions, paymentInstructionsFor } from '../utils/payment-instructions';

export interface SubscriptionPurchaseResponse {
  message: string;
  subscription: SubscriptionResponse;
  transaction: TransactionResponse;
  payment_instructions: PaymentInstructions;
}

@ApiTags('payments')
@Controller('payments/subscriptions')
@UseGuards(JwtAuthGuard)
@ApiBearerAuth()
export class SubscriptionController {
  constructor(private readonly subscriptionService: SubscriptionService) {}

  @Get()
  @ApiOperation({ summary: "List the caller's subscriptions" })
  @ApiResponse({ status: 200, description: 'Subscriptions, newest first' })
  async listSubscriptions(@CurrentUser() user: AuthUser): Promise<SubscriptionResponse[]> {
    const subscriptions = await this.subscriptionService.listForUser(user.id);
    return subscriptions.map((subscription) => presentSubscription(subscription));
  }

  @Get('active')
  @ApiOperation({ summary: "Get the caller's active subscription" })
  @ApiResponse({ status: 200, description: 'The active subscription ending last' })
  @ApiResponse({ status: 404, description: 'No active subscription' })
  async getActiveSubscription(@CurrentUser() user: AuthUser): Promise<SubscriptionResponse> {
    return presentSubscription(await this.subscriptionService.findActive(user.id));
  }

  @Post('purchase')
  @ApiOperation({ summary: 'Start a subscription purchase' })
  @ApiResponse({ status: 201, description: 'Pending subscription and transaction with payment instructions' })
  @ApiResponse({ status: 400, description: 'Invalid request data' })
  async purchaseSubscription(
    @CurrentUser() user: AuthUser,
    @Body() dto: PurchaseSubscriptionDto,
  ): Promise<SubscriptionPurchaseResponse> {
    const { subscription, transaction } = await this.subscriptionService.purchase(user.id, {
      subscriptionType: dto.subscriptionType,
      durationDays: dto.durationDays,
      paymentMethod: dto.paymentMethod,
      autoRenew: dto.autoRenew,
    });

    return {
      message: 'Subscription purchase initiated.',
      subscription: presentSubscription(subscription),
      transaction: presentTransaction(transaction),
      payment_instructions: paymentInstructionsFor(transaction),
    };
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel an active subscription' })
  @ApiResponse({ status: 200, description: 'Subscription cancelled' })
  @ApiResponse({ status: 400, description: 'Subscription is not active' })
  @ApiResponse({ status: 404, description: 'Subscription not found' })
  async cancelSubscription(
    @CurrentUser() user: AuthUser,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<{ message: string; subscription: SubscriptionResponse }> {
    const subscription = await this.subscriptionService.cancel(id, user.id);
    return {
      message: 'Subscription cancelled successfully.',
      subscription: presentSubscription(subscription),
    };
  }
}
