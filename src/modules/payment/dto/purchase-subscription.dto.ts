import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { DEFAULT_SUBSCRIPTION_DAYS, SubscriptionType } from '../entities/premium-subscription.entity';
import { PaymentMethod } from '../entities/transaction.entity';

export class PurchaseSubscriptionDto {
  @ApiProperty({ name: 'subscription_type', enum: SubscriptionType, example: SubscriptionType.PREMIUM })
  @Expose({ name: 'subscription_type' })
  @IsEnum(SubscriptionType)
  subscriptionType!: SubscriptionType;

  @ApiProperty({ name: 'duration_days', minimum: 1, maximum: 365, default: DEFAULT_SUBSCRIPTION_DAYS, required: false })
  @Expose({ name: 'duration_days' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(365)
  durationDays: number = DEFAULT_SUBSCRIPTION_DAYS;

  @ApiProperty({ name: 'payment_method', enum: PaymentMethod, example: PaymentMethod.MPESA })
  @Expose({ name: 'payment_method' })
  @IsEnum(PaymentMethod)
  paymentMethod!: PaymentMethod;

  @ApiProperty({ name: 'auto_renew', default: false, required: false })
  @Expose({ name: 'auto_renew' })
  @IsOptional()
  @IsBoolean()
  autoRenew: boolean = false;
}
