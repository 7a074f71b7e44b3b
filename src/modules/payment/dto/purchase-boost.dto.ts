import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsUUID, Max, Min } from 'class-validator';
import { BoostType, DEFAULT_BOOST_DAYS } from '../entities/ad-boost.entity';
import { PaymentMethod } from '../entities/transaction.entity';

export class PurchaseBoostDto {
  @ApiProperty({ name: 'ad_id', format: 'uuid' })
  @Expose({ name: 'ad_id' })
  @IsUUID()
  adId!: string;

  @ApiProperty({ name: 'boost_type', enum: BoostType, example: BoostType.VIP })
  @Expose({ name: 'boost_type' })
  @IsEnum(BoostType)
  boostType!: BoostType;

  @ApiProperty({ name: 'duration_days', minimum: 1, maximum: 30, default: DEFAULT_BOOST_DAYS, required: false })
  @Expose({ name: 'duration_days' })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(30)
  durationDays: number = DEFAULT_BOOST_DAYS;

  @ApiProperty({ name: 'payment_method', enum: PaymentMethod, example: PaymentMethod.MPESA })
  @Expose({ name: 'payment_method' })
  @IsEnum(PaymentMethod)
  paymentMethod!: PaymentMethod;
}
