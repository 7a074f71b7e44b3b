import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { IsIn, IsNotEmpty, IsObject, IsOptional, IsString, MaxLength } from 'class-validator';
import { TransactionStatus } from '../entities/transaction.entity';
import { CallbackStatus } from '../services/transaction-ledger.service';

export const CALLBACK_STATUSES: readonly CallbackStatus[] = [
  TransactionStatus.COMPLETED,
  TransactionStatus.FAILED,
];

export class PaymentCallbackDto {
  @ApiProperty({ name: 'transaction_reference', example: 'TXN-20250101-0123456789ABCDEF' })
  @Expose({ name: 'transaction_reference' })
  @IsString()
  @IsNotEmpty()
  transactionReference!: string;

  @ApiProperty({ name: 'payment_provider_reference', required: false })
  @Expose({ name: 'payment_provider_reference' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  paymentProviderReference?: string;

  @ApiProperty({ enum: [...CALLBACK_STATUSES] })
  @IsIn([...CALLBACK_STATUSES])
  status!: CallbackStatus;

  @ApiProperty({ required: false, type: 'object', additionalProperties: true })
  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}
