import { Entity, Enum, Index, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { PremiumSubscription } from './premium-subscription.entity';
import { AdBoost } from './ad-boost.entity';

export enum TransactionType {
  SUBSCRIPTION = 'subscription',
  AD_BOOST = 'ad_boost',
  FEATURED_AD = 'featured_ad',
  OTHER = 'other',
}

export enum TransactionStatus {
  PENDING = 'pending',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
  REFUNDED = 'refunded',
}

export enum PaymentMethod {
  MPESA = 'mpesa',
  CARD = 'card',
  PAYPAL = 'paypal',
  BANK_TRANSFER = 'bank_transfer',
  OTHER = 'other',
}

export const TERMINAL_TRANSACTION_STATUSES: readonly TransactionStatus[] = [
  TransactionStatus.COMPLETED,
  TransactionStatus.FAILED,
  TransactionStatus.REFUNDED,
];

@Entity()
@Index({ properties: ['user', 'createdAt'] })
@Index({ properties: ['status'] })
export class Transaction extends BaseEntity<'currency' | 'status' | 'metadata' | 'notes'> {
  @ManyToOne(() => User)
  user!: User;

  @Enum(() => TransactionType)
  transactionType!: TransactionType;

  // At most one of these is set; see resolveEntitlement().
  @ManyToOne(() => PremiumSubscription, { nullable: true })
  subscription?: PremiumSubscription;

  @ManyToOne(() => AdBoost, { nullable: true })
  adBoost?: AdBoost;

  @Property({ columnType: 'numeric(10,2)' })
  amount!: number;

  @Property({ length: 3 })
  currency: string = 'KES';

  @Enum(() => PaymentMethod)
  paymentMethod!: PaymentMethod;

  @Enum(() => TransactionStatus)
  status: TransactionStatus = TransactionStatus.PENDING;

  @Property({ length: 100 })
  @Unique()
  transactionReference!: string;

  @Property({ length: 100, nullable: true })
  paymentProviderReference?: string;

  @Property({ type: 'json' })
  metadata: Record<string, unknown> = {};

  @Property({ type: 'text' })
  notes: string = '';

  isTerminal(): boolean {
    return TERMINAL_TRANSACTION_STATUSES.includes(this.status);
  }
}
