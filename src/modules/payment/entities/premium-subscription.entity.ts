import { Entity, Enum, Index, ManyToOne, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { User } from '../../user/entities/user.entity';
import { isWithinTerm, termFrom } from '../utils/entitlement-term';

export enum SubscriptionType {
  BASIC = 'basic',
  PREMIUM = 'premium',
  PRO = 'pro',
  ENTERPRISE = 'enterprise',
}

export enum SubscriptionStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

export const DEFAULT_SUBSCRIPTION_DAYS = 30;

@Entity()
@Index({ properties: ['user', 'status'] })
@Index({ properties: ['endDate'] })
export class PremiumSubscription extends BaseEntity<
  'subscriptionType' | 'status' | 'currency' | 'durationDays' | 'autoRenew'
> {
  @ManyToOne(() => User)
  user!: User;

  @Enum(() => SubscriptionType)
  subscriptionType: SubscriptionType = SubscriptionType.PREMIUM;

  @Enum(() => SubscriptionStatus)
  status: SubscriptionStatus = SubscriptionStatus.PENDING;

  @Property({ columnType: 'numeric(10,2)' })
  amount!: number;

  @Property({ length: 3 })
  currency: string = 'KES';

  /** Length of the purchased term, applied when the payment completes. */
  @Property()
  durationDays: number = DEFAULT_SUBSCRIPTION_DAYS;

  @Property({ nullable: true })
  startDate?: Date;

  @Property({ nullable: true })
  endDate?: Date;

  @Property()
  autoRenew: boolean = false;

  isActive(now: Date = new Date()): boolean {
    return this.status === SubscriptionStatus.ACTIVE && isWithinTerm(this.endDate, now);
  }

  activate(now: Date): void {
    const term = termFrom(now, this.durationDays);
    this.status = SubscriptionStatus.ACTIVE;
    this.startDate = term.startDate;
    this.endDate = term.endDate;
  }

  cancel(): void {
    this.status = SubscriptionStatus.CANCELLED;
    this.autoRenew = false;
  }
}
