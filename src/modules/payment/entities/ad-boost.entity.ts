import { Entity, Enum, Index, ManyToOne, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Ad } from '../../ads/entities/ad.entity';
import { isWithinTerm, termFrom } from '../utils/entitlement-term';

export enum BoostType {
  VIP = 'vip',
  TOP = 'top',
  BOOSTED = 'boosted',
  FEATURED = 'featured',
}

export enum BoostStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  EXPIRED = 'expired',
}

export const DEFAULT_BOOST_DAYS = 7;

@Entity()
@Index({ properties: ['ad', 'status'] })
@Index({ properties: ['endDate'] })
export class AdBoost extends BaseEntity<'status' | 'currency' | 'durationDays'> {
  @ManyToOne(() => Ad)
  ad!: Ad;

  @Enum(() => BoostType)
  boostType!: BoostType;

  @Enum(() => BoostStatus)
  status: BoostStatus = BoostStatus.PENDING;

  @Property({ columnType: 'numeric(10,2)' })
  amount!: number;

  @Property({ length: 3 })
  currency: string = 'KES';

  @Property()
  durationDays: number = DEFAULT_BOOST_DAYS;

  @Property({ nullable: true })
  startDate?: Date;

  @Property({ nullable: true })
  endDate?: Date;

  isActive(now: Date = new Date()): boolean {
    return this.status === BoostStatus.ACTIVE && isWithinTerm(this.endDate, now);
  }

  activate(now: Date): void {
    const term = termFrom(now, this.durationDays);
    this.status = BoostStatus.ACTIVE;
    this.startDate = term.startDate;
    this.endDate = term.endDate;
  }
}
