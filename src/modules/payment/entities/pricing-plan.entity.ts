import { Entity, Enum, Property } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';

export enum PlanType {
  SUBSCRIPTION = 'subscription',
  AD_BOOST = 'ad_boost',
}

@Entity()
export class PricingPlan extends BaseEntity<
  'description' | 'currency' | 'durationDays' | 'features' | 'isActive' | 'order'
> {
  @Property({ length: 100 })
  name!: string;

  @Enum(() => PlanType)
  planType!: PlanType;

  @Property({ type: 'text' })
  description: string = '';

  @Property({ columnType: 'numeric(10,2)' })
  price!: number;

  @Property({ length: 3 })
  currency: string = 'KES';

  @Property()
  durationDays: number = 30;

  @Property({ type: 'json' })
  features: string[] = [];

  @Property()
  isActive: boolean = true;

  @Property()
  order: number = 0;
}
