import { BeforeCreate, BeforeUpdate, Entity, Enum, Index, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Category } from '../../category/entities/category.entity';
import { Location } from '../../user/entities/location.entity';
import { User } from '../../user/entities/user.entity';

export enum AdStatus {
  DRAFT = 'draft',
  ACTIVE = 'active',
  EXPIRED = 'expired',
  SOLD = 'sold',
  DELETED = 'deleted',
}

export enum AdCondition {
  NEW = 'new',
  USED = 'used',
  REFURBISHED = 'refurbished',
}

export enum AdPremiumType {
  BASIC = 'basic',
  VIP = 'vip',
  TOP = 'top',
  BOOSTED = 'boosted',
  FEATURED = 'featured',
}

@Entity()
@Index({ properties: ['status', 'createdAt'] })
@Index({ properties: ['isPremiumListing', 'createdAt'] })
@Index({ properties: ['seller', 'status'] })
export class Ad extends BaseEntity<
  | 'currency'
  | 'condition'
  | 'status'
  | 'premiumType'
  | 'isPremiumListing'
  | 'isNegotiable'
  | 'viewsCount'
  | 'contactCount'
> {
  @Property({ length: 200 })
  title!: string;

  @Property({ length: 220 })
  @Unique()
  slug!: string;

  @Property({ type: 'text' })
  description!: string;

  @Property({ columnType: 'numeric(12,2)' })
  price!: number;

  @Property({ length: 3 })
  currency: string = 'KES';

  @Enum(() => AdCondition)
  condition: AdCondition = AdCondition.USED;

  @ManyToOne(() => Category)
  category!: Category;

  @ManyToOne(() => Location, { nullable: true })
  location?: Location;

  @ManyToOne(() => User)
  seller!: User;

  @Enum(() => AdStatus)
  status: AdStatus = AdStatus.DRAFT;

  @Enum(() => AdPremiumType)
  premiumType: AdPremiumType = AdPremiumType.BASIC;

  /** First listing sort key; always equals `premiumType !== basic`. */
  @Property()
  isPremiumListing: boolean = false;

  @Property()
  isNegotiable: boolean = true;

  @Property()
  viewsCount: number = 0;

  @Property()
  contactCount: number = 0;

  @Property({ nullable: true })
  expiresAt?: Date;

  isOwnedBy(userId: string): boolean {
    return this.seller.id === userId;
  }

  markSold(): void {
    this.status = AdStatus.SOLD;
  }

  reactivate(expiresAt: Date): void {
    this.status = AdStatus.ACTIVE;
    this.expiresAt = expiresAt;
  }

  setPremiumType(premiumType: AdPremiumType): void {
    this.premiumType = premiumType;
    this.isPremiumListing = premiumType !== AdPremiumType.BASIC;
  }

  @BeforeCreate()
  @BeforeUpdate()
  syncPremiumListing(): void {
    this.isPremiumListing = this.premiumType !== AdPremiumType.BASIC;
  }
}
