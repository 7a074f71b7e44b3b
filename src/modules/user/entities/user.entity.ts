import { Entity, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';
import { Location } from './location.entity';

@Entity()
export class User extends BaseEntity<'firstName' | 'lastName' | 'isVerified' | 'isPremium' | 'isActive'> {
  @Property()
  @Unique()
  email!: string;

  @Property()
  firstName: string = '';

  @Property()
  lastName: string = '';

  @ManyToOne(() => Location, { nullable: true })
  location?: Location;

  @Property()
  isActive: boolean = true;

  @Property()
  isVerified: boolean = false;

  /**
   * Mirrors whether the user holds an active premium subscription. Written only
   * by entitlement activation, cancellation and expiry.
   */
  @Property()
  isPremium: boolean = false;

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`.trim() || this.email;
  }
}
