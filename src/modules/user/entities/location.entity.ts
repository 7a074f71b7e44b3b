import { Entity, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';

@Entity()
@Unique({ properties: ['city', 'county', 'country'] })
export class Location extends BaseEntity<'country'> {
  @Property()
  city!: string;

  @Property()
  county!: string;

  @Property()
  country: string = 'Kenya';
}
