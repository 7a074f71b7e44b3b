import { Entity, ManyToOne, Property, Unique } from '@mikro-orm/core';
import { BaseEntity } from '../../../common/entities/base.entity';

@Entity()
export class Category extends BaseEntity<'description' | 'order' | 'isActive'> {
  @Property()
  @Unique()
  name!: string;

  @Property()
  @Unique()
  slug!: string;

  @ManyToOne(() => Category, { nullable: true })
  parent?: Category;

  @Property({ type: 'text' })
  description: string = '';

  @Property()
  order: number = 0;

  @Property()
  isActive: boolean = true;
}
