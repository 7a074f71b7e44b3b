import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { Category } from './entities/category.entity';

@Module({
  imports: [MikroOrmModule.forFeature([Category])],
  exports: [MikroOrmModule],
})
export class CategoryModule {}
