import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { User } from './entities/user.entity';
import { Location } from './entities/location.entity';

@Module({
  imports: [MikroOrmModule.forFeature([User, Location])],
  exports: [MikroOrmModule],
})
export class UserModule {}
