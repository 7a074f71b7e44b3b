import { Module } from '@nestjs/common';
import { MikroOrmModule } from '@mikro-orm/nestjs';
import { AuthModule } from '../auth/auth.module';
import { Ad } from './entities/ad.entity';
import { AdListingService } from './services/ad-listing.service';
import { AdService } from './services/ad.service';
import { AdsController } from './controllers/ads.controller';

@Module({
  imports: [MikroOrmModule.forFeature([Ad]), AuthModule],
  controllers: [AdsController],
  providers: [AdListingService, AdService],
})
export class AdsModule {}
