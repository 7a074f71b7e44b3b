import { ApiPropertyOptional } from '@nestjs/swagger';
import { Expose, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsDate,
  IsEnum,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUUID,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { AdCondition, AdPremiumType } from '../entities/ad.entity';
import { AD_ORDERINGS, AdListingFilters, AdOrdering } from '../services/ad-listing.service';

const toBoolean = ({ value }: { value: unknown }): unknown => {
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return value;
};

export class ListAdsQueryDto implements AdListingFilters {
  @ApiPropertyOptional({ name: 'price_min' })
  @Expose({ name: 'price_min' })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  priceMin?: number;

  @ApiPropertyOptional({ name: 'price_max' })
  @Expose({ name: 'price_max' })
  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  priceMax?: number;

  @ApiPropertyOptional({ description: 'Category id' })
  @IsOptional()
  @IsUUID()
  category?: string;

  @ApiPropertyOptional({ name: 'category_slug' })
  @Expose({ name: 'category_slug' })
  @IsOptional()
  @IsString()
  @MaxLength(100)
  categorySlug?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  city?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  county?: string;

  @ApiPropertyOptional({ enum: AdCondition })
  @IsOptional()
  @IsEnum(AdCondition)
  condition?: AdCondition;

  @ApiPropertyOptional({ name: 'is_premium' })
  @Expose({ name: 'is_premium' })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  isPremium?: boolean;

  @ApiPropertyOptional({ name: 'premium_type', enum: AdPremiumType })
  @Expose({ name: 'premium_type' })
  @IsOptional()
  @IsEnum(AdPremiumType)
  premiumType?: AdPremiumType;

  @ApiPropertyOptional({ description: 'Seller id' })
  @IsOptional()
  @IsUUID()
  seller?: string;

  @ApiPropertyOptional({ description: 'Matches title or description' })
  @IsOptional()
  @IsString()
  @MaxLength(200)
  search?: string;

  @ApiPropertyOptional({ name: 'created_after' })
  @Expose({ name: 'created_after' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  createdAfter?: Date;

  @ApiPropertyOptional({ name: 'created_before' })
  @Expose({ name: 'created_before' })
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  createdBefore?: Date;

  @ApiPropertyOptional({ enum: [...AD_ORDERINGS] })
  @IsOptional()
  @IsIn([...AD_ORDERINGS])
  ordering?: AdOrdering;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  page: number = 1;

  @ApiPropertyOptional({ name: 'page_size', default: 20 })
  @Expose({ name: 'page_size' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  pageSize: number = 20;
}
