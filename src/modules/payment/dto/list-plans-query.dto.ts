import { ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { IsEnum, IsOptional } from 'class-validator';
import { PlanType } from '../entities/pricing-plan.entity';

export class ListPlansQueryDto {
  @ApiPropertyOptional({ name: 'plan_type', enum: PlanType })
  @Expose({ name: 'plan_type' })
  @IsOptional()
  @IsEnum(PlanType)
  planType?: PlanType;
}
