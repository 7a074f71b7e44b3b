import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PricingPlanService } from '../services/pricing-plan.service';
import { ListPlansQueryDto } from '../dto/list-plans-query.dto';
import { PricingPlanResponse, presentPricingPlan } from '../presenters/payment.presenters';

@ApiTags('payments')
@Controller('payments/plans')
export class PricingPlanController {
  constructor(private readonly pricingPlanService: PricingPlanService) {}

  @Get()
  @ApiOperation({ summary: 'List active pricing plans' })
  @ApiResponse({ status: 200, description: 'Active plans ordered by display order, then price' })
  async listPlans(@Query() query: ListPlansQueryDto): Promise<PricingPlanResponse[]> {
    const plans = await this.pricingPlanService.listActive(query.planType);
    return plans.map((plan) => presentPricingPlan(plan));
  }
}
