import { Injectable } from '@nestjs/common';
import { EntityManager, QueryOrder } from '@mikro-orm/core';
import { PlanType, PricingPlan } from '../entities/pricing-plan.entity';

@Injectable()
export class PricingPlanService {
  constructor(private readonly em: EntityManager) {}

  async listActive(planType?: PlanType): Promise<PricingPlan[]> {
    return this.em.find(
      PricingPlan,
      planType ? { isActive: true, planType } : { isActive: true },
      { orderBy: [{ order: QueryOrder.ASC }, { price: QueryOrder.ASC }] },
    );
  }
}
