import { ValidationError } from '../../../common/errors/domain.errors';
import { BoostType } from '../entities/ad-boost.entity';
import { SubscriptionType } from '../entities/premium-subscription.entity';

export type PricedPlan =
  | { kind: 'subscription'; type: SubscriptionType }
  | { kind: 'ad_boost'; type: BoostType };

export const PRICING_CURRENCY = 'KES';

export const SUBSCRIPTION_PERIOD_DAYS = 30;
export const BOOST_PERIOD_DAYS = 7;

/** KES per 30-day period. */
export const SUBSCRIPTION_PRICES: Readonly<Record<SubscriptionType, number>> = {
  [SubscriptionType.BASIC]: 0,
  [SubscriptionType.PREMIUM]: 999,
  [SubscriptionType.PRO]: 2499,
  [SubscriptionType.ENTERPRISE]: 4999,
};

/** KES per 7-day period. */
export const BOOST_PRICES: Readonly<Record<BoostType, number>> = {
  [BoostType.VIP]: 499,
  [BoostType.TOP]: 299,
  [BoostType.BOOSTED]: 199,
  [BoostType.FEATURED]: 399,
};

/**
 * Price of `durationDays` of a plan, prorated from its period price and
 * rounded to cents.
 */
export function quoteAmount(plan: PricedPlan, durationDays: number): number {
  if (!Number.isInteger(durationDays) || durationDays < 1) {
    throw ValidationError.forField('duration_days', 'Duration must be a positive whole number of days.');
  }

  const [unitPrice, periodDays] =
    plan.kind === 'subscription'
      ? [SUBSCRIPTION_PRICES[plan.type], SUBSCRIPTION_PERIOD_DAYS]
      : [BOOST_PRICES[plan.type], BOOST_PERIOD_DAYS];

  return Math.round(((unitPrice * durationDays) / periodDays) * 100) / 100;
}
