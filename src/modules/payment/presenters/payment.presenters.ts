import { AdBoost } from '../entities/ad-boost.entity';
import { PremiumSubscription } from '../entities/premium-subscription.entity';
import { PricingPlan } from '../entities/pricing-plan.entity';
import { Transaction } from '../entities/transaction.entity';

const iso = (date?: Date) => (date ? date.toISOString() : null);

// numeric columns come back from PostgreSQL as strings
const money = (value: number | string) => Number(value);

export interface PricingPlanResponse {
  id: string;
  name: string;
  plan_type: string;
  description: string;
  price: number;
  currency: string;
  duration_days: number;
  features: string[];
  is_active: boolean;
  order: number;
}

export interface SubscriptionResponse {
  id: string;
  user: string;
  subscription_type: string;
  status: string;
  amount: number;
  currency: string;
  duration_days: number;
  start_date: string | null;
  end_date: string | null;
  auto_renew: boolean;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface AdBoostResponse {
  id: string;
  ad: string;
  ad_title: string;
  boost_type: string;
  status: string;
  amount: number;
  currency: string;
  duration_days: number;
  start_date: string | null;
  end_date: string | null;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface TransactionResponse {
  id: string;
  user: string;
  transaction_type: string;
  subscription: string | null;
  ad_boost: string | null;
  amount: number;
  currency: string;
  payment_method: string;
  status: string;
  transaction_reference: string;
  payment_provider_reference: string;
  metadata: Record<string, unknown>;
  notes: string;
  created_at: string;
  updated_at: string;
}

export function presentPricingPlan(plan: PricingPlan): PricingPlanResponse {
  return {
    id: plan.id,
    name: plan.name,
    plan_type: plan.planType,
    description: plan.description,
    price: money(plan.price),
    currency: plan.currency,
    duration_days: plan.durationDays,
    features: plan.features,
    is_active: plan.isActive,
    order: plan.order,
  };
}

export function presentSubscription(
  subscription: PremiumSubscription,
  now: Date = new Date(),
): SubscriptionResponse {
  return {
    id: subscription.id,
    user: subscription.user.id,
    subscription_type: subscription.subscriptionType,
    status: subscription.status,
    amount: money(subscription.amount),
    currency: subscription.currency,
    duration_days: subscription.durationDays,
    start_date: iso(subscription.startDate),
    end_date: iso(subscription.endDate),
    auto_renew: subscription.autoRenew,
    is_active: subscription.isActive(now),
    created_at: subscription.createdAt.toISOString(),
    updated_at: subscription.updatedAt.toISOString(),
  };
}

export function presentAdBoost(adBoost: AdBoost, now: Date = new Date()): AdBoostResponse {
  return {
    id: adBoost.id,
    ad: adBoost.ad.id,
    ad_title: adBoost.ad.title,
    boost_type: adBoost.boostType,
    status: adBoost.status,
    amount: money(adBoost.amount),
    currency: adBoost.currency,
    duration_days: adBoost.durationDays,
    start_date: iso(adBoost.startDate),
    end_date: iso(adBoost.endDate),
    is_active: adBoost.isActive(now),
    created_at: adBoost.createdAt.toISOString(),
    updated_at: adBoost.updatedAt.toISOString(),
  };
}

export function presentTransaction(transaction: Transaction): TransactionResponse {
  return {
    id: transaction.id,
    user: transaction.user.id,
    transaction_type: transaction.transactionType,
    subscription: transaction.subscription?.id ?? null,
    ad_boost: transaction.adBoost?.id ?? null,
    amount: money(transaction.amount),
    currency: transaction.currency,
    payment_method: transaction.paymentMethod,
    status: transaction.status,
    transaction_reference: transaction.transactionReference,
    payment_provider_reference: transaction.paymentProviderReference ?? '',
    metadata: transaction.metadata,
    notes: transaction.notes,
    created_at: transaction.createdAt.toISOString(),
    updated_at: transaction.updatedAt.toISOString(),
  };
}
