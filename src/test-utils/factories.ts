import { Ad, AdStatus } from '../modules/ads/entities/ad.entity';
import { Category } from '../modules/category/entities/category.entity';
import { Location } from '../modules/user/entities/location.entity';
import { User } from '../modules/user/entities/user.entity';
import { AdBoost, BoostType } from '../modules/payment/entities/ad-boost.entity';
import {
  PremiumSubscription,
  SubscriptionType,
} from '../modules/payment/entities/premium-subscription.entity';
import { PaymentMethod, Transaction, TransactionType } from '../modules/payment/entities/transaction.entity';
import { PlanType, PricingPlan } from '../modules/payment/entities/pricing-plan.entity';

export const FIXED_NOW = new Date('2025-03-10T12:00:00.000Z');

export function makeUser(overrides: Partial<User> = {}): User {
  return Object.assign(
    new User(),
    { email: 'seller@example.com', firstName: 'Amina', lastName: 'Otieno' },
    overrides,
  );
}

export function makeCategory(overrides: Partial<Category> = {}): Category {
  return Object.assign(new Category(), { name: 'Electronics', slug: 'electronics' }, overrides);
}

export function makeLocation(overrides: Partial<Location> = {}): Location {
  return Object.assign(new Location(), { city: 'Nairobi', county: 'Nairobi' }, overrides);
}

export function makeAd(overrides: Partial<Ad> = {}): Ad {
  return Object.assign(
    new Ad(),
    {
      title: 'Used laptop',
      slug: 'used-laptop',
      description: 'Lightly used, 16GB RAM',
      price: 45000,
      category: makeCategory(),
      seller: makeUser(),
      status: AdStatus.ACTIVE,
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    },
    overrides,
  );
}

export function makeSubscription(overrides: Partial<PremiumSubscription> = {}): PremiumSubscription {
  return Object.assign(
    new PremiumSubscription(),
    {
      user: makeUser(),
      subscriptionType: SubscriptionType.PREMIUM,
      amount: 999,
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    },
    overrides,
  );
}

export function makeAdBoost(overrides: Partial<AdBoost> = {}): AdBoost {
  return Object.assign(
    new AdBoost(),
    {
      ad: makeAd(),
      boostType: BoostType.VIP,
      amount: 499,
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    },
    overrides,
  );
}

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return Object.assign(
    new Transaction(),
    {
      user: makeUser(),
      transactionType: TransactionType.SUBSCRIPTION,
      amount: 999,
      paymentMethod: PaymentMethod.MPESA,
      transactionReference: 'TXN-20250310-00000000000000AA',
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    },
    overrides,
  );
}

export function makePricingPlan(overrides: Partial<PricingPlan> = {}): PricingPlan {
  return Object.assign(
    new PricingPlan(),
    {
      name: 'Premium',
      planType: PlanType.SUBSCRIPTION,
      description: 'Premium seller tools',
      price: 999,
      features: ['Unlimited ads'],
      createdAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    },
    overrides,
  );
}
