import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { EntityManager, LockMode, QueryOrder } from '@mikro-orm/core';
import { AdPremiumType } from '../../ads/entities/ad.entity';
import { AdBoost, BoostStatus } from '../entities/ad-boost.entity';
import { PremiumSubscription, SubscriptionStatus } from '../entities/premium-subscription.entity';
import { PREMIUM_TIER_FOR_BOOST } from './entitlement-activator.service';

export interface ExpirySweepResult {
  subscriptionsExpired: number;
  usersDowngraded: number;
  boostsExpired: number;
  /** Ads whose tier changed: back to basic, or to the tier of a boost still running. */
  adsRetiered: number;
}

/**
 * Moves lapsed entitlements to `expired` and withdraws their effect.
 * `isActive()` on the entities already reports lapsed terms as inactive;
 * this keeps the stored flags on users and ads in line with it.
 */
@Injectable()
export class EntitlementExpiryService {
  private readonly logger = new Logger(EntitlementExpiryService.name);

  constructor(private readonly em: EntityManager) {}

  @Cron(CronExpression.EVERY_HOUR)
  async handleExpirySweep(): Promise<void> {
    try {
      const result = await this.expireLapsed(new Date());
      this.logger.log(
        `Expiry sweep: ${result.subscriptionsExpired} subscriptions, ${result.boostsExpired} boosts expired; ` +
          `${result.usersDowngraded} users downgraded, ${result.adsRetiered} ads re-tiered`,
      );
    } catch (error) {
      this.logger.error('Expiry sweep failed', error instanceof Error ? error.stack : String(error));
    }
  }

  async expireLapsed(now: Date): Promise<ExpirySweepResult> {
    return this.em.transactional(async (em) => {
      const subscriptions = await em.find(
        PremiumSubscription,
        { status: SubscriptionStatus.ACTIVE, endDate: { $lt: now } },
        { populate: ['user'] },
      );
      subscriptions.forEach((subscription) => {
        subscription.status = SubscriptionStatus.EXPIRED;
      });

      let usersDowngraded = 0;
      for (const user of uniqueById(subscriptions.map((subscription) => subscription.user))) {
        await em.lock(user, LockMode.PESSIMISTIC_WRITE);
        const remaining = await em.count(PremiumSubscription, {
          user: user.id,
          status: SubscriptionStatus.ACTIVE,
          $or: [{ endDate: null }, { endDate: { $gte: now } }],
        });
        if (remaining === 0 && user.isPremium) {
          user.isPremium = false;
          usersDowngraded++;
        }
      }

      const boosts = await em.find(
        AdBoost,
        { status: BoostStatus.ACTIVE, endDate: { $lt: now } },
        { populate: ['ad'] },
      );
      boosts.forEach((boost) => {
        boost.status = BoostStatus.EXPIRED;
      });

      let adsRetiered = 0;
      for (const ad of uniqueById(boosts.map((boost) => boost.ad))) {
        // The latest running boost decides the tier once the one that set it lapses.
        const latest = await em.findOne(
          AdBoost,
          {
            ad: ad.id,
            status: BoostStatus.ACTIVE,
            $or: [{ endDate: null }, { endDate: { $gte: now } }],
          },
          { orderBy: { startDate: QueryOrder.DESC } },
        );
        const tier = latest ? PREMIUM_TIER_FOR_BOOST[latest.boostType] : AdPremiumType.BASIC;
        if (ad.premiumType !== tier) {
          ad.setPremiumType(tier);
          adsRetiered++;
        }
      }

      return {
        subscriptionsExpired: subscriptions.length,
        usersDowngraded,
        boostsExpired: boosts.length,
        adsRetiered,
      };
    });
  }
}

function uniqueById<T extends { id: string }>(entities: T[]): T[] {
  const seen = new Map<string, T>();
  entities.forEach((entity) => seen.set(entity.id, entity));
  return [...seen.values()];
}
