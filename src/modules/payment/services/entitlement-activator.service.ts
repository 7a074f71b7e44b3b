import { Injectable, Logger } from '@nestjs/common';
import { EntityManager, LockMode } from '@mikro-orm/core';
import { AdPremiumType } from '../../ads/entities/ad.entity';
import { BoostType } from '../entities/ad-boost.entity';
import { Transaction } from '../entities/transaction.entity';
import { Entitlement, resolveEntitlement } from '../utils/entitlement';

export const PREMIUM_TIER_FOR_BOOST: Readonly<Record<BoostType, AdPremiumType>> = {
  [BoostType.VIP]: AdPremiumType.VIP,
  [BoostType.TOP]: AdPremiumType.TOP,
  [BoostType.BOOSTED]: AdPremiumType.BOOSTED,
  [BoostType.FEATURED]: AdPremiumType.FEATURED,
};

/**
 * Turns a paid transaction into an active entitlement and applies its effect on
 * the owning user or ad.
 *
 * `em` must be the caller's transactional EntityManager: the entitlement's own
 * status change and its effect are flushed in the same commit, so there is no
 * window where one is visible without the other. The transaction is expected to
 * be loaded with `subscription.user` / `adBoost.ad` populated.
 */
@Injectable()
export class EntitlementActivatorService {
  private readonly logger = new Logger(EntitlementActivatorService.name);

  async activate(em: EntityManager, transaction: Transaction, now: Date = new Date()): Promise<Entitlement> {
    const entitlement = resolveEntitlement(transaction);

    if (entitlement.kind === 'subscription') {
      const { subscription } = entitlement;
      // Serialises with cancellation and expiry, which read-then-write the same flag.
      await em.lock(subscription.user, LockMode.PESSIMISTIC_WRITE);
      subscription.activate(now);
      subscription.user.isPremium = true;
      this.logger.log(
        `Activated ${subscription.subscriptionType} subscription ${subscription.id} for user ${subscription.user.id} until ${subscription.endDate?.toISOString()}`,
      );
    } else {
      const { adBoost } = entitlement;
      adBoost.activate(now);
      // Last activation wins when two boosts on one ad complete together.
      adBoost.ad.setPremiumType(PREMIUM_TIER_FOR_BOOST[adBoost.boostType]);
      this.logger.log(
        `Activated ${adBoost.boostType} boost ${adBoost.id} on ad ${adBoost.ad.id} until ${adBoost.endDate?.toISOString()}`,
      );
    }

    return entitlement;
  }
}
