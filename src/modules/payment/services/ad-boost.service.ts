import { Injectable, Logger } from '@nestjs/common';
import { EntityManager, QueryOrder } from '@mikro-orm/core';
import { ValidationError } from '../../../common/errors/domain.errors';
import { Ad } from '../../ads/entities/ad.entity';
import { AdBoost, BoostStatus, BoostType } from '../entities/ad-boost.entity';
import { PaymentMethod, Transaction } from '../entities/transaction.entity';
import { PRICING_CURRENCY, quoteAmount } from '../pricing/pricing';
import { TransactionLedgerService } from './transaction-ledger.service';

export interface BoostPurchase {
  adId: string;
  boostType: BoostType;
  durationDays: number;
  paymentMethod: PaymentMethod;
}

export interface BoostPurchaseResult {
  adBoost: AdBoost;
  transaction: Transaction;
}

@Injectable()
export class AdBoostService {
  private readonly logger = new Logger(AdBoostService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly ledger: TransactionLedgerService,
  ) {}

  /** Boosts on any of the seller's ads, newest first. */
  async listForSeller(userId: string): Promise<AdBoost[]> {
    return this.em.find(
      AdBoost,
      { ad: { seller: userId } },
      { populate: ['ad'], orderBy: { createdAt: QueryOrder.DESC } },
    );
  }

  async purchase(userId: string, purchase: BoostPurchase): Promise<BoostPurchaseResult> {
    const amount = quoteAmount({ kind: 'ad_boost', type: purchase.boostType }, purchase.durationDays);

    const result = await this.em.transactional(async (em) => {
      const ad = await em.findOne(Ad, { id: purchase.adId, seller: userId }, { populate: ['seller'] });
      if (!ad) {
        throw ValidationError.forField('ad_id', "Ad not found or you don't have permission to boost it.");
      }

      const adBoost = em.create(AdBoost, {
        ad,
        boostType: purchase.boostType,
        status: BoostStatus.PENDING,
        amount,
        currency: PRICING_CURRENCY,
        durationDays: purchase.durationDays,
      });
      em.persist(adBoost);

      const transaction = await this.ledger.createTransaction(em, {
        user: ad.seller,
        amount,
        currency: PRICING_CURRENCY,
        paymentMethod: purchase.paymentMethod,
        entitlement: { kind: 'ad_boost', adBoost },
      });

      return { adBoost, transaction };
    });

    this.logger.log(
      `User ${userId} started a ${purchase.boostType} boost purchase for ad ${purchase.adId} (${purchase.durationDays} days, ${amount} ${PRICING_CURRENCY})`,
    );
    return result;
  }
}
