import { Injectable, Logger } from '@nestjs/common';
import { EntityManager, LockMode, QueryOrder } from '@mikro-orm/core';
import {
  InvalidStateError,
  NotFoundError,
  PermissionError,
} from '../../../common/errors/domain.errors';
import { User } from '../../user/entities/user.entity';
import { NotificationService } from '../../notification/notification.service';
import { NotificationTemplate } from '../../notification/notification.types';
import {
  PremiumSubscription,
  SubscriptionStatus,
  SubscriptionType,
} from '../entities/premium-subscription.entity';
import { PaymentMethod, Transaction } from '../entities/transaction.entity';
import { PRICING_CURRENCY, quoteAmount } from '../pricing/pricing';
import { TransactionLedgerService } from './transaction-ledger.service';

export interface SubscriptionPurchase {
  subscriptionType: SubscriptionType;
  durationDays: number;
  paymentMethod: PaymentMethod;
  autoRenew: boolean;
}

export interface SubscriptionPurchaseResult {
  subscription: PremiumSubscription;
  transaction: Transaction;
}

@Injectable()
export class SubscriptionService {
  private readonly logger = new Logger(SubscriptionService.name);

  constructor(
    private readonly em: EntityManager,
    private readonly ledger: TransactionLedgerService,
    private readonly notificationService: NotificationService,
  ) {}

  async listForUser(userId: string): Promise<PremiumSubscription[]> {
    return this.em.find(
      PremiumSubscription,
      { user: userId },
      { orderBy: { createdAt: QueryOrder.DESC } },
    );
  }

  /**
   * The active subscription that runs the longest.
   */
  async findActive(userId: string): Promise<PremiumSubscription> {
    const subscription = await this.em.findOne(
      PremiumSubscription,
      { user: userId, status: SubscriptionStatus.ACTIVE },
      { orderBy: { endDate: QueryOrder.DESC } },
    );
    if (!subscription) {
      throw new NotFoundError('No active subscription.');
    }
    return subscription;
  }

  async purchase(userId: string, purchase: SubscriptionPurchase): Promise<SubscriptionPurchaseResult> {
    const amount = quoteAmount(
      { kind: 'subscription', type: purchase.subscriptionType },
      purchase.durationDays,
    );

    const result = await this.em.transactional(async (em) => {
      const user = await em.findOne(User, { id: userId });
      if (!user) {
        throw new NotFoundError('User not found.');
      }

      const subscription = em.create(PremiumSubscription, {
        user,
        subscriptionType: purchase.subscriptionType,
        status: SubscriptionStatus.PENDING,
        amount,
        currency: PRICING_CURRENCY,
        durationDays: purchase.durationDays,
        autoRenew: purchase.autoRenew,
      });
      em.persist(subscription);

      const transaction = await this.ledger.createTransaction(em, {
        user,
        amount,
        currency: PRICING_CURRENCY,
        paymentMethod: purchase.paymentMethod,
        entitlement: { kind: 'subscription', subscription },
      });

      return { subscription, transaction };
    });

    this.logger.log(
      `User ${userId} started a ${purchase.subscriptionType} subscription purchase (${purchase.durationDays} days, ${amount} ${PRICING_CURRENCY})`,
    );
    return result;
  }

  /**
   * Cancels an active subscription and clears the owner's premium flag when
   * no other active subscription remains.
   *
   * The owner row is locked before the remaining-subscriptions check, so a
   * concurrent activation for the same user either commits first (and is
   * counted) or waits for this cancellation to finish.
   */
  async cancel(subscriptionId: string, userId: string): Promise<PremiumSubscription> {
    const subscription = await this.em.transactional(async (em) => {
      const subscription = await em.findOne(
        PremiumSubscription,
        { id: subscriptionId },
        { populate: ['user'], lockMode: LockMode.PESSIMISTIC_WRITE },
      );
      if (!subscription) {
        throw new NotFoundError('Subscription not found.');
      }
      if (subscription.user.id !== userId) {
        throw new PermissionError();
      }
      if (subscription.status !== SubscriptionStatus.ACTIVE) {
        throw new InvalidStateError('Only active subscriptions can be cancelled.');
      }

      await em.lock(subscription.user, LockMode.PESSIMISTIC_WRITE);
      subscription.cancel();

      const otherActive = await em.count(PremiumSubscription, {
        user: userId,
        status: SubscriptionStatus.ACTIVE,
        id: { $ne: subscription.id },
      });
      if (otherActive === 0) {
        subscription.user.isPremium = false;
      }

      return subscription;
    });

    this.logger.log(`User ${userId} cancelled subscription ${subscriptionId}`);
    this.notificationService.notify(userId, NotificationTemplate.SUBSCRIPTION_CANCELLED, {
      subscriptionType: subscription.subscriptionType,
    });
    return subscription;
  }
}
