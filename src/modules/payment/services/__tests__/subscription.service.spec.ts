import { Test, TestingModule } from '@nestjs/testing';
import { EntityManager, LockMode, QueryOrder } from '@mikro-orm/core';
import {
  InvalidStateError,
  NotFoundError,
  PermissionError,
  ValidationError,
} from '../../../../common/errors/domain.errors';
import { createMockEntityManager, MockEntityManager } from '../../../../test-utils/mock-entity-manager';
import { makeSubscription, makeTransaction, makeUser } from '../../../../test-utils/factories';
import { User } from '../../../user/entities/user.entity';
import { NotificationService } from '../../../notification/notification.service';
import { NotificationTemplate } from '../../../notification/notification.types';
import {
  PremiumSubscription,
  SubscriptionStatus,
  SubscriptionType,
} from '../../entities/premium-subscription.entity';
import { PaymentMethod } from '../../entities/transaction.entity';
import { SubscriptionService } from '../subscription.service';
import { TransactionLedgerService } from '../transaction-ledger.service';

describe('SubscriptionService', () => {
  let service: SubscriptionService;
  let em: MockEntityManager;
  let ledger: { createTransaction: jest.Mock };
  let notificationService: { notify: jest.Mock };

  beforeEach(async () => {
    em = createMockEntityManager();
    ledger = { createTransaction: jest.fn() };
    notificationService = { notify: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SubscriptionService,
        { provide: EntityManager, useValue: em },
        { provide: TransactionLedgerService, useValue: ledger },
        { provide: NotificationService, useValue: notificationService },
      ],
    }).compile();

    service = module.get(SubscriptionService);
  });

  describe('purchase', () => {
    it('creates a pending subscription and its transaction together', async () => {
      const user = makeUser();
      const transaction = makeTransaction({ user });
      em.findOne.mockResolvedValue(user);
      ledger.createTransaction.mockResolvedValue(transaction);

      const result = await service.purchase(user.id, {
        subscriptionType: SubscriptionType.PREMIUM,
        durationDays: 30,
        paymentMethod: PaymentMethod.MPESA,
        autoRenew: false,
      });

      expect(em.transactional).toHaveBeenCalledTimes(1);
      expect(em.findOne).toHaveBeenCalledWith(User, { id: user.id });
      expect(result.transaction).toBe(transaction);
      expect(result.subscription).toBeInstanceOf(PremiumSubscription);
      expect(result.subscription).toMatchObject({
        user,
        subscriptionType: SubscriptionType.PREMIUM,
        status: SubscriptionStatus.PENDING,
        amount: 999,
        currency: 'KES',
        durationDays: 30,
        autoRenew: false,
      });
      expect(em.persist).toHaveBeenCalledWith(result.subscription);
      expect(ledger.createTransaction).toHaveBeenCalledWith(em, {
        user,
        amount: 999,
        currency: 'KES',
        paymentMethod: PaymentMethod.MPESA,
        entitlement: { kind: 'subscription', subscription: result.subscription },
      });
    });

    it('prorates longer terms', async () => {
      const user = makeUser();
      em.findOne.mockResolvedValue(user);
      ledger.createTransaction.mockResolvedValue(makeTransaction({ user }));

      const result = await service.purchase(user.id, {
        subscriptionType: SubscriptionType.PREMIUM,
        durationDays: 45,
        paymentMethod: PaymentMethod.CARD,
        autoRenew: true,
      });

      expect(result.subscription.amount).toBe(1498.5);
      expect(result.subscription.autoRenew).toBe(true);
    });

    it('rejects an invalid duration before opening a database transaction', async () => {
      await expect(
        service.purchase('user-1', {
          subscriptionType: SubscriptionType.PRO,
          durationDays: 0,
          paymentMethod: PaymentMethod.MPESA,
          autoRenew: false,
        }),
      ).rejects.toThrow(ValidationError);
      expect(em.transactional).not.toHaveBeenCalled();
    });

    it('fails for an unknown user', async () => {
      em.findOne.mockResolvedValue(null);

      await expect(
        service.purchase('missing', {
          subscriptionType: SubscriptionType.PREMIUM,
          durationDays: 30,
          paymentMethod: PaymentMethod.MPESA,
          autoRenew: false,
        }),
      ).rejects.toThrow(new NotFoundError('User not found.'));
      expect(ledger.createTransaction).not.toHaveBeenCalled();
    });
  });

  describe('findActive', () => {
    it('returns the active subscription that ends last', async () => {
      const subscription = makeSubscription({ status: SubscriptionStatus.ACTIVE });
      em.findOne.mockResolvedValue(subscription);

      await expect(service.findActive('user-1')).resolves.toBe(subscription);
      expect(em.findOne).toHaveBeenCalledWith(
        PremiumSubscription,
        { user: 'user-1', status: SubscriptionStatus.ACTIVE },
        { orderBy: { endDate: QueryOrder.DESC } },
      );
    });

    it('reports when there is none', async () => {
      await expect(service.findActive('user-1')).rejects.toThrow(new NotFoundError('No active subscription.'));
    });
  });

  describe('cancel', () => {
    const now = new Date('2025-03-10T12:00:00.000Z');

    const activeSubscriptionOf = (user: User): PremiumSubscription => {
      const subscription = makeSubscription({ user });
      subscription.activate(now);
      return subscription;
    };

    it('cancels and clears premium when nothing else is active', async () => {
      const user = makeUser({ isPremium: true });
      const subscription = activeSubscriptionOf(user);
      em.findOne.mockResolvedValue(subscription);
      em.count.mockResolvedValue(0);

      const result = await service.cancel(subscription.id, user.id);

      expect(result).toBe(subscription);
      expect(em.findOne).toHaveBeenCalledWith(
        PremiumSubscription,
        { id: subscription.id },
        { populate: ['user'], lockMode: LockMode.PESSIMISTIC_WRITE },
      );
      expect(em.lock).toHaveBeenCalledWith(user, LockMode.PESSIMISTIC_WRITE);
      expect(em.count).toHaveBeenCalledWith(PremiumSubscription, {
        user: user.id,
        status: SubscriptionStatus.ACTIVE,
        id: { $ne: subscription.id },
      });
      expect(subscription.status).toBe(SubscriptionStatus.CANCELLED);
      expect(subscription.autoRenew).toBe(false);
      expect(user.isPremium).toBe(false);
    });

    it('keeps premium while another subscription is still active', async () => {
      const user = makeUser({ isPremium: true });
      const subscription = activeSubscriptionOf(user);
      em.findOne.mockResolvedValue(subscription);
      em.count.mockResolvedValue(1);

      await service.cancel(subscription.id, user.id);

      expect(subscription.status).toBe(SubscriptionStatus.CANCELLED);
      expect(user.isPremium).toBe(true);
    });

    it('notifies the owner once the cancellation is committed', async () => {
      const user = makeUser({ isPremium: true });
      const subscription = activeSubscriptionOf(user);
      em.findOne.mockResolvedValue(subscription);

      await service.cancel(subscription.id, user.id);

      expect(notificationService.notify).toHaveBeenCalledWith(
        user.id,
        NotificationTemplate.SUBSCRIPTION_CANCELLED,
        { subscriptionType: 'premium' },
      );
    });

    it('fails for an unknown subscription', async () => {
      em.findOne.mockResolvedValue(null);

      await expect(service.cancel('missing', 'user-1')).rejects.toThrow(
        new NotFoundError('Subscription not found.'),
      );
    });

    it("refuses to cancel another user's subscription", async () => {
      const owner = makeUser({ isPremium: true });
      const subscription = activeSubscriptionOf(owner);
      em.findOne.mockResolvedValue(subscription);

      await expect(service.cancel(subscription.id, 'someone-else')).rejects.toThrow(PermissionError);
      expect(subscription.status).toBe(SubscriptionStatus.ACTIVE);
      expect(owner.isPremium).toBe(true);
      expect(notificationService.notify).not.toHaveBeenCalled();
    });

    it.each([SubscriptionStatus.PENDING, SubscriptionStatus.CANCELLED, SubscriptionStatus.EXPIRED])(
      'refuses to cancel a %s subscription',
      async (status) => {
        const user = makeUser();
        const subscription = makeSubscription({ user, status });
        em.findOne.mockResolvedValue(subscription);

        await expect(service.cancel(subscription.id, user.id)).rejects.toThrow(
          new InvalidStateError('Only active subscriptions can be cancelled.'),
        );
        expect(subscription.status).toBe(status);
        expect(em.lock).not.toHaveBeenCalled();
      },
    );
  });

  describe('listForUser', () => {
    it('lists newest first', async () => {
      await service.listForUser('user-1');

      expect(em.find).toHaveBeenCalledWith(
        PremiumSubscription,
        { user: 'user-1' },
        { orderBy: { createdAt: QueryOrder.DESC } },
      );
    });
  });
});
