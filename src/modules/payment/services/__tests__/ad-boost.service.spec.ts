import { Test, TestingModule } from '@nestjs/testing';
import { EntityManager, QueryOrder } from '@mikro-orm/core';
import { ValidationError } from '../../../../common/errors/domain.errors';
import { createMockEntityManager, MockEntityManager } from '../../../../test-utils/mock-entity-manager';
import { makeAd, makeTransaction, makeUser } from '../../../../test-utils/factories';
import { Ad } from '../../../ads/entities/ad.entity';
import { AdBoost, BoostStatus, BoostType } from '../../entities/ad-boost.entity';
import { PaymentMethod } from '../../entities/transaction.entity';
import { AdBoostService } from '../ad-boost.service';
import { TransactionLedgerService } from '../transaction-ledger.service';

describe('AdBoostService', () => {
  let service: AdBoostService;
  let em: MockEntityManager;
  let ledger: { createTransaction: jest.Mock };

  beforeEach(async () => {
    em = createMockEntityManager();
    ledger = { createTransaction: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdBoostService,
        { provide: EntityManager, useValue: em },
        { provide: TransactionLedgerService, useValue: ledger },
      ],
    }).compile();

    service = module.get(AdBoostService);
  });

  describe('purchase', () => {
    it("creates a pending boost on the seller's own ad", async () => {
      const seller = makeUser();
      const ad = makeAd({ seller });
      const transaction = makeTransaction({ user: seller });
      em.findOne.mockResolvedValue(ad);
      ledger.createTransaction.mockResolvedValue(transaction);

      const result = await service.purchase(seller.id, {
        adId: ad.id,
        boostType: BoostType.VIP,
        durationDays: 3,
        paymentMethod: PaymentMethod.MPESA,
      });

      expect(em.findOne).toHaveBeenCalledWith(Ad, { id: ad.id, seller: seller.id }, { populate: ['seller'] });
      expect(result.transaction).toBe(transaction);
      expect(result.adBoost).toBeInstanceOf(AdBoost);
      expect(result.adBoost).toMatchObject({
        ad,
        boostType: BoostType.VIP,
        status: BoostStatus.PENDING,
        amount: 213.86,
        currency: 'KES',
        durationDays: 3,
      });
      expect(em.persist).toHaveBeenCalledWith(result.adBoost);
      expect(ledger.createTransaction).toHaveBeenCalledWith(em, {
        user: seller,
        amount: 213.86,
        currency: 'KES',
        paymentMethod: PaymentMethod.MPESA,
        entitlement: { kind: 'ad_boost', adBoost: result.adBoost },
      });
    });

    it('rejects an ad the caller does not own', async () => {
      em.findOne.mockResolvedValue(null);

      let caught: unknown;
      try {
        await service.purchase('user-1', {
          adId: 'someone-elses-ad',
          boostType: BoostType.TOP,
          durationDays: 7,
          paymentMethod: PaymentMethod.CARD,
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      expect(caught).toMatchObject({
        fields: { ad_id: ["Ad not found or you don't have permission to boost it."] },
      });
      expect(em.persist).not.toHaveBeenCalled();
      expect(ledger.createTransaction).not.toHaveBeenCalled();
    });

    it('validates the duration before touching the database', async () => {
      await expect(
        service.purchase('user-1', {
          adId: 'ad-1',
          boostType: BoostType.TOP,
          durationDays: -1,
          paymentMethod: PaymentMethod.CARD,
        }),
      ).rejects.toThrow(ValidationError);
      expect(em.transactional).not.toHaveBeenCalled();
    });
  });

  describe('listForSeller', () => {
    it("lists boosts across the seller's ads, newest first", async () => {
      await service.listForSeller('user-1');

      expect(em.find).toHaveBeenCalledWith(
        AdBoost,
        { ad: { seller: 'user-1' } },
        { populate: ['ad'], orderBy: { createdAt: QueryOrder.DESC } },
      );
    });
  });
});
