import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EntityManager, FilterQuery, LockMode } from '@mikro-orm/core';
import { InvalidStateError, NotFoundError, PermissionError } from '../../../common/errors/domain.errors';
import { Ad, AdStatus } from '../entities/ad.entity';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Single-ad operations addressed by slug. Counter updates and status changes
 * run under a row lock so concurrent requests do not lose increments.
 */
@Injectable()
export class AdService {
  private readonly logger = new Logger(AdService.name);
  private readonly expirationDays: number;

  constructor(
    private readonly em: EntityManager,
    configService: ConfigService,
  ) {
    this.expirationDays = configService.get<number>('config.ads.expirationDays') ?? 30;
  }

  /** Ad detail. A view is counted unless the viewer is the seller. */
  async viewAd(slug: string, viewerId?: string): Promise<Ad> {
    return this.em.transactional(async (em) => {
      const ad = await this.findLocked(em, { slug, status: { $ne: AdStatus.DELETED } });
      if (!viewerId || !ad.isOwnedBy(viewerId)) {
        ad.viewsCount += 1;
      }
      return ad;
    });
  }

  async markSold(slug: string, userId: string): Promise<Ad> {
    const ad = await this.em.transactional(async (em) => {
      const ad = await this.findOwnedLocked(em, slug, userId);
      if (ad.status === AdStatus.SOLD) {
        throw new InvalidStateError('Ad is already marked as sold.');
      }
      ad.markSold();
      return ad;
    });

    this.logger.log(`Ad ${ad.id} marked sold by ${userId}`);
    return ad;
  }

  async reactivate(slug: string, userId: string, now: Date = new Date()): Promise<Ad> {
    const ad = await this.em.transactional(async (em) => {
      const ad = await this.findOwnedLocked(em, slug, userId);
      if (ad.status !== AdStatus.EXPIRED && ad.status !== AdStatus.SOLD) {
        throw new InvalidStateError('Only expired or sold ads can be reactivated.');
      }
      ad.reactivate(new Date(now.getTime() + this.expirationDays * DAY_MS));
      return ad;
    });

    this.logger.log(`Ad ${ad.id} reactivated until ${ad.expiresAt?.toISOString()}`);
    return ad;
  }

  /** Counts a buyer reaching out to the seller of an active ad. */
  async recordContact(slug: string, userId: string): Promise<Ad> {
    return this.em.transactional(async (em) => {
      const ad = await this.findLocked(em, { slug, status: AdStatus.ACTIVE });
      if (ad.isOwnedBy(userId)) {
        throw new InvalidStateError('Cannot contact your own ad.');
      }
      ad.contactCount += 1;
      return ad;
    });
  }

  private async findOwnedLocked(em: EntityManager, slug: string, userId: string): Promise<Ad> {
    const ad = await this.findLocked(em, { slug, status: { $ne: AdStatus.DELETED } });
    if (!ad.isOwnedBy(userId)) {
      throw new PermissionError();
    }
    return ad;
  }

  private async findLocked(em: EntityManager, where: FilterQuery<Ad>): Promise<Ad> {
    const ad = await em.findOne(Ad, where, {
      populate: ['category', 'location'],
      lockMode: LockMode.PESSIMISTIC_WRITE,
    });
    if (!ad) {
      throw new NotFoundError('Ad not found.');
    }
    return ad;
  }
}
