import { Injectable } from '@nestjs/common';
import { EntityManager, FilterQuery, QueryOrder, QueryOrderMap } from '@mikro-orm/core';
import { Ad, AdCondition, AdPremiumType, AdStatus } from '../entities/ad.entity';

export const AD_ORDERINGS = [
  'created_at',
  '-created_at',
  'price',
  '-price',
  'views_count',
  '-views_count',
] as const;

export type AdOrdering = (typeof AD_ORDERINGS)[number];

export interface AdListingFilters {
  priceMin?: number;
  priceMax?: number;
  category?: string;
  categorySlug?: string;
  city?: string;
  county?: string;
  condition?: AdCondition;
  isPremium?: boolean;
  premiumType?: AdPremiumType;
  seller?: string;
  search?: string;
  createdAfter?: Date;
  createdBefore?: Date;
  ordering?: AdOrdering;
  page?: number;
  pageSize?: number;
}

export interface AdPage {
  count: number;
  page: number;
  pageSize: number;
  results: Ad[];
}

export const DEFAULT_PAGE_SIZE = 20;

/** Premium listings first, newest first within each group. */
export const DEFAULT_AD_ORDERING: QueryOrderMap<Ad>[] = [
  { isPremiumListing: QueryOrder.DESC },
  { createdAt: QueryOrder.DESC },
];

const ORDERINGS: Record<AdOrdering, QueryOrderMap<Ad>[]> = {
  created_at: [{ createdAt: QueryOrder.ASC }],
  '-created_at': [{ createdAt: QueryOrder.DESC }],
  price: [{ price: QueryOrder.ASC }],
  '-price': [{ price: QueryOrder.DESC }],
  views_count: [{ viewsCount: QueryOrder.ASC }],
  '-views_count': [{ viewsCount: QueryOrder.DESC }],
};

/** Escapes `%`, `_` and `\` so user input matches literally inside ILIKE. */
export const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

export function buildAdFilter(filters: AdListingFilters): FilterQuery<Ad> {
  const conditions: FilterQuery<Ad>[] = [{ status: AdStatus.ACTIVE }];

  if (filters.priceMin !== undefined) {
    conditions.push({ price: { $gte: filters.priceMin } });
  }
  if (filters.priceMax !== undefined) {
    conditions.push({ price: { $lte: filters.priceMax } });
  }
  if (filters.category) {
    conditions.push({ category: filters.category });
  }
  if (filters.categorySlug) {
    conditions.push({ category: { slug: filters.categorySlug } });
  }
  if (filters.city) {
    conditions.push({ location: { city: { $ilike: escapeLike(filters.city) } } });
  }
  if (filters.county) {
    conditions.push({ location: { county: { $ilike: escapeLike(filters.county) } } });
  }
  if (filters.condition) {
    conditions.push({ condition: filters.condition });
  }
  if (filters.isPremium !== undefined) {
    conditions.push({
      premiumType: filters.isPremium ? { $ne: AdPremiumType.BASIC } : AdPremiumType.BASIC,
    });
  }
  if (filters.premiumType) {
    conditions.push({ premiumType: filters.premiumType });
  }
  if (filters.seller) {
    conditions.push({ seller: filters.seller });
  }
  if (filters.search) {
    const pattern = `%${escapeLike(filters.search)}%`;
    conditions.push({ $or: [{ title: { $ilike: pattern } }, { description: { $ilike: pattern } }] });
  }
  if (filters.createdAfter) {
    conditions.push({ createdAt: { $gte: filters.createdAfter } });
  }
  if (filters.createdBefore) {
    conditions.push({ createdAt: { $lte: filters.createdBefore } });
  }

  return { $and: conditions };
}

export function buildAdOrdering(ordering?: AdOrdering): QueryOrderMap<Ad>[] {
  return ordering ? ORDERINGS[ordering] : DEFAULT_AD_ORDERING;
}

@Injectable()
export class AdListingService {
  constructor(private readonly em: EntityManager) {}

  async listAds(filters: AdListingFilters): Promise<AdPage> {
    const page = filters.page ?? 1;
    const pageSize = filters.pageSize ?? DEFAULT_PAGE_SIZE;

    const [results, count] = await this.em.findAndCount(Ad, buildAdFilter(filters), {
      populate: ['category', 'location'],
      orderBy: buildAdOrdering(filters.ordering),
      limit: pageSize,
      offset: (page - 1) * pageSize,
    });

    return { count, page, pageSize, results };
  }

  /** The caller's own ads in any state except deleted, newest first. */
  async listSellerAds(userId: string): Promise<Ad[]> {
    return this.em.find(
      Ad,
      { seller: userId, status: { $ne: AdStatus.DELETED } },
      { populate: ['category', 'location'], orderBy: { createdAt: QueryOrder.DESC } },
    );
  }
}
