import { Ad } from '../entities/ad.entity';
import { AdPage } from '../services/ad-listing.service';

export interface AdResponse {
  id: string;
  title: string;
  slug: string;
  description: string;
  price: number;
  currency: string;
  condition: string;
  category: { id: string; name: string; slug: string };
  location: { city: string; county: string } | null;
  seller: string;
  status: string;
  premium_type: string;
  is_premium_listing: boolean;
  is_negotiable: boolean;
  views_count: number;
  contact_count: number;
  expires_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface AdPageResponse {
  count: number;
  page: number;
  page_size: number;
  results: AdResponse[];
}

export function presentAd(ad: Ad): AdResponse {
  return {
    id: ad.id,
    title: ad.title,
    slug: ad.slug,
    description: ad.description,
    // numeric(12,2) is read back as a string
    price: Number(ad.price),
    currency: ad.currency,
    condition: ad.condition,
    category: { id: ad.category.id, name: ad.category.name, slug: ad.category.slug },
    location: ad.location ? { city: ad.location.city, county: ad.location.county } : null,
    seller: ad.seller.id,
    status: ad.status,
    premium_type: ad.premiumType,
    is_premium_listing: ad.isPremiumListing,
    is_negotiable: ad.isNegotiable,
    views_count: ad.viewsCount,
    contact_count: ad.contactCount,
    expires_at: ad.expiresAt ? ad.expiresAt.toISOString() : null,
    created_at: ad.createdAt.toISOString(),
    updated_at: ad.updatedAt.toISOString(),
  };
}

export function presentAdPage(page: AdPage): AdPageResponse {
  return {
    count: page.count,
    page: page.page,
    page_size: page.pageSize,
    results: page.results.map((ad) => presentAd(ad)),
  };
}
