import type { Category, ProductImage } from '@/db/schema';
import type { ProductDetail, ProductPage } from '@/services/catalogService';
import { roundDistance } from '@/services/geoRanker';

export interface SerializedImage {
  id: number;
  image: string;
  alt_text: string;
}

export interface SerializedProduct {
  id: number;
  sku: string | null;
  name: string;
  description: string;
  price: string;
  category: number | null;
  available: boolean;
  shop_id: number;
  shop_name: string;
  shop_lat: number | null;
  shop_lng: number | null;
  tags: string[];
  images: SerializedImage[];
  created_at: string;
  updated_at: string;
}

export interface SerializedCategory {
  id: number;
  name: string;
  slug: string;
}

export interface PaginatedResponse<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

/** `mediaBaseUrl` is the absolute URL the upload root is served from. */
export function serializeImage(image: ProductImage, mediaBaseUrl: string): SerializedImage {
  return {
    id: image.id,
    image: `${mediaBaseUrl}/${image.image}`,
    alt_text: image.altText,
  };
}

export function serializeProduct(product: ProductDetail, mediaBaseUrl: string): SerializedProduct {
  return {
    id: product.id,
    sku: product.sku,
    name: product.name,
    description: product.description,
    price: product.price,
    category: product.categoryId,
    available: product.available,
    shop_id: product.shopId,
    shop_name: product.shopName,
    shop_lat: product.shopLat,
    shop_lng: product.shopLng,
    tags: product.tags,
    images: product.images.map((image) => serializeImage(image, mediaBaseUrl)),
    created_at: product.createdAt,
    updated_at: product.updatedAt,
  };
}

export function serializeRankedProduct(
  product: ProductDetail,
  distanceKm: number,
  mediaBaseUrl: string,
): SerializedProduct & { distance_km: number } {
  return { ...serializeProduct(product, mediaBaseUrl), distance_km: roundDistance(distanceKm) };
}

export function serializeCategory(category: Category): SerializedCategory {
  return { id: category.id, name: category.name, slug: category.slug };
}

/**
 * Page envelope. `pageUrl` builds the absolute link to another page of the
 * same query.
 */
export function serializeProductPage(
  page: ProductPage,
  mediaBaseUrl: string,
  pageUrl: (page: number) => string,
): PaginatedResponse<SerializedProduct> {
  const hasNext = page.page * page.pageSize < page.count;
  return {
    count: page.count,
    next: hasNext ? pageUrl(page.page + 1) : null,
    previous: page.page > 1 ? pageUrl(page.page - 1) : null,
    results: page.results.map((product) => serializeProduct(product, mediaBaseUrl)),
  };
}
