// src/services/catalogService.ts: product and category operations behind the HTTP routes
import { canCreate, canMutate } from '@/auth/authorization';
import type { Principal } from '@/auth/claims';
import { isUniqueViolation } from '@/db/errors';
import type { Category, NewProduct, Product, ProductImage } from '@/db/schema';
import type { CategoryRepository } from '@/repositories/categoryRepository';
import type { ProductFilters, ProductOrdering, ProductRepository } from '@/repositories/productRepository';
import { rankByDistance, type Coordinate } from '@/services/geoRanker';
import type { ShopDirectoryClient } from '@/services/shopDirectory';
import { generateSku as defaultSkuGenerator, type SkuGenerator } from '@/services/sku';
import {
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from '@/utils/errors';
import { logger } from '@/utils/logger';
import type { CategoryBody, ProductBody, ProductPatch } from '@/validation/catalog.validation';

export interface ProductDetail extends Product {
  images: ProductImage[];
}

export interface ProductPage {
  count: number;
  page: number;
  pageSize: number;
  results: ProductDetail[];
}

export interface RankedProduct {
  product: ProductDetail;
  distanceKm: number;
}

export interface ListProductsOptions {
  filters?: ProductFilters;
  ordering?: ProductOrdering;
  page?: number;
  pageSize?: number;
}

export interface SearchProductsOptions {
  q?: string;
  lat?: string;
  lng?: string;
  radiusKm?: string;
  page?: number;
  pageSize?: number;
}

export type SearchOutcome =
  | { mode: 'geo'; results: RankedProduct[] }
  | { mode: 'list'; page: ProductPage };

export interface NewImageFile {
  /** Path relative to the upload root. */
  image: string;
  altText: string;
}

export interface CatalogServiceDeps {
  products: ProductRepository;
  categories: CategoryRepository;
  directory: ShopDirectoryClient;
  defaultPageSize: number;
  defaultRadiusKm: number;
  generateSku?: SkuGenerator;
  maxSkuAttempts?: number;
  now?: () => Date;
}

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const DEFAULT_MAX_SKU_ATTEMPTS = 10;
const OTHER_SHOP_MESSAGE = "You can't modify products of other shops.";

function parseNumber(raw: string): number | null {
  const trimmed = raw.trim();
  if (!NUMBER_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function slugify(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9\s_-]/g, '')
    .trim()
    .replace(/[\s_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

function requirePrincipal(principal: Principal | undefined): Principal {
  if (!principal) {
    throw new AuthenticationError('not_authenticated');
  }
  return principal;
}

/**
 * Product and category operations.
 *
 * Reads are public. Every write takes the caller's {@link Principal} (or
 * `undefined` for anonymous callers) and is authorized before anything is
 * written.
 */
export class CatalogService {
  private readonly products: ProductRepository;
  private readonly categories: CategoryRepository;
  private readonly directory: ShopDirectoryClient;
  private readonly defaultPageSize: number;
  private readonly defaultRadiusKm: number;
  private readonly generateSku: SkuGenerator;
  private readonly maxSkuAttempts: number;
  private readonly now: () => Date;

  constructor(deps: CatalogServiceDeps) {
    this.products = deps.products;
    this.categories = deps.categories;
    this.directory = deps.directory;
    this.defaultPageSize = deps.defaultPageSize;
    this.defaultRadiusKm = deps.defaultRadiusKm;
    this.generateSku = deps.generateSku ?? defaultSkuGenerator;
    this.maxSkuAttempts = deps.maxSkuAttempts ?? DEFAULT_MAX_SKU_ATTEMPTS;
    this.now = deps.now ?? (() => new Date());
  }

  listProducts(options: ListProductsOptions = {}): ProductPage {
    const filters = options.filters ?? {};
    const page = options.page ?? 1;
    const pageSize = options.pageSize ?? this.defaultPageSize;

    const total = this.products.count(filters);
    const lastPage = Math.max(1, Math.ceil(total / pageSize));
    if (page > lastPage) {
      throw new NotFoundError('Invalid page.');
    }

    const rows = this.products.list(filters, options.ordering ?? '-updated_at', {
      limit: pageSize,
      offset: (page - 1) * pageSize,
    });

    return { count: total, page, pageSize, results: this.withImages(rows) };
  }

  getProduct(id: number): ProductDetail {
    return this.withImages([this.requireProduct(id)])[0];
  }

  /**
   * Name search over available products. With both `lat` and `lng` the
   * matches are ranked by distance within the radius; otherwise this is the
   * paginated listing.
   */
  searchProducts(options: SearchProductsOptions): SearchOutcome {
    const filters: ProductFilters = options.q ? { nameContains: options.q } : {};

    if (!options.lat || !options.lng) {
      return {
        mode: 'list',
        page: this.listProducts({ filters, page: options.page, pageSize: options.pageSize }),
      };
    }

    const origin = this.parseOrigin(options.lat, options.lng);
    const radiusKm = this.parseRadius(options.radiusKm);

    const ranked = rankByDistance(this.products.scan(filters), origin, radiusKm);
    const detailed = this.withImages(ranked.map((r) => r.item));

    return {
      mode: 'geo',
      results: ranked.map((r, i) => ({ product: detailed[i], distanceKm: r.distanceKm })),
    };
  }

  async createProduct(principal: Principal | undefined, input: ProductBody): Promise<ProductDetail> {
    const { claims, credential } = requirePrincipal(principal);
    if (!canCreate(claims)) {
      throw new AuthorizationError('Only shop owners can create products');
    }
    this.requireCategory(input.category);

    // the caller's own token goes to the directory; only their shops come back
    const lookup = await this.directory.listOwnedShops(claims.subjectId, credential);
    if (!lookup.success) {
      if (lookup.error.reason === 'directory_unavailable') {
        logger.error('directory:unavailable', { subjectId: claims.subjectId, detail: lookup.error.detail });
      } else {
        logger.warn('directory:no_shops', { subjectId: claims.subjectId });
      }
      throw lookup.error;
    }

    // TODO: let owners of several shops pick the target shop instead of taking the first one
    const [shop] = lookup.shops;
    const timestamp = this.now().toISOString();

    const values: Omit<NewProduct, 'sku'> = {
      name: input.name,
      description: input.description ?? '',
      price: input.price,
      categoryId: input.category ?? null,
      available: input.available ?? true,
      shopId: shop.id,
      shopName: shop.name,
      shopLat: shop.latitude,
      shopLng: shop.longitude,
      tags: input.tags ?? [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    const product = this.writeWithSku(input.sku, (sku) => this.products.insert({ ...values, sku }));

    logger.info('product:created', { id: product.id, sku: product.sku, shopId: product.shopId });
    return { ...product, images: [] };
  }

  /** Full (PUT) or partial (PATCH) update. Shop snapshot fields never change. */
  updateProduct(principal: Principal | undefined, id: number, input: ProductBody | ProductPatch): ProductDetail {
    const product = this.authorizeMutation(principal, id, 'Only shop owners can modify products');
    this.requireCategory(input.category);

    const changes: Partial<NewProduct> = { updatedAt: this.now().toISOString() };
    if (input.name !== undefined) changes.name = input.name;
    if (input.description !== undefined) changes.description = input.description;
    if (input.price !== undefined) changes.price = input.price;
    if (input.category !== undefined) changes.categoryId = input.category;
    if (input.available !== undefined) changes.available = input.available;
    if (input.tags !== undefined) changes.tags = input.tags;

    const write = (sku?: string): Product => {
      const row = this.products.update(product.id, sku === undefined ? changes : { ...changes, sku });
      if (!row) throw new NotFoundError();
      return row;
    };

    // an explicitly cleared SKU gets a fresh one; an absent SKU is left alone
    const updated =
      input.sku === undefined
        ? write()
        : this.writeWithSku(input.sku, (sku) => write(sku));

    logger.info('product:updated', { id: updated.id });
    return this.withImages([updated])[0];
  }

  deleteProduct(principal: Principal | undefined, id: number): void {
    const product = this.authorizeMutation(principal, id, 'Only shop owners can modify products');
    this.products.delete(product.id);
    logger.info('product:deleted', { id: product.id });
  }

  /**
   * Ownership check shared by every product write, including image uploads,
   * which are gated on ownership alone.
   */
  authorizeMutation(principal: Principal | undefined, id: number, roleMessage?: string): Product {
    const { claims } = requirePrincipal(principal);
    if (roleMessage !== undefined && !canCreate(claims)) {
      throw new AuthorizationError(roleMessage);
    }

    const product = this.requireProduct(id);
    if (!canMutate(claims, product)) {
      throw new AuthorizationError(OTHER_SHOP_MESSAGE);
    }
    return product;
  }

  addImages(principal: Principal | undefined, productId: number, files: NewImageFile[]): ProductImage[] {
    const product = this.authorizeMutation(principal, productId);
    if (files.length === 0) {
      throw new ValidationError('No image uploaded');
    }

    const images = this.products.addImages(
      files.map((f) => ({ productId: product.id, image: f.image, altText: f.altText })),
    );
    logger.info('product:images_added', { id: product.id, count: images.length });
    return images;
  }

  listCategories(): Category[] {
    return this.categories.list();
  }

  getCategory(id: number): Category {
    const category = this.categories.findById(id);
    if (!category) throw new NotFoundError();
    return category;
  }

  createCategory(principal: Principal | undefined, input: CategoryBody): Category {
    const { claims } = requirePrincipal(principal);
    if (!canCreate(claims)) {
      throw new AuthorizationError('Only shop owners can manage categories');
    }

    const slug = input.slug ?? slugify(input.name);
    if (!slug) {
      throw new ValidationError('Invalid input', [{ path: 'slug', message: 'Could not derive a slug from the name.' }]);
    }

    try {
      return this.categories.insert({ name: input.name, slug });
    } catch (err) {
      for (const field of ['name', 'slug'] as const) {
        if (isUniqueViolation(err, `categories.${field}`)) {
          throw new ValidationError('Invalid input', [
            { path: field, message: `category with this ${field} already exists.` },
          ]);
        }
      }
      throw err;
    }
  }

  deleteCategory(principal: Principal | undefined, id: number): void {
    const { claims } = requirePrincipal(principal);
    if (!canCreate(claims)) {
      throw new AuthorizationError('Only shop owners can manage categories');
    }
    if (!this.categories.delete(id)) {
      throw new NotFoundError();
    }
  }

  private requireProduct(id: number): Product {
    const product = this.products.findById(id);
    if (!product) throw new NotFoundError();
    return product;
  }

  private requireCategory(categoryId: number | null | undefined): void {
    if (categoryId === null || categoryId === undefined) return;
    if (!this.categories.findById(categoryId)) {
      throw new ValidationError('Invalid input', [
        { path: 'category', message: `Invalid pk "${categoryId}" - object does not exist.` },
      ]);
    }
  }

  /**
   * Runs `write` with the requested SKU, or with generated ones until the
   * store accepts one. Uniqueness is decided by the store's constraint, so a
   * concurrent writer taking the same candidate only costs another attempt.
   */
  private writeWithSku(requested: string | null | undefined, write: (sku: string) => Product): Product {
    if (requested) {
      try {
        return write(requested);
      } catch (err) {
        if (isUniqueViolation(err, 'products.sku')) {
          throw new ValidationError('Invalid input', [
            { path: 'sku', message: 'product with this sku already exists.' },
          ]);
        }
        throw err;
      }
    }

    for (let attempt = 1; attempt <= this.maxSkuAttempts; attempt++) {
      const candidate = this.generateSku();
      try {
        return write(candidate);
      } catch (err) {
        if (!isUniqueViolation(err, 'products.sku')) throw err;
        logger.debug('sku:collision', { candidate, attempt });
      }
    }

    throw new Error(`Could not allocate a unique SKU after ${this.maxSkuAttempts} attempts`);
  }

  private parseOrigin(rawLat: string, rawLng: string): Coordinate {
    const lat = parseNumber(rawLat);
    const lng = parseNumber(rawLng);
    if (lat === null || lng === null || Math.abs(lat) > 90 || Math.abs(lng) > 180) {
      throw new ValidationError('Invalid lat/lng');
    }
    return { lat, lng };
  }

  private parseRadius(raw: string | undefined): number {
    if (!raw) return this.defaultRadiusKm;
    const radius = parseNumber(raw);
    if (radius === null || radius < 0) {
      throw new ValidationError('Invalid radius_km');
    }
    return radius;
  }

  private withImages(rows: Product[]): ProductDetail[] {
    const images = this.products.imagesFor(rows.map((p) => p.id));
    return rows.map((p) => ({ ...p, images: images.get(p.id) ?? [] }));
  }
}
