import { and, asc, count, desc, eq, inArray, sql, type SQL, type SQLWrapper } from 'drizzle-orm';
import type { CatalogDatabase } from '@/db';
import {
  productImages,
  products,
  type NewProduct,
  type NewProductImage,
  type Product,
  type ProductImage,
} from '@/db/schema';

export const PRODUCT_ORDERINGS = ['price', '-price', 'updated_at', '-updated_at'] as const;
export type ProductOrdering = (typeof PRODUCT_ORDERINGS)[number];

export interface ProductFilters {
  categoryId?: number;
  /** Canonical two-decimal price. */
  price?: string;
  sku?: string;
  /** Substring over name, description, tags and shop name. */
  search?: string;
  /** Substring over the name only. */
  nameContains?: string;
}

export interface PageWindow {
  limit: number;
  offset: number;
}

const contains = (column: SQLWrapper, term: string): SQL =>
  sql`instr(lower(${column}), lower(${term})) > 0`;

/**
 * Products visible through the API: every read and write goes through the
 * `available` set.
 */
export class ProductRepository {
  constructor(private readonly db: CatalogDatabase) {}

  private where(filters: ProductFilters): SQL | undefined {
    const conditions: Array<SQL | undefined> = [eq(products.available, true)];

    if (filters.categoryId !== undefined) conditions.push(eq(products.categoryId, filters.categoryId));
    if (filters.price !== undefined) conditions.push(eq(products.price, filters.price));
    if (filters.sku !== undefined) conditions.push(eq(products.sku, filters.sku));
    if (filters.nameContains) conditions.push(contains(products.name, filters.nameContains));
    if (filters.search) {
      const term = filters.search;
      conditions.push(
        sql`(${contains(products.name, term)} OR ${contains(products.description, term)} OR ${contains(products.tags, term)} OR ${contains(products.shopName, term)})`,
      );
    }

    return and(...conditions);
  }

  count(filters: ProductFilters): number {
    const row = this.db.select({ value: count() }).from(products).where(this.where(filters)).get();
    return row?.value ?? 0;
  }

  list(filters: ProductFilters, ordering: ProductOrdering, window: PageWindow): Product[] {
    const priceValue = sql`CAST(${products.price} AS REAL)`;
    const order = {
      price: [asc(priceValue), asc(products.id)],
      '-price': [desc(priceValue), desc(products.id)],
      updated_at: [asc(products.updatedAt), asc(products.id)],
      '-updated_at': [desc(products.updatedAt), desc(products.id)],
    }[ordering];

    return this.db
      .select()
      .from(products)
      .where(this.where(filters))
      .orderBy(...order)
      .limit(window.limit)
      .offset(window.offset)
      .all();
  }

  /** Every matching product in insertion order, for in-memory ranking. */
  scan(filters: ProductFilters): Product[] {
    return this.db.select().from(products).where(this.where(filters)).orderBy(asc(products.id)).all();
  }

  findById(id: number): Product | undefined {
    return this.db
      .select()
      .from(products)
      .where(and(eq(products.id, id), eq(products.available, true)))
      .get();
  }

  /** Throws the driver's constraint error on a duplicate SKU. */
  insert(values: NewProduct): Product {
    const row = this.db.insert(products).values(values).returning().get();
    if (!row) throw new Error('Product insert returned no row');
    return row;
  }

  update(id: number, values: Partial<NewProduct>): Product | undefined {
    return this.db.update(products).set(values).where(eq(products.id, id)).returning().get();
  }

  delete(id: number): boolean {
    return this.db.delete(products).where(eq(products.id, id)).run().changes > 0;
  }

  imagesFor(productIds: number[]): Map<number, ProductImage[]> {
    const byProduct = new Map<number, ProductImage[]>();
    if (productIds.length === 0) return byProduct;

    const rows = this.db
      .select()
      .from(productImages)
      .where(inArray(productImages.productId, productIds))
      .orderBy(asc(productImages.id))
      .all();

    for (const row of rows) {
      const list = byProduct.get(row.productId) ?? [];
      list.push(row);
      byProduct.set(row.productId, list);
    }
    return byProduct;
  }

  addImages(images: NewProductImage[]): ProductImage[] {
    if (images.length === 0) return [];
    return this.db.transaction((tx) => tx.insert(productImages).values(images).returning().all());
  }
}
