import { asc, eq } from 'drizzle-orm';
import type { CatalogDatabase } from '@/db';
import { categories, type Category, type NewCategory } from '@/db/schema';

export class CategoryRepository {
  constructor(private readonly db: CatalogDatabase) {}

  list(): Category[] {
    return this.db.select().from(categories).orderBy(asc(categories.name)).all();
  }

  findById(id: number): Category | undefined {
    return this.db.select().from(categories).where(eq(categories.id, id)).get();
  }

  /** Throws the driver's constraint error on a duplicate name or slug. */
  insert(values: NewCategory): Category {
    const row = this.db.insert(categories).values(values).returning().get();
    if (!row) throw new Error('Category insert returned no row');
    return row;
  }

  /** Products in the category keep existing with no category. */
  delete(id: number): boolean {
    return this.db.delete(categories).where(eq(categories.id, id)).run().changes > 0;
  }
}
