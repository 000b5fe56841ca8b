import { z } from 'zod';
import { PRODUCT_ORDERINGS } from '@/repositories/productRepository';
import type { FieldError } from '@/utils/errors';

/**
 * Request validation for the catalog endpoints.
 * Shop snapshot fields are not part of any schema and are dropped from payloads.
 */

const DECIMAL_PATTERN = /^\d{1,10}(\.\d{1,2})?$/;

export const priceSchema = z
  .union([z.number(), z.string().trim()])
  .transform((value) => String(value))
  .refine(
    (value) => DECIMAL_PATTERN.test(value),
    'Ensure this is a non-negative number with no more than 12 digits and 2 decimal places.',
  )
  .transform((value) => Number(value).toFixed(2));

const productFieldsSchema = z.object({
  sku: z.string().trim().max(64).nullable().optional(),
  name: z.string().trim().min(1, 'This field may not be blank.').max(255),
  description: z.string().optional(),
  price: priceSchema,
  category: z.number().int().positive().nullable().optional(),
  available: z.boolean().optional(),
  tags: z.array(z.string()).optional(),
});

/** Create and full update (PUT). */
export const productBodySchema = productFieldsSchema;

/** Partial update (PATCH). */
export const productPatchSchema = productFieldsSchema.partial();

export type ProductBody = z.infer<typeof productBodySchema>;
export type ProductPatch = z.infer<typeof productPatchSchema>;

const positiveIntParam = z.string().regex(/^\d+$/, 'A valid integer is required.').transform(Number);

export const productListQuerySchema = z.object({
  category: positiveIntParam.optional(),
  price: priceSchema.optional(),
  sku: z.string().optional(),
  search: z.string().optional(),
  ordering: z.enum(PRODUCT_ORDERINGS).optional(),
  page: positiveIntParam.refine((n) => n >= 1, 'Invalid page.').optional(),
  page_size: positiveIntParam.refine((n) => n >= 1 && n <= 100, 'page_size must be between 1 and 100').optional(),
});

export const productSearchQuerySchema = productListQuerySchema.pick({ page: true, page_size: true }).extend({
  q: z.string().optional(),
  lat: z.string().optional(),
  lng: z.string().optional(),
  radius_km: z.string().optional(),
});

export const categoryBodySchema = z.object({
  name: z.string().trim().min(1, 'This field may not be blank.').max(100),
  slug: z
    .string()
    .trim()
    .max(120)
    .regex(/^[-a-zA-Z0-9_]+$/, 'Enter a valid slug consisting of letters, numbers, underscores or hyphens.')
    .optional(),
});

export type CategoryBody = z.infer<typeof categoryBodySchema>;

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: FieldError[] };

/** Runs `schema` against `data`, flattening zod issues into field errors. */
export function validate<T extends z.ZodTypeAny>(schema: T, data: unknown): ValidationResult<z.output<T>> {
  const result = schema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  return { success: true, data: result.data };
}
