import { z } from 'zod';

export const SHOP_OWNER_ROLE = 'shop_owner';
export const ACCESS_TOKEN_TYPE = 'access';

/** Verified identity assertion decoded from an access token. */
export interface Claims {
  subjectId: string;
  role: string;
  shopIds?: number[];
  tokenType?: string;
  expiry?: number;
}

/** Claims plus the raw credential they were decoded from, forwarded to the shop directory. */
export interface Principal {
  claims: Claims;
  credential: string;
}

const shopIdSchema = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/, 'shop id must be an integer').transform(Number),
]);

const subjectSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

const payloadSchema = z.object({
  user_id: subjectSchema.optional(),
  sub: subjectSchema.optional(),
  role: z.string().optional().default(''),
  shop_ids: z
    .union([shopIdSchema.transform((id) => [id]), z.array(shopIdSchema)])
    .nullable()
    .optional(),
  type: z.string().nullable().optional(),
  exp: z.number().optional(),
});

export type ClaimsDecodeResult =
  | { success: true; claims: Claims }
  | { success: false; error: Array<{ path: string; message: string }> };

/**
 * Strictly decodes a verified token payload into {@link Claims}.
 * The subject comes from `user_id`, falling back to the registered `sub` claim.
 */
export function decodeClaims(payload: unknown): ClaimsDecodeResult {
  const result = payloadSchema.safeParse(payload);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  const { user_id, sub, role, shop_ids, type, exp } = result.data;
  const subjectId = user_id ?? sub;

  if (subjectId === undefined) {
    return {
      success: false,
      error: [{ path: 'user_id', message: 'Token carries no subject' }],
    };
  }

  const claims: Claims = { subjectId, role };
  if (shop_ids) claims.shopIds = shop_ids;
  if (type) claims.tokenType = type;
  if (exp !== undefined) claims.expiry = exp;

  return { success: true, claims };
}
