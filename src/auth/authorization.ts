/**
 * Authorization decisions over verified claims. Pure functions: a missing
 * claims object is a plain denial, never an exception.
 */
import { SHOP_OWNER_ROLE, type Claims } from './claims';

export interface ShopOwned {
  shopId: number;
}

export function canCreate(claims: Claims | null | undefined): boolean {
  if (!claims) return false;
  return claims.role === SHOP_OWNER_ROLE;
}

/**
 * True when the caller owns the product's shop.
 *
 * Tokens with a non-empty `shopIds` list are checked by membership. Tokens
 * without one fall back to comparing the shop id with the subject id, i.e. the
 * identity service is trusted to issue subject ids that double as shop ids for
 * single-shop owners. Anything that relies on this must not mint such tokens
 * for users whose id collides with another owner's shop id.
 */
export function canMutate(claims: Claims | null | undefined, product: ShopOwned): boolean {
  if (!claims) return false;

  const shopId = Math.trunc(product.shopId);

  if (claims.shopIds && claims.shopIds.length > 0) {
    return claims.shopIds.some((id) => Math.trunc(id) === shopId);
  }

  if (!/^-?\d+$/.test(claims.subjectId)) return false;
  return Number(claims.subjectId) === shopId;
}
