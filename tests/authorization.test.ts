import { describe, expect, it } from 'vitest';
import { canCreate, canMutate } from '@/auth/authorization';
import type { Claims } from '@/auth/claims';

const claims = (overrides: Partial<Claims> = {}): Claims => ({
  subjectId: '10',
  role: 'shop_owner',
  ...overrides,
});

describe('canCreate', () => {
  it('allows shop owners only', () => {
    expect(canCreate(claims())).toBe(true);
    expect(canCreate(claims({ role: 'customer' }))).toBe(false);
    expect(canCreate(claims({ role: '' }))).toBe(false);
  });

  it('denies missing claims', () => {
    expect(canCreate(undefined)).toBe(false);
    expect(canCreate(null)).toBe(false);
  });
});

describe('canMutate', () => {
  it.each([3, 7, 11])('allows shop %i when it is in the shop list', (shopId) => {
    expect(canMutate(claims({ shopIds: [3, 7, 11] }), { shopId })).toBe(true);
  });

  it('denies shops outside the list, even when the subject id matches', () => {
    expect(canMutate(claims({ subjectId: '4', shopIds: [3] }), { shopId: 4 })).toBe(false);
  });

  it('falls back to the subject id when the shop list is empty or absent', () => {
    expect(canMutate(claims({ subjectId: '10' }), { shopId: 10 })).toBe(true);
    expect(canMutate(claims({ subjectId: '10', shopIds: [] }), { shopId: 10 })).toBe(true);
    expect(canMutate(claims({ subjectId: '10' }), { shopId: 11 })).toBe(false);
    expect(canMutate(claims({ subjectId: '10', shopIds: [] }), { shopId: 12 })).toBe(false);
  });

  it('never matches a non-numeric subject id', () => {
    expect(canMutate(claims({ subjectId: 'abc' }), { shopId: 0 })).toBe(false);
    expect(canMutate(claims({ subjectId: ' ' }), { shopId: 0 })).toBe(false);
  });

  it('does not depend on the role', () => {
    expect(canMutate(claims({ role: 'customer', shopIds: [5] }), { shopId: 5 })).toBe(true);
  });

  it('denies missing claims', () => {
    expect(canMutate(undefined, { shopId: 1 })).toBe(false);
    expect(canMutate(null, { shopId: 1 })).toBe(false);
  });
});
