import { describe, expect, it } from 'vitest';
import { EARTH_RADIUS_KM, haversineKm, rankByDistance, roundDistance } from '@/services/geoRanker';

const KM_PER_DEGREE_AT_EQUATOR = (EARTH_RADIUS_KM * Math.PI) / 180;
const origin = { lat: 0, lng: 0 };

/** A candidate `km` east of the origin along the equator. */
const eastOfOrigin = (id: string, km: number) => ({
  id,
  shopLat: 0,
  shopLng: km / KM_PER_DEGREE_AT_EQUATOR,
});

describe('haversineKm', () => {
  it.each([
    { lat: 0, lng: 0 },
    { lat: 6.9271, lng: 79.8612 },
    { lat: -33.8688, lng: 151.2093 },
    { lat: 89.9, lng: -179.9 },
  ])('is zero from a point to itself (%o)', (point) => {
    expect(haversineKm(point, point)).toBeCloseTo(0, 9);
  });

  it('is symmetric', () => {
    const a = { lat: 51.5074, lng: -0.1278 };
    const b = { lat: 48.8566, lng: 2.3522 };
    expect(haversineKm(a, b)).toBe(haversineKm(b, a));
  });

  it('measures one degree of longitude on the equator', () => {
    expect(haversineKm(origin, { lat: 0, lng: 1 })).toBeCloseTo(111.195, 3);
  });

  it('stays defined for antipodal points', () => {
    expect(haversineKm(origin, { lat: 0, lng: 180 })).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
  });
});

describe('rankByDistance', () => {
  it('orders candidates nearest first', () => {
    const ranked = rankByDistance(
      [eastOfOrigin('a', 3.2), eastOfOrigin('b', 1.0), eastOfOrigin('c', 4.9)],
      origin,
      5.0,
    );

    expect(ranked.map((r) => r.item.id)).toEqual(['b', 'a', 'c']);
    expect(ranked.map((r) => roundDistance(r.distanceKm))).toEqual([1.0, 3.2, 4.9]);
  });

  it('includes a candidate exactly on the radius and excludes one just beyond it', () => {
    const candidate = eastOfOrigin('edge', 2.5);
    const exact = haversineKm(origin, { lat: candidate.shopLat, lng: candidate.shopLng });

    expect(rankByDistance([candidate], origin, exact)).toHaveLength(1);
    expect(rankByDistance([candidate], origin, exact - 1e-9)).toHaveLength(0);
  });

  it('skips candidates without coordinates', () => {
    const ranked = rankByDistance(
      [
        { id: 'no-lat', shopLat: null, shopLng: 0.001 },
        { id: 'no-lng', shopLat: 0.001, shopLng: null },
        eastOfOrigin('ok', 0.5),
      ],
      origin,
      5,
    );
    expect(ranked.map((r) => r.item.id)).toEqual(['ok']);
  });

  it('keeps input order for equal distances', () => {
    const ranked = rankByDistance(
      [eastOfOrigin('second-far', 2), eastOfOrigin('tie-1', 1), eastOfOrigin('tie-2', 1)],
      origin,
      5,
    );
    expect(ranked.map((r) => r.item.id)).toEqual(['tie-1', 'tie-2', 'second-far']);
  });

  it('returns nothing for an empty candidate list', () => {
    expect(rankByDistance([], origin, 5)).toEqual([]);
  });
});

describe('roundDistance', () => {
  it('rounds to three decimals', () => {
    expect(roundDistance(1.23456)).toBe(1.235);
    expect(roundDistance(0.0004)).toBe(0);
  });
});
