import { describe, expect, it } from 'vitest';
import { PropertyMatcher } from '../services/property-matcher';
import type { RequirementProfile } from '../types';
import { FALLBACK_PROPERTIES } from '../utils/data-loader';
import { requirements } from './fixtures';

const ids = (matches: { id: string }[]) => matches.map(m => m.id);

describe('PropertyMatcher', () => {
  const threeListings = new PropertyMatcher(FALLBACK_PROPERTIES.slice(0, 3));
  const fiveListings = new PropertyMatcher(FALLBACK_PROPERTIES);

  it('applies size, rent and location filters together', () => {
    const matches = threeListings.match(
      requirements({ minSizeSqFt: 2000, maxSizeSqFt: 3000, maxRentPerSqFt: 30, preferredLocations: ['downtown'] })
    );

    expect(matches).toEqual([{ ...FALLBACK_PROPERTIES[0], cultureScore: 0 }]);
  });

  it('returns the catalog in order when no bound is set', () => {
    expect(ids(threeListings.match(requirements()))).toEqual(['PROP001', 'PROP002', 'PROP003']);
  });

  it('honours topN', () => {
    expect(ids(fiveListings.match(requirements(), 2))).toEqual(['PROP001', 'PROP002']);
    expect(fiveListings.match(requirements(), 0)).toEqual([]);
    expect(fiveListings.match(requirements(), 10)).toHaveLength(5);
  });

  it('returns nothing for an empty catalog', () => {
    expect(new PropertyMatcher([]).match(requirements())).toEqual([]);
  });

  it('returns nothing rather than unfiltered listings when no record survives', () => {
    expect(fiveListings.match(requirements({ maxRentPerSqFt: 10 }))).toEqual([]);
  });

  it('keeps a listing whose address contains any preferred location', () => {
    expect(ids(fiveListings.match(requirements({ preferredLocations: ['uptown', 'midtown'] })))).toEqual([
      'PROP002',
      'PROP003'
    ]);
    expect(ids(fiveListings.match(requirements({ preferredLocations: ['DOWNTOWN'] })))).toEqual(['PROP001']);
  });

  it('ranks by culture score and keeps catalog order on ties', () => {
    const matches = fiveListings.match(requirements({ cultureKeywords: ['tech'] }));

    expect(ids(matches)).toEqual(['PROP002', 'PROP001', 'PROP003']);
    expect(matches.map(m => m.cultureScore)).toEqual([1, 0, 0]);
  });

  it('scores distinct culture keywords only', () => {
    const ranked = fiveListings.match(requirements({ cultureKeywords: ['creative', 'district', 'creative'] }), 5);

    expect(ids(ranked)).toEqual(['PROP004', 'PROP005', 'PROP001', 'PROP002', 'PROP003']);
    expect(ranked.map(m => m.cultureScore)).toEqual([2, 1, 0, 0, 0]);
  });

  it('only narrows as bounds are added', () => {
    const steps: RequirementProfile[] = [
      requirements(),
      requirements({ minSizeSqFt: 1900 }),
      requirements({ minSizeSqFt: 1900, maxSizeSqFt: 4000 }),
      requirements({ minSizeSqFt: 1900, maxSizeSqFt: 4000, maxRentPerSqFt: 30 }),
      requirements({ minSizeSqFt: 1900, maxSizeSqFt: 4000, maxRentPerSqFt: 30, preferredLocations: ['district'] })
    ];

    const sizes = steps.map(step => fiveListings.match(step, 10).length);
    expect(sizes).toEqual([5, 4, 3, 2, 1]);
  });

  it('is idempotent and leaves the catalog untouched', () => {
    const profile = requirements({ cultureKeywords: ['plaza', 'tower'], maxRentPerSqFt: 50 });

    expect(fiveListings.match(profile)).toEqual(fiveListings.match(profile));
    expect(FALLBACK_PROPERTIES[0]).not.toHaveProperty('cultureScore');
    expect(Object.isFrozen(FALLBACK_PROPERTIES)).toBe(true);
  });
});
