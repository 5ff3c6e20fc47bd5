import type { Catalog, MatchedProperty, PropertyRecord, RequirementProfile } from '../types';
import { Logger } from '../utils/logger';

export const DEFAULT_TOP_N = 3;

/**
 * Filters and ranks an injected, read-only catalog against a requirement profile.
 *
 * Every bound is optional and the filters are conjunctive, so adding a bound can only
 * narrow the result. Culture matching is a substring test against the address alone.
 */
export class PropertyMatcher {
  constructor(private readonly catalog: Catalog) {}

  get size(): number {
    return this.catalog.length;
  }

  match(requirements: RequirementProfile, topN: number = DEFAULT_TOP_N): MatchedProperty[] {
    if (this.catalog.length === 0 || !Number.isInteger(topN) || topN <= 0) {
      return [];
    }

    const { minSizeSqFt, maxSizeSqFt, maxRentPerSqFt } = requirements;
    const locations = requirements.preferredLocations.map(l => l.toLowerCase());
    const cultureTerms = [...new Set(requirements.cultureKeywords.map(k => k.toLowerCase()))];

    const survivors = this.catalog.filter(property => {
      if (minSizeSqFt !== undefined && property.sizeSqFt < minSizeSqFt) return false;
      if (maxSizeSqFt !== undefined && property.sizeSqFt > maxSizeSqFt) return false;
      if (maxRentPerSqFt !== undefined && property.rentPerSqFtYear > maxRentPerSqFt) return false;
      if (locations.length > 0) {
        const address = property.address.toLowerCase();
        if (!locations.some(location => address.includes(location))) return false;
      }
      return true;
    });

    // Array.prototype.sort is stable, so equal scores keep catalog order
    const ranked = survivors
      .map(property => ({ ...property, cultureScore: cultureScore(property, cultureTerms) }))
      .sort((a, b) => b.cultureScore - a.cultureScore);

    Logger.debug(`Matcher kept ${survivors.length}/${this.catalog.length} properties, returning ${Math.min(topN, ranked.length)}`);
    return ranked.slice(0, topN);
  }
}

function cultureScore(property: PropertyRecord, terms: string[]): number {
  if (terms.length === 0) return 0;
  const address = property.address.toLowerCase();
  return terms.filter(term => address.includes(term)).length;
}
