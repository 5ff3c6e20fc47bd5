import type { MatchedProperty, RequirementProfile } from '../types';

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const currency = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const rate = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

export const formatSqFt = (value: number) => wholeNumber.format(value);
export const formatMoney = (value: number) => `$${currency.format(value)}`;
export const formatRate = (value: number) => `$${rate.format(value)}`;

export function formatPropertyBlock(property: MatchedProperty): string {
  const lines = [
    `Property: ${property.address}`,
    `- Size: ${formatSqFt(property.sizeSqFt)} square feet`,
    `- Floor: ${property.floor}, Suite: ${property.suite}`,
    `- Rent: ${formatRate(property.rentPerSqFtYear)}/SF/year (${formatMoney(property.monthlyRent)}/month)`,
    `- Annual Rent: ${formatMoney(property.annualRent)}`,
    `- Contact: ${property.contactName} (${property.contactEmail})`
  ];
  if (property.cultureScore > 0) {
    lines.push('- Culture Match: High');
  }
  return lines.join('\n');
}

export function formatRequirements(requirements: RequirementProfile): string {
  const bound = (value: number | undefined) => (value === undefined ? 'Any' : formatSqFt(value));
  const maxRent = requirements.maxRentPerSqFt === undefined ? 'Any' : formatRate(requirements.maxRentPerSqFt);
  const list = (values: string[]) => (values.length > 0 ? values.join(', ') : 'none');

  return [
    'Requirements detected:',
    `- Size range: ${bound(requirements.minSizeSqFt)} - ${bound(requirements.maxSizeSqFt)} SF`,
    `- Max rent: ${maxRent}/SF/year`,
    `- Culture keywords: ${list(requirements.cultureKeywords)}`,
    `- Preferred locations: ${list(requirements.preferredLocations)}`
  ].join('\n');
}

/** Property context handed to the language model alongside the conversation. */
export function formatPropertyContext(matches: MatchedProperty[], requirements: RequirementProfile): string {
  const summary = formatRequirements(requirements);
  if (matches.length === 0) {
    return `No properties in the catalog match the client's criteria yet.\n\n${summary}`;
  }
  return [
    'Top property recommendations based on the conversation:',
    ...matches.map(formatPropertyBlock),
    summary
  ].join('\n\n');
}
