import type { ConversationTurn, EmotionProfile, PeopleSizing, RequirementProfile } from '../types';
import { Logger } from '../utils/logger';

// Number with optional thousands separators: "2,500" or "2500"
const COUNT = String.raw`(\d{1,3}(?:,\d{3})+|\d+)`;
const AREA_UNIT = String.raw`(?:sq\.?\s*ft\.?|square\s*f(?:ee|oo)t|sf)(?![a-z])`;

const SQUARE_FEET_PATTERN = new RegExp(String.raw`(?<![\d$,.])${COUNT}\s*${AREA_UNIT}`, 'g');
const PEOPLE_PATTERNS = [
  new RegExp(String.raw`(?<![\d,])${COUNT}\s*people`, 'g'),
  new RegExp(String.raw`team\s*of\s*${COUNT}`, 'g'),
  new RegExp(String.raw`(?<![\d,])${COUNT}\s*employees`, 'g')
];

type BudgetFamily = 'per_sq_ft' | 'monthly' | 'budget_mention';

const BUDGET_PATTERNS: ReadonlyArray<{ family: BudgetFamily; pattern: RegExp }> = [
  {
    family: 'per_sq_ft',
    pattern: new RegExp(String.raw`\$(\d{1,3}(?:,\d{3})+|\d+(?:\.\d{1,2})?)\s*(?:per\s*|\/\s*)?${AREA_UNIT}`)
  },
  {
    family: 'monthly',
    pattern: new RegExp(String.raw`\$${COUNT}\s*(?:per\s*|a\s*|\/\s*)?month`)
  },
  {
    family: 'budget_mention',
    pattern: new RegExp(String.raw`budget[\s\S]*?\$(\d{1,3}(?:,\d{3})+|\d+(?:\.\d{1,2})?)`)
  }
];

export const LOCATION_KEYWORDS = ['downtown', 'uptown', 'midtown', 'district', 'center'] as const;

export const CULTURE_KEYWORDS = [
  'collaborative',
  'modern',
  'traditional',
  'creative',
  'corporate',
  'startup',
  'professional',
  'casual',
  'innovative',
  'tech'
] as const;

export const SQ_FT_PER_PERSON = { point: 125, min: 100, max: 200 } as const;

// Monthly budgets are spread over a nominal suite of this size
export const REFERENCE_SUITE_SQ_FT = 2000;

const toNumber = (raw: string) => Number(raw.replace(/,/g, ''));

export interface RequirementExtractorOptions {
  peopleSizing?: PeopleSizing;
}

export class RequirementExtractor {
  private readonly peopleSizing: PeopleSizing;

  constructor(options: RequirementExtractorOptions = {}) {
    this.peopleSizing = options.peopleSizing ?? 'point';
  }

  extract(conversation: string | ConversationTurn[], emotion: EmotionProfile | null = null): RequirementProfile {
    const text = (typeof conversation === 'string'
      ? conversation
      : conversation.map(turn => turn.content).join(' ')
    ).toLowerCase();

    const requirements: RequirementProfile = {
      ...this.extractSize(text),
      preferredLocations: LOCATION_KEYWORDS.filter(keyword => text.includes(keyword)),
      cultureKeywords: CULTURE_KEYWORDS.filter(keyword => text.includes(keyword))
    };

    const budget = this.extractBudget(text);
    if (budget !== undefined) {
      requirements.maxRentPerSqFt = budget;
    }

    const adjusted = emotion ? this.applyEmotion(requirements, emotion) : requirements;
    Logger.debug(`Extracted requirements: ${JSON.stringify(adjusted)}`);
    return adjusted;
  }

  private extractSize(text: string): Pick<RequirementProfile, 'minSizeSqFt' | 'maxSizeSqFt'> {
    const sizes: number[] = [];

    for (const match of text.matchAll(SQUARE_FEET_PATTERN)) {
      sizes.push(toNumber(match[1]));
    }

    for (const pattern of PEOPLE_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        sizes.push(...this.peopleToSquareFeet(toNumber(match[1])));
      }
    }

    const positive = sizes.filter(size => Number.isFinite(size) && size > 0);
    if (positive.length === 0) return {};

    const minSizeSqFt = Math.min(...positive);
    const distinct = new Set(positive).size;
    return {
      minSizeSqFt,
      maxSizeSqFt: distinct > 1 ? Math.max(...positive) : minSizeSqFt * 1.5
    };
  }

  private peopleToSquareFeet(people: number): number[] {
    if (this.peopleSizing === 'range') {
      return [people * SQ_FT_PER_PERSON.min, people * SQ_FT_PER_PERSON.max];
    }
    return [people * SQ_FT_PER_PERSON.point];
  }

  private extractBudget(text: string): number | undefined {
    for (const { family, pattern } of BUDGET_PATTERNS) {
      const match = text.match(pattern);
      if (!match) continue;

      const amount = toNumber(match[1]);
      if (!Number.isFinite(amount) || amount <= 0) continue;

      return family === 'monthly' ? (amount * 12) / REFERENCE_SUITE_SQ_FT : amount;
    }
    return undefined;
  }

  private applyEmotion(requirements: RequirementProfile, emotion: EmotionProfile): RequirementProfile {
    const adjusted: RequirementProfile = {
      ...requirements,
      preferredLocations: [...requirements.preferredLocations],
      cultureKeywords: [...requirements.cultureKeywords]
    };

    // Enthusiastic clients stretch on price and space, but only on bounds they already gave
    if (emotion.enthusiasmLevel > 0.7) {
      if (adjusted.maxRentPerSqFt !== undefined) adjusted.maxRentPerSqFt *= 1.2;
      if (adjusted.maxSizeSqFt !== undefined) adjusted.maxSizeSqFt *= 1.1;
    }

    if (emotion.toneAnalysis.excited > 0.6) {
      adjusted.cultureKeywords.push('modern', 'innovative', 'tech');
    }

    if (emotion.toneAnalysis.professional > 0.7) {
      adjusted.cultureKeywords.push('professional', 'corporate');
    }

    return adjusted;
  }
}
