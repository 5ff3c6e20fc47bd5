// Core types for the commercial real estate advisor
export interface PropertyRecord {
  readonly id: string;
  readonly address: string;
  readonly floor: number;
  readonly suite: string;
  readonly sizeSqFt: number;
  readonly rentPerSqFtYear: number;
  readonly monthlyRent: number;
  readonly annualRent: number;
  readonly contactName: string;
  readonly contactEmail: string;
}

export type Catalog = ReadonlyArray<PropertyRecord>;

export type CatalogLoadResult =
  | {
      kind: 'loaded';
      records: Catalog;
      source: string;
      rejectedRows: number;
    }
  | {
      kind: 'fallback';
      records: Catalog;
      reason: string;
    };

export interface RequirementProfile {
  minSizeSqFt?: number;
  maxSizeSqFt?: number;
  maxRentPerSqFt?: number;
  preferredLocations: string[];
  cultureKeywords: string[];
}

export interface ToneAnalysis {
  professional: number;
  excited: number;
  confident: number;
  uncertain: number;
}

export interface EmotionProfile {
  emotionScore: number;
  enthusiasmLevel: number;
  professionalLevel: number;
  confidenceLevel: number;
  uncertaintyLevel: number;
  voicePace: number;
  toneAnalysis: ToneAnalysis;
}

// blended: 0.5 + (enthusiasm + confidence - uncertainty) * 0.3
// legacy:  0.5 + (enthusiasm - uncertainty) * 0.5
export type EmotionScoreFormula = 'blended' | 'legacy';

// point: 125 sq ft per person; range: 100..200 sq ft per person
export type PeopleSizing = 'point' | 'range';

export interface MatchedProperty extends PropertyRecord {
  readonly cultureScore: number;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface ComposeRequest {
  message: string;
  history: ConversationTurn[];
  matches: MatchedProperty[];
  requirements: RequirementProfile;
  emotion: EmotionProfile;
  ragContext?: string;
}

export interface ComposedResponse {
  text: string;
  tokensUsed: number;
  model: string;
}

export interface ResponseComposer {
  readonly name: string;
  compose(request: ComposeRequest): Promise<ComposedResponse>;
}

export interface AdvisorReply extends ComposedResponse {
  matches: MatchedProperty[];
  requirements: RequirementProfile;
  emotion: EmotionProfile;
  degraded: boolean;
  processingTime: number;
}

export interface TranscriptionResult {
  transcript: string;
  confidence: number | null;
  transcriptionTime: number;
  provider: 'openai' | 'mock';
  emotion: EmotionProfile;
  fallbackReason?: string;
}

export interface SpeechResult {
  audioData: string;
  generationTime: number;
  provider: 'mock';
  voiceId: string;
  textLength: number;
}
