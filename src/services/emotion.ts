import type { EmotionData } from '../schemas';
import type { EmotionProfile, EmotionScoreFormula } from '../types';

interface Vocabulary {
  words: readonly string[];
  scale: number;
}

export const EMOTION_VOCABULARIES = {
  enthusiasm: {
    words: ['excited', 'love', 'amazing', 'perfect', 'great', 'fantastic', 'wow', 'awesome'],
    scale: 8
  },
  professional: {
    words: ['need', 'require', 'business', 'professional', 'office', 'company', 'corporate'],
    scale: 5
  },
  uncertainty: {
    words: ['maybe', 'perhaps', 'not sure', 'uncertain', 'think', 'might', 'possibly'],
    scale: 8
  },
  confidence: {
    words: ['definitely', 'certainly', 'absolutely', 'sure', 'confident', 'know', 'clear'],
    scale: 8
  }
} as const satisfies Record<string, Vocabulary>;

const clamp01 = (value: number) => Math.max(0, Math.min(1, value));

function level(text: string, wordCount: number, vocabulary: Vocabulary): number {
  // each keyword counts once, however often it repeats
  const hits = vocabulary.words.filter(word => text.includes(word)).length;
  return Math.min((hits / wordCount) * vocabulary.scale, 1);
}

export function compositeScore(
  formula: EmotionScoreFormula,
  levels: { enthusiasm: number; confidence: number; uncertainty: number }
): number {
  switch (formula) {
    case 'legacy':
      return clamp01(0.5 + (levels.enthusiasm - levels.uncertainty) * 0.5);
    case 'blended':
      return clamp01(0.5 + (levels.enthusiasm + levels.confidence - levels.uncertainty) * 0.3);
  }
}

/**
 * Keyword-density affect estimate for a single utterance.
 *
 * Pure: the same text and formula always produce the same profile.
 */
export class EmotionAnalyzer {
  constructor(private readonly formula: EmotionScoreFormula = 'blended') {}

  get scoreFormula(): EmotionScoreFormula {
    return this.formula;
  }

  analyze(text: string): EmotionProfile {
    const lower = text.toLowerCase();
    const wordCount = Math.max(lower.split(/\s+/).filter(Boolean).length, 1);

    const enthusiasm = level(lower, wordCount, EMOTION_VOCABULARIES.enthusiasm);
    const professional = level(lower, wordCount, EMOTION_VOCABULARIES.professional);
    const uncertainty = level(lower, wordCount, EMOTION_VOCABULARIES.uncertainty);
    const confidence = level(lower, wordCount, EMOTION_VOCABULARIES.confidence);

    return {
      emotionScore: compositeScore(this.formula, { enthusiasm, confidence, uncertainty }),
      enthusiasmLevel: enthusiasm,
      professionalLevel: professional,
      confidenceLevel: confidence,
      uncertaintyLevel: uncertainty,
      voicePace: 1 + (enthusiasm - 0.5) * 0.4,
      toneAnalysis: {
        professional,
        excited: enthusiasm,
        confident: confidence,
        uncertain: uncertainty
      }
    };
  }
}

/**
 * Normalises an emotion profile supplied by a caller (for example one computed by a
 * transcription provider). Missing tone components are 0; they never inherit a level.
 */
export function fromEmotionData(data: EmotionData): EmotionProfile {
  const tone: NonNullable<EmotionData['toneAnalysis']> = data.toneAnalysis ?? {};
  const professionalLevel = data.professionalLevel ?? tone.professional ?? 0;
  const confidenceLevel = data.confidenceLevel ?? tone.confident ?? 0;
  const uncertaintyLevel = data.uncertaintyLevel ?? tone.uncertain ?? 0;

  return {
    emotionScore: data.emotionScore,
    enthusiasmLevel: data.enthusiasmLevel,
    professionalLevel,
    confidenceLevel,
    uncertaintyLevel,
    voicePace: data.voicePace ?? 1,
    toneAnalysis: {
      professional: tone.professional ?? 0,
      excited: tone.excited ?? 0,
      confident: tone.confident ?? 0,
      uncertain: tone.uncertain ?? 0
    }
  };
}
