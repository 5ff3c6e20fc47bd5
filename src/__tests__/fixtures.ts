import type { EmotionProfile, RequirementProfile } from '../types';

export function emotion(overrides: Partial<EmotionProfile> = {}): EmotionProfile {
  const enthusiasmLevel = overrides.enthusiasmLevel ?? 0;
  const professionalLevel = overrides.professionalLevel ?? 0;
  return {
    emotionScore: 0.5,
    enthusiasmLevel,
    professionalLevel,
    confidenceLevel: 0,
    uncertaintyLevel: 0,
    voicePace: 1,
    toneAnalysis: {
      professional: professionalLevel,
      excited: enthusiasmLevel,
      confident: 0,
      uncertain: 0
    },
    ...overrides
  };
}

export function requirements(overrides: Partial<RequirementProfile> = {}): RequirementProfile {
  return { preferredLocations: [], cultureKeywords: [], ...overrides };
}
