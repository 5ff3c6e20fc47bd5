import { createApp } from './app';
import type { AppConfig } from './config';
import { AdvisorService } from './services/advisor';
import { EmotionAnalyzer } from './services/emotion';
import { LLMComposer } from './services/llm-composer';
import { OpenAIService } from './services/openai';
import { PropertyMatcher } from './services/property-matcher';
import { RequirementExtractor } from './services/requirement-extractor';
import { ResponseGenerator } from './services/response-generator';
import { SpeechService } from './services/speech';
import { TranscriptionService } from './services/transcription';
import { DataLoader } from './utils/data-loader';
import { Logger } from './utils/logger';

/** Wires the catalog, core services and composers into the HTTP app. */
export async function bootstrap(settings: AppConfig) {
  Logger.setLevel(settings.logging.level);

  const catalog = await DataLoader.loadCatalog(settings.catalog.csvPath);
  const analyzer = new EmotionAnalyzer(settings.matching.emotionScoreFormula);

  const openai = settings.openai.apiKey ? new OpenAIService(settings.openai) : undefined;
  if (!openai) {
    Logger.warn('OPENAI_API_KEY not set - using templated responses and mock transcription');
  }

  const advisor = new AdvisorService({
    analyzer,
    extractor: new RequirementExtractor({ peopleSizing: settings.matching.peopleSizing }),
    matcher: new PropertyMatcher(catalog.records),
    composer: openai ? new LLMComposer(openai) : undefined,
    fallback: new ResponseGenerator(),
    topN: settings.matching.topN
  });

  return createApp({
    advisor,
    transcription: new TranscriptionService(analyzer, openai),
    speech: new SpeechService(),
    catalog,
    corsOrigins: settings.server.corsOrigins
  });
}
