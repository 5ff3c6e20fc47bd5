import type {
  AdvisorReply,
  ComposeRequest,
  ComposedResponse,
  ConversationTurn,
  EmotionProfile,
  ResponseComposer
} from '../types';
import { Logger } from '../utils/logger';
import type { EmotionAnalyzer } from './emotion';
import type { PropertyMatcher } from './property-matcher';
import type { RequirementExtractor } from './requirement-extractor';
import type { ResponseGenerator } from './response-generator';

export interface AdvisorDependencies {
  analyzer: EmotionAnalyzer;
  extractor: RequirementExtractor;
  matcher: PropertyMatcher;
  /** Language-model composer; absent when no API key is configured. */
  composer?: ResponseComposer;
  fallback: ResponseGenerator;
  topN: number;
}

export interface AdvisorTurn {
  message: string;
  history?: ConversationTurn[];
  ragContext?: string;
  /** Pre-computed profile, used verbatim instead of analysing the message. */
  emotion?: EmotionProfile;
}

/**
 * One conversational turn: emotion, requirements, matching, then composition.
 * Holds no per-conversation state; history is supplied by the caller.
 */
export class AdvisorService {
  constructor(private readonly deps: AdvisorDependencies) {}

  get hasLanguageModel(): boolean {
    return this.deps.composer !== undefined;
  }

  async handleMessage(turn: AdvisorTurn): Promise<AdvisorReply> {
    const startTime = Date.now();
    const history = turn.history ?? [];

    const emotion = turn.emotion ?? this.deps.analyzer.analyze(turn.message);
    const requirements = this.deps.extractor.extract([...history, { role: 'user', content: turn.message }], emotion);
    const matches = this.deps.matcher.match(requirements, this.deps.topN);
    Logger.debug(`Matched ${matches.length} properties | emotionScore=${emotion.emotionScore.toFixed(2)}`);

    const request: ComposeRequest = {
      message: turn.message,
      history,
      matches,
      requirements,
      emotion,
      ragContext: turn.ragContext
    };

    let degraded = false;
    let composed: ComposedResponse;
    const composer = this.deps.composer;
    if (composer) {
      try {
        composed = await composer.compose(request);
      } catch (error) {
        Logger.error(`Composer ${composer.name} failed, using templated response: ${error}`);
        degraded = true;
        composed = await this.deps.fallback.compose(request);
      }
    } else {
      composed = await this.deps.fallback.compose(request);
    }

    return {
      ...composed,
      matches,
      requirements,
      emotion,
      degraded,
      processingTime: (Date.now() - startTime) / 1000
    };
  }
}
