import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { serveStatic } from '@hono/node-server/serve-static';
import { v4 as uuidv4 } from 'uuid';
import type { ZodError } from 'zod';
import { ChatRequestSchema, SpeechRequestSchema } from './schemas';
import { fromEmotionData } from './services/emotion';
import type { AdvisorService } from './services/advisor';
import type { SpeechService } from './services/speech';
import type { TranscriptionService } from './services/transcription';
import type { CatalogLoadResult } from './types';
import { Logger } from './utils/logger';

// Extend Hono context to include sessionId
type AppContext = {
  Variables: {
    sessionId: string;
  };
};

export interface AppDependencies {
  advisor: AdvisorService;
  transcription: TranscriptionService;
  speech: SpeechService;
  catalog: CatalogLoadResult;
  corsOrigins: string[];
  staticRoot?: string;
}

const invalid = (c: Context, error: ZodError) =>
  c.json({ error: 'Invalid request', details: error.issues.map(i => ({ path: i.path.join('.'), message: i.message })) }, 400);

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

type AudioUpload = { ok: true; audio: Uint8Array; filename: string } | { ok: false; error: string };

async function readAudio(value: unknown): Promise<AudioUpload> {
  if (!(value instanceof File)) {
    return { ok: false, error: 'audio_file is required' };
  }
  if (!value.type.startsWith('audio/')) {
    return { ok: false, error: 'File must be an audio file' };
  }
  if (value.size === 0) {
    return { ok: false, error: 'Empty audio file' };
  }
  return { ok: true, audio: new Uint8Array(await value.arrayBuffer()), filename: value.name || 'audio.wav' };
}

function formFlag(value: unknown, fallback: boolean): boolean {
  if (typeof value !== 'string') return fallback;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

export function createApp(deps: AppDependencies) {
  const { advisor, transcription, speech, catalog } = deps;
  const app = new Hono<AppContext>();

  app.use('*', logger((message) => Logger.debug(message)));
  app.use('*', cors({
    origin: deps.corsOrigins.includes('*') ? '*' : deps.corsOrigins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization', 'X-Session-ID'],
    exposeHeaders: ['X-Session-ID']
  }));

  // Session management middleware
  app.use('/api/*', async (c, next) => {
    const sessionId = c.req.header('X-Session-ID') || `session_${uuidv4()}`;
    c.set('sessionId', sessionId);
    c.header('X-Session-ID', sessionId);
    await next();
  });

  app.onError((error, c) => {
    Logger.error(`${c.req.method} ${c.req.path} failed: ${error}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      openaiAvailable: advisor.hasLanguageModel,
      propertiesCount: catalog.records.length,
      catalogSource: catalog.kind,
      ...(catalog.kind === 'fallback' ? { catalogFallbackReason: catalog.reason } : {}),
      timestamp: new Date().toISOString()
    });
  });

  app.get('/api/v1/properties', (c) => {
    return c.json({ count: catalog.records.length, source: catalog.kind, properties: catalog.records });
  });

  app.post('/api/v1/chat', async (c) => {
    const parsed = ChatRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);

    const { message, conversationHistory, ragContext, emotionData } = parsed.data;
    Logger.info(`Chat request | sessionId=${c.get('sessionId')} | message="${message}"`);

    const reply = await advisor.handleMessage({
      message,
      history: conversationHistory,
      ragContext,
      emotion: emotionData ? fromEmotionData(emotionData) : undefined
    });

    return c.json({
      response: reply.text,
      processingTime: reply.processingTime,
      tokensUsed: reply.tokensUsed,
      model: reply.model,
      ragSourcesUsed: Boolean(ragContext),
      degraded: reply.degraded,
      matches: reply.matches,
      requirements: reply.requirements,
      emotion: reply.emotion,
      sessionId: c.get('sessionId')
    });
  });

  app.post('/api/v1/transcribe', async (c) => {
    const body = await c.req.parseBody();
    const upload = await readAudio(body['audio_file']);
    if (!upload.ok) return c.json({ error: upload.error }, 400);

    const result = await transcription.transcribe(upload.audio, upload.filename);
    return c.json({
      transcript: result.transcript,
      confidence: result.confidence,
      transcriptionTime: result.transcriptionTime,
      provider: result.provider,
      emotionAnalysis: result.emotion
    });
  });

  app.post('/api/v1/speak', async (c) => {
    const parsed = SpeechRequestSchema.safeParse(await readJson(c));
    if (!parsed.success) return invalid(c, parsed.error);

    return c.json(speech.synthesize(parsed.data.text, parsed.data.voiceId));
  });

  // Full voice pipeline: transcript -> advisor -> optional speech
  app.post('/api/v1/converse', async (c) => {
    const body = await c.req.parseBody();
    const upload = await readAudio(body['audio_file']);
    if (!upload.ok) return c.json({ error: upload.error }, 400);

    const sessionField = body['session_id'];
    const sessionId = typeof sessionField === 'string' && sessionField.trim() ? sessionField.trim() : c.get('sessionId');

    const heard = await transcription.transcribe(upload.audio, upload.filename);
    const reply = await advisor.handleMessage({ message: heard.transcript, emotion: heard.emotion });
    const spoken = formFlag(body['include_audio_response'], true) ? speech.synthesize(reply.text) : null;
    const ttsTime = spoken?.generationTime ?? 0;

    return c.json({
      transcript: heard.transcript,
      response: reply.text,
      audioResponse: spoken?.audioData ?? null,
      emotionAnalysis: heard.emotion,
      matches: reply.matches,
      degraded: reply.degraded,
      processingTimes: {
        transcriptionTime: heard.transcriptionTime,
        llmProcessingTime: reply.processingTime,
        ttsGenerationTime: ttsTime,
        totalTime: heard.transcriptionTime + reply.processingTime + ttsTime
      },
      sessionId
    });
  });

  // Serve the web client from the public directory
  app.use('/*', serveStatic({ root: deps.staticRoot ?? './public' }));

  return app;
}
