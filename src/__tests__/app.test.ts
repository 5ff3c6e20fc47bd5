import { describe, expect, it } from 'vitest';
import { createApp } from '../app';
import { AdvisorService } from '../services/advisor';
import { EmotionAnalyzer } from '../services/emotion';
import { PropertyMatcher } from '../services/property-matcher';
import { RequirementExtractor } from '../services/requirement-extractor';
import { ResponseGenerator } from '../services/response-generator';
import { SpeechService } from '../services/speech';
import { MOCK_TRANSCRIPTS, TranscriptionService } from '../services/transcription';
import { FALLBACK_PROPERTIES } from '../utils/data-loader';

function testApp() {
  const analyzer = new EmotionAnalyzer();
  return createApp({
    advisor: new AdvisorService({
      analyzer,
      extractor: new RequirementExtractor(),
      matcher: new PropertyMatcher(FALLBACK_PROPERTIES),
      fallback: new ResponseGenerator(),
      topN: 3
    }),
    transcription: new TranscriptionService(analyzer),
    speech: new SpeechService(),
    catalog: { kind: 'fallback', records: FALLBACK_PROPERTIES, reason: 'test catalog' },
    corsOrigins: ['*'],
    staticRoot: './public'
  });
}

function audioForm(bytes: number, type = 'audio/wav', extra: Record<string, string> = {}) {
  const form = new FormData();
  form.append('audio_file', new Blob([new Uint8Array(bytes)], { type }), 'clip.wav');
  for (const [key, value] of Object.entries(extra)) form.append(key, value);
  return form;
}

const postJson = (body: unknown, headers: Record<string, string> = {}) => ({
  method: 'POST',
  headers: { 'Content-Type': 'application/json', ...headers },
  body: JSON.stringify(body)
});

describe('HTTP surface', () => {
  const app = testApp();

  it('reports health and the catalog source', async () => {
    const res = await app.request('/health');
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      status: 'healthy',
      openaiAvailable: false,
      propertiesCount: 5,
      catalogSource: 'fallback',
      catalogFallbackReason: 'test catalog'
    });
  });

  it('lists the catalog', async () => {
    const res = await app.request('/api/v1/properties');
    const body = await res.json();

    expect(body.count).toBe(5);
    expect(body.properties[4].id).toBe('PROP005');
  });

  describe('POST /api/v1/chat', () => {
    it('answers with matches, requirements and a session id', async () => {
      const res = await app.request('/api/v1/chat', postJson({ message: 'Office for 20 employees downtown' }));
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(res.headers.get('X-Session-ID')).toMatch(/^session_/);
      expect(body.model).toBe('template');
      expect(body.ragSourcesUsed).toBe(false);
      expect(body.degraded).toBe(false);
      expect(body.matches.map((m: { id: string }) => m.id)).toEqual(['PROP001']);
      expect(body.requirements.minSizeSqFt).toBe(2500);
    });

    it('echoes a caller session id', async () => {
      const res = await app.request('/api/v1/chat', postJson({ message: 'hi' }, { 'X-Session-ID': 'abc-123' }));

      expect(res.headers.get('X-Session-ID')).toBe('abc-123');
      expect((await res.json()).sessionId).toBe('abc-123');
    });

    it('applies caller-supplied emotion data', async () => {
      const res = await app.request(
        '/api/v1/chat',
        postJson({ message: 'Need 2,000 sq ft downtown', emotionData: { emotionScore: 0.8, enthusiasmLevel: 0.9 } })
      );
      const body = await res.json();

      expect(body.requirements.maxSizeSqFt).toBeCloseTo(3300);
      expect(body.emotion.enthusiasmLevel).toBe(0.9);
      expect(body.requirements.cultureKeywords).toEqual([]);
      expect(body.response.startsWith("I'm excited to help you!")).toBe(true);
    });

    it('rejects an empty message', async () => {
      const res = await app.request('/api/v1/chat', postJson({ message: '   ' }));
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body.error).toBe('Invalid request');
      expect(body.details[0]).toEqual({ path: 'message', message: 'Message is required' });
    });

    it('rejects malformed JSON', async () => {
      const res = await app.request('/api/v1/chat', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{not json'
      });

      expect(res.status).toBe(400);
    });
  });

  describe('POST /api/v1/transcribe', () => {
    it('returns a mock transcript chosen by clip length', async () => {
      const res = await app.request('/api/v1/transcribe', { method: 'POST', body: audioForm(6) });
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.transcript).toBe(MOCK_TRANSCRIPTS[2]);
      expect(body.provider).toBe('mock');
      expect(body.confidence).toBe(0.95);
      expect(body.emotionAnalysis.emotionScore).toBeGreaterThanOrEqual(0);
    });

    it('rejects uploads that are not audio', async () => {
      const res = await app.request('/api/v1/transcribe', { method: 'POST', body: audioForm(6, 'text/plain') });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'File must be an audio file' });
    });

    it('rejects an empty clip', async () => {
      const res = await app.request('/api/v1/transcribe', { method: 'POST', body: audioForm(0) });

      expect(await res.json()).toEqual({ error: 'Empty audio file' });
    });

    it('requires a file', async () => {
      const form = new FormData();
      form.append('provider', 'openai');
      const res = await app.request('/api/v1/transcribe', { method: 'POST', body: form });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'audio_file is required' });
    });
  });

  it('synthesises mock speech', async () => {
    const res = await app.request('/api/v1/speak', postJson({ text: 'Hello there' }));
    const body = await res.json();

    expect(body).toMatchObject({
      audioData: Buffer.from('mock_audio_Hello there').toString('base64'),
      provider: 'mock',
      voiceId: 'mock-voice',
      textLength: 11
    });
  });

  it('runs the full voice pipeline', async () => {
    const res = await app.request('/api/v1/converse', {
      method: 'POST',
      body: audioForm(4, 'audio/webm', { session_id: 'demo', include_audio_response: 'false' })
    });
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body.transcript).toBe(MOCK_TRANSCRIPTS[0]);
    expect(body.audioResponse).toBeNull();
    expect(body.sessionId).toBe('demo');
    expect(body.matches.map((m: { id: string }) => m.id)).toEqual(['PROP001']);
    expect(body.processingTimes.ttsGenerationTime).toBe(0);
  });

  it('includes synthesised audio by default', async () => {
    const res = await app.request('/api/v1/converse', { method: 'POST', body: audioForm(5) });
    const body = await res.json();

    expect(typeof body.audioResponse).toBe('string');
    expect(body.sessionId).toMatch(/^session_/);
  });
});
