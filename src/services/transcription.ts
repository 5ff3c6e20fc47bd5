import type { TranscriptionResult } from '../types';
import { Logger } from '../utils/logger';
import type { EmotionAnalyzer } from './emotion';
import type { SpeechToTextClient } from './openai';

// Chosen by audio length so the same clip always yields the same transcript
export const MOCK_TRANSCRIPTS = [
  "I need office space for my 25 person tech startup. We're looking for something modern and collaborative downtown.",
  'We need professional office space for our law firm. Private offices and conference rooms are essential. Budget around $40 per square foot.',
  'Looking for creative workspace for 15 people in the arts district. We want something inspiring and unique.',
  'Need large corporate space for 50 employees in the financial district. Professional environment is very important.'
] as const;

export class TranscriptionService {
  constructor(
    private readonly analyzer: EmotionAnalyzer,
    private readonly client?: SpeechToTextClient
  ) {}

  async transcribe(audio: Uint8Array, filename: string): Promise<TranscriptionResult> {
    const startTime = Date.now();

    if (!this.client) {
      return this.mock(audio, startTime);
    }

    try {
      const transcript = await this.client.transcribe(audio, filename);
      const transcriptionTime = (Date.now() - startTime) / 1000;
      Logger.info(`Transcription completed in ${transcriptionTime.toFixed(2)}s`);
      return {
        transcript,
        confidence: null, // Whisper reports no confidence
        transcriptionTime,
        provider: 'openai',
        emotion: this.analyzer.analyze(transcript)
      };
    } catch (error) {
      Logger.error(`Transcription failed, using mock transcript: ${error}`);
      return this.mock(audio, startTime, error instanceof Error ? error.message : String(error));
    }
  }

  private mock(audio: Uint8Array, startTime: number, fallbackReason?: string): TranscriptionResult {
    const transcript = MOCK_TRANSCRIPTS[audio.byteLength % MOCK_TRANSCRIPTS.length];
    return {
      transcript,
      confidence: 0.95,
      transcriptionTime: (Date.now() - startTime) / 1000,
      provider: 'mock',
      emotion: this.analyzer.analyze(transcript),
      fallbackReason
    };
  }
}
