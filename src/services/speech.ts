import type { SpeechResult } from '../types';

export const DEFAULT_VOICE_ID = 'mock-voice';

/** Stand-in text-to-speech: encodes a short marker instead of real audio. */
export class SpeechService {
  synthesize(text: string, voiceId: string = DEFAULT_VOICE_ID): SpeechResult {
    const startTime = Date.now();
    const audioData = Buffer.from(`mock_audio_${text.slice(0, 20)}`, 'utf8').toString('base64');
    return {
      audioData,
      generationTime: (Date.now() - startTime) / 1000,
      provider: 'mock',
      voiceId,
      textLength: text.length
    };
  }
}
