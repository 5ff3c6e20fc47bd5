import OpenAI, { toFile } from 'openai';
import { LRUCache } from 'lru-cache';
import type { AppConfig } from '../config';
import { Logger } from '../utils/logger';
import { retryWithBackoff, type RetryOptions } from '../utils/retry';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionResult {
  content: string;
  totalTokens: number;
  cached: boolean;
}

/** The slice of the OpenAI API the advisor depends on. */
export interface ChatClient {
  readonly model: string;
  chat(messages: ChatMessage[]): Promise<ChatCompletionResult>;
}

export interface SpeechToTextClient {
  transcribe(audio: Uint8Array, filename: string): Promise<string>;
}

export class OpenAIService implements ChatClient, SpeechToTextClient {
  private client: OpenAI;
  private responseCache = new LRUCache<string, string>({
    max: 500,
    ttl: 5 * 60 * 1000 // 5 minutes
  });

  constructor(
    private readonly settings: AppConfig['openai'],
    private readonly retry: RetryOptions = { maxRetries: 2 }
  ) {
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      // retries are handled by retryWithBackoff
      maxRetries: 0
    });
  }

  get model(): string {
    return this.settings.model;
  }

  async chat(messages: ChatMessage[]): Promise<ChatCompletionResult> {
    const cacheKey = this.generateCacheKey(messages);
    const cached = this.responseCache.get(cacheKey);
    if (cached !== undefined) {
      Logger.debug('Using cached completion');
      return { content: cached, totalTokens: 0, cached: true };
    }

    const startTime = Date.now();
    const response = await retryWithBackoff(
      () =>
        this.client.chat.completions.create({
          model: this.settings.model,
          messages,
          max_tokens: this.settings.maxTokens,
          temperature: this.settings.temperature
        }),
      this.retry
    );
    Logger.debug(`OpenAI response time: ${Date.now() - startTime}ms`);

    const content = response.choices[0]?.message?.content ?? '';
    if (!content) {
      throw new Error('OpenAI returned an empty completion');
    }

    this.responseCache.set(cacheKey, content);
    return { content, totalTokens: response.usage?.total_tokens ?? 0, cached: false };
  }

  async transcribe(audio: Uint8Array, filename: string): Promise<string> {
    const file = await toFile(audio, filename);
    const result = await retryWithBackoff(
      () =>
        this.client.audio.transcriptions.create({
          model: this.settings.transcriptionModel,
          file
        }),
      this.retry
    );
    return result.text;
  }

  private generateCacheKey(messages: ChatMessage[]): string {
    return messages.map(m => `${m.role}:${m.content}`).join('|');
  }
}
