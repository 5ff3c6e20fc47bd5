import { Logger } from './logger';

const NON_RETRYABLE_STATUSES = [400, 401, 403];

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

// retry-after is expressed in seconds
function retryAfterMs(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('headers' in error)) return undefined;
  const headers = error.headers;
  if (typeof headers !== 'object' || headers === null || !('retry-after' in headers)) return undefined;
  const seconds = Number(headers['retry-after']);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

// Simplified retry with backoff
export async function retryWithBackoff<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelay = 1000, sleep = defaultSleep } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const status = statusOf(error);

      // Don't retry on client errors
      if (status !== undefined && NON_RETRYABLE_STATUSES.includes(status)) {
        Logger.error(`OpenAI error (not retrying): ${status} - ${error}`);
        throw error;
      }

      if (attempt >= maxRetries) {
        Logger.error(`OpenAI failed after ${attempt + 1} attempts: ${error}`);
        throw error;
      }

      const delay = status === 429
        ? retryAfterMs(error) ?? baseDelay
        : baseDelay * Math.pow(2, attempt);
      Logger.warn(`Retrying in ${delay}ms (attempt ${attempt + 1}/${maxRetries + 1})`);
      await sleep(delay);
    }
  }
}
