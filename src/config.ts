import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  NODE_ENV: z.string().default('development'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
  OPENAI_MAX_TOKENS: z.coerce.number().int().positive().default(500),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  PROPERTIES_CSV: z.string().min(1).default('data/properties.csv'),
  EMOTION_SCORE_FORMULA: z.enum(['blended', 'legacy']).default('blended'),
  PEOPLE_SIZING: z.enum(['point', 'range']).default('point'),
  MATCH_TOP_N: z.coerce.number().int().positive().default(3),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CORS_ORIGINS: z.string().default('*')
});

export type Env = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    openai: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      maxTokens: e.OPENAI_MAX_TOKENS,
      temperature: e.OPENAI_TEMPERATURE,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
      transcriptionModel: 'whisper-1'
    },
    catalog: {
      csvPath: e.PROPERTIES_CSV
    },
    matching: {
      emotionScoreFormula: e.EMOTION_SCORE_FORMULA,
      peopleSizing: e.PEOPLE_SIZING,
      topN: e.MATCH_TOP_N
    },
    server: {
      port: e.PORT,
      environment: e.NODE_ENV,
      corsOrigins: e.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean)
    },
    logging: {
      level: e.LOG_LEVEL
    }
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

// Environment configuration
export const config: AppConfig = loadConfig();
