/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable.
 */
import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function floatFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const config = {
  env: process.env.NODE_ENV || 'development',
  port: intFromEnv(process.env.PORT, 4000),
  apiPrefix: process.env.API_PREFIX || '/api/v1',
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:3000',
  logLevel: process.env.LOG_LEVEL || 'info',

  jwt: {
    secret: process.env.JWT_SECRET || 'dev-secret-change-me',
    expiresIn: process.env.JWT_EXPIRES_IN || '7d',
  },

  database: {
    // "memory" keeps users, questions and sessions in process (local dev, demos).
    url: process.env.DATABASE_URL || 'postgresql://localhost:5432/interview_prep',
  },

  redis: {
    // Only used for feedback claims. Defaults to in-memory so the app runs without Redis.
    url: process.env.REDIS_URL || 'memory',
  },

  ai: {
    apiKey: process.env.AI_API_KEY || '',
    /** Any OpenAI-compatible endpoint: OpenAI, OpenRouter, Gemini's OpenAI endpoint. */
    baseUrl: process.env.AI_BASE_URL || 'https://openrouter.ai/api/v1',
    model: process.env.AI_MODEL || 'google/gemini-2.5-flash',
    temperature: floatFromEnv(process.env.AI_TEMPERATURE, 0.4),
    maxTokens: intFromEnv(process.env.AI_MAX_TOKENS, 2048),
    feedbackTimeoutMs: intFromEnv(process.env.AI_FEEDBACK_TIMEOUT_MS, 20000),
    /** Allow a single extra attempt when a feedback call fails. */
    feedbackRetry: String(process.env.AI_FEEDBACK_RETRY || 'false').toLowerCase() === 'true',
  },

  feedback: {
    claimTtlSeconds: intFromEnv(process.env.FEEDBACK_CLAIM_TTL_SECONDS, 60),
  },

  uploads: {
    dir: process.env.UPLOAD_DIR || 'uploads',
    publicUrl: (process.env.PUBLIC_URL || 'http://localhost:4000').replace(/\/+$/, ''),
    maxBytes: 5 * 1024 * 1024,
  },

  admin: {
    /** Registrations presenting this token get the admin role. Empty disables admin sign-up. */
    inviteToken: process.env.ADMIN_INVITE_TOKEN || '',
  },
} as const;

export type AppConfig = typeof config;
