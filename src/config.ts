import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

export const environments = ['production', 'staging', 'develop', 'test'] as const;
export type Environment = (typeof environments)[number];

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const configSchema = z.object({
  environment: z.enum(environments).default('develop'),
  debug: z.boolean(),

  // HTTP server
  server: z.object({
    port: z.number().int().positive().default(8000),
    apiPrefix: z.string().startsWith('/').default('/v1'),
    maxUploadBytes: z.number().int().positive().default(25 * 1024 * 1024),
  }),

  // Storage (SQLite file path or ":memory:")
  database: z.object({
    url: z.string().min(1).default('./data/golf-assistant.db'),
  }),

  // OpenAI: transcription, assistant and fallback speech
  openai: z.object({
    apiKey: optionalSecret,
    apiUrl: z.string().url().default('https://api.openai.com/v1'),
    assistantId: optionalSecret,
    assistantModel: z.string().default('gpt-4-turbo-preview'),
    sttModel: z.string().default('whisper-1'),
    sttLanguage: z.string().default('en'),
    ttsModel: z.string().default('tts-1'),
    ttsVoice: z.string().default('alloy'),
    pollIntervalMs: z.number().int().positive().default(500),
    maxPollIntervalMs: z.number().int().positive().default(4000),
    runTimeoutMs: z.number().int().positive().default(60000),
  }),

  // ElevenLabs: primary speech synthesis
  elevenlabs: z.object({
    apiKey: optionalSecret,
    apiUrl: z.string().url().default('https://api.elevenlabs.io/v1'),
    voiceId: z.string().default('21m00Tcm4TlvDq8ikWAM'),
    model: z.string().default('eleven_monolingual_v1'),
  }),

  // LiveKit rooms
  livekit: z.object({
    apiKey: optionalSecret,
    apiSecret: optionalSecret,
    url: optionalSecret,
  }),

  wakeWord: z.object({
    phrase: z.string().min(1).default('Hey Ceddy'),
  }),

  pagination: z.object({
    defaultLimit: z.number().int().positive().default(20),
    maxLimit: z.number().int().positive().default(100),
  }),

  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Build the configuration from environment variables.
 * Debug defaults to on for develop and test environments.
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const environment = z.enum(environments).default('develop').parse(env.ENVIRONMENT || undefined);

  const rawConfig = {
    environment,
    debug: parseBoolean(env.DEBUG) ?? (environment === 'develop' || environment === 'test'),
    server: {
      port: parseNumber(env.PORT),
      apiPrefix: env.API_PREFIX || undefined,
      maxUploadBytes: parseNumber(env.MAX_UPLOAD_BYTES),
    },
    database: {
      url: env.DATABASE_URL || undefined,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      apiUrl: env.OPENAI_API_URL || undefined,
      assistantId: env.OPENAI_ASSISTANT_ID,
      assistantModel: env.OPENAI_ASSISTANT_MODEL || undefined,
      sttModel: env.STT_MODEL || undefined,
      sttLanguage: env.STT_LANGUAGE || undefined,
      ttsModel: env.TTS_FALLBACK_MODEL || undefined,
      ttsVoice: env.TTS_FALLBACK_VOICE || undefined,
      pollIntervalMs: parseNumber(env.ASSISTANT_POLL_INTERVAL_MS),
      maxPollIntervalMs: parseNumber(env.ASSISTANT_MAX_POLL_INTERVAL_MS),
      runTimeoutMs: parseNumber(env.ASSISTANT_RUN_TIMEOUT_MS),
    },
    elevenlabs: {
      apiKey: env.ELEVENLABS_API_KEY,
      apiUrl: env.ELEVENLABS_API_URL || undefined,
      voiceId: env.ELEVENLABS_VOICE_ID || undefined,
      model: env.ELEVENLABS_MODEL || undefined,
    },
    livekit: {
      apiKey: env.LIVEKIT_API_KEY,
      apiSecret: env.LIVEKIT_API_SECRET,
      url: env.LIVEKIT_URL,
    },
    wakeWord: {
      phrase: env.WAKE_WORD || undefined,
    },
    pagination: {
      defaultLimit: parseNumber(env.PAGINATION_DEFAULT_LIMIT),
      maxLimit: parseNumber(env.PAGINATION_MAX_LIMIT),
    },
    logLevel: env.LOG_LEVEL || undefined,
  };

  return configSchema.parse(rawConfig);
}

export const config = parseConfig();

