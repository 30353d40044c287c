import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseConfig } from '../config.js';

describe('parseConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config.environment).toBe('develop');
    expect(config.debug).toBe(true);
    expect(config.server).toEqual({ port: 8000, apiPrefix: '/v1', maxUploadBytes: 25 * 1024 * 1024 });
    expect(config.wakeWord.phrase).toBe('Hey Ceddy');
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.openai.runTimeoutMs).toBe(60000);
    expect(config.pagination).toEqual({ defaultLimit: 20, maxLimit: 100 });
  });

  it('reads values from the environment', () => {
    const config = parseConfig({
      ENVIRONMENT: 'production',
      PORT: '9000',
      OPENAI_API_KEY: 'test-key',
      ELEVENLABS_VOICE_ID: 'voice-1',
      WAKE_WORD: 'Hello Caddie',
      ASSISTANT_RUN_TIMEOUT_MS: '1500',
    });

    expect(config.environment).toBe('production');
    expect(config.debug).toBe(false);
    expect(config.server.port).toBe(9000);
    expect(config.openai.apiKey).toBe('test-key');
    expect(config.elevenlabs.voiceId).toBe('voice-1');
    expect(config.wakeWord.phrase).toBe('Hello Caddie');
    expect(config.openai.runTimeoutMs).toBe(1500);
  });

  it('treats blank secrets as unset', () => {
    const config = parseConfig({ LIVEKIT_API_KEY: '   ', LIVEKIT_API_SECRET: '' });

    expect(config.livekit.apiKey).toBeUndefined();
    expect(config.livekit.apiSecret).toBeUndefined();
  });

  it('lets DEBUG override the environment default', () => {
    expect(parseConfig({ ENVIRONMENT: 'production', DEBUG: 'true' }).debug).toBe(true);
    expect(parseConfig({ ENVIRONMENT: 'test', DEBUG: 'off' }).debug).toBe(false);
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ PORT: 'eighty' })).toThrow(ZodError);
    expect(() => parseConfig({ ENVIRONMENT: 'qa' })).toThrow(ZodError);
  });
});
