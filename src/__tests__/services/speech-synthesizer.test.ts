import { describe, it, expect } from 'vitest';
import { SpeechSynthesizer } from '../../services/speech-synthesizer.js';
import { ProviderError } from '../../utils/errors.js';
import { fakeTTS, readAll } from '../helpers.js';

describe('SpeechSynthesizer', () => {
  it('uses the primary voice when it succeeds', async () => {
    const primary = fakeTTS('elevenlabs', 'primary-mp3');
    const fallback = fakeTTS('openai-tts', 'fallback-mp3');

    const outcome = await new SpeechSynthesizer(primary, fallback).synthesize('Use a 7 iron.');

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect((await readAll(outcome.value)).toString()).toBe('primary-mp3');
    expect(fallback.synthesize).not.toHaveBeenCalled();
  });

  it('tries the fallback exactly once after a primary failure', async () => {
    const primary = fakeTTS('elevenlabs', new Error('401 unauthorized'));
    const fallback = fakeTTS('openai-tts', 'fallback-mp3');

    const outcome = await new SpeechSynthesizer(primary, fallback).synthesize('Use a 7 iron.');

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect((await readAll(outcome.value)).toString()).toBe('fallback-mp3');
    expect(primary.synthesize).toHaveBeenCalledTimes(1);
    expect(fallback.synthesize).toHaveBeenCalledTimes(1);
  });

  it('reports the fallback failure when both voices fail', async () => {
    const synthesizer = new SpeechSynthesizer(
      fakeTTS('elevenlabs', new Error('primary down')),
      fakeTTS('openai-tts', new Error('fallback down')),
    );

    const outcome = await synthesizer.synthesize('Use a 7 iron.');

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ProviderError);
      expect(outcome.error.provider).toBe('openai-tts');
      expect(outcome.error.message).toBe('fallback down');
    }
  });

  it('goes straight to the fallback without a primary', async () => {
    const fallback = fakeTTS('openai-tts', 'fallback-mp3');

    const outcome = await new SpeechSynthesizer(null, fallback).synthesize('Driver.');

    expect(outcome.ok).toBe(true);
    expect(fallback.synthesize).toHaveBeenCalledWith('Driver.', undefined);
  });
});
