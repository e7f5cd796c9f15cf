import { describe, expect, it } from 'vitest';
import { ElevenLabsBackend, KokoroBackend, MacSpeechBackend, createBackend } from './index';
import { loadConfig } from '../config';

describe('createBackend', () => {
  const config = loadConfig({ STORAGE_DIR: '/data/storyvoice', REQUESTS_PER_SECOND: '5' });

  it('builds the configured backend', () => {
    expect(createBackend(config)).toBeInstanceOf(KokoroBackend);
  });

  it('builds the backend asked for', () => {
    expect(createBackend(config, 'mac')).toBeInstanceOf(MacSpeechBackend);

    const elevenLabs = createBackend(config, 'elevenlabs');
    expect(elevenLabs).toBeInstanceOf(ElevenLabsBackend);
    expect(elevenLabs.maxRequestsPerSecond).toBe(5);
  });
});
