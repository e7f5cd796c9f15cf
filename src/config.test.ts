import { afterEach, describe, expect, it, vi } from 'vitest';
import * as path from 'path';
import { loadConfig, parseBackendKind } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('has working defaults', () => {
    const config = loadConfig({});
    const storageDir = path.resolve('./storage');

    expect(config.backend).toBe('kokoro');
    expect(config.storageDir).toBe(storageDir);
    expect(config.kokoro).toEqual({
      pythonPath: 'python3',
      modelPath: path.join(storageDir, 'kokoro-v1.0.onnx'),
      voicesPath: path.join(storageDir, 'voices-v1.0.bin')
    });
    expect(config.elevenLabs).toEqual({
      apiKey: undefined,
      modelId: 'eleven_flash_v2_5',
      baseUrl: 'https://api.elevenlabs.io',
      requestsPerSecond: 3
    });
    expect(config.llm).toEqual({ enabled: true, baseUrl: 'http://localhost:11434', model: 'llama3.1', timeoutMs: 15000 });
    expect(config.audio).toEqual({ sampleRate: 24000, speed: 1, pauseMs: 300 });
    expect(config.maxSegmentChars).toBe(5000);
    expect(config.segmentConcurrency).toBe(4);
    expect(config.chapterConcurrency).toBeGreaterThanOrEqual(1);
    expect(config.engineTimeoutMs).toBe(120000);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      TTS_BACKEND: ' ElevenLabs ',
      STORAGE_DIR: '/data/storyvoice',
      ELEVENLABS_API_KEY: 'test-secret',
      LLM_ENABLED: 'off',
      PAUSE_MS: '0',
      AUDIO_SPEED: '1.25',
      CHAPTER_CONCURRENCY: '2'
    });

    expect(config.backend).toBe('elevenlabs');
    expect(config.kokoro.modelPath).toBe('/data/storyvoice/kokoro-v1.0.onnx');
    expect(config.elevenLabs.apiKey).toBe('test-secret');
    expect(config.llm.enabled).toBe(false);
    expect(config.audio.pauseMs).toBe(0);
    expect(config.audio.speed).toBe(1.25);
    expect(config.chapterConcurrency).toBe(2);
  });

  it('falls back with a warning on invalid numbers', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const config = loadConfig({ SEGMENT_CONCURRENCY: 'abc', AUDIO_SPEED: '-2' });

    expect(config.segmentConcurrency).toBe(1);
    expect(config.audio.speed).toBe(1);
    expect(warn).toHaveBeenCalledWith('Invalid SEGMENT_CONCURRENCY value "abc". Using minimum value of 1.');
    expect(warn).toHaveBeenCalledWith('Invalid AUDIO_SPEED value "-2". Using default of 1.');
  });

  it('refuses unknown backends', () => {
    expect(() => loadConfig({ TTS_BACKEND: 'espeak' })).toThrow(
      new ConfigurationError('Unknown TTS backend "espeak". Expected one of: mac, kokoro, elevenlabs')
    );
  });
});

describe('parseBackendKind', () => {
  it('is case-insensitive', () => {
    expect(parseBackendKind('MAC')).toBe('mac');
  });
});
