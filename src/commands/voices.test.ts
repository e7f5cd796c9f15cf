import { afterEach, describe, expect, it, vi } from 'vitest';
import { voicesCommand } from './voices';
import { loadConfig } from '../config';
import { ConfigurationError } from '../errors';
import { FakeBackend, TEST_VOICES } from '../testing/fixtures';

describe('voicesCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists the catalog as JSON', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await voicesCommand({ format: 'json' }, { config: loadConfig({}), backend: new FakeBackend() });

    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      backend: 'kokoro',
      voices: TEST_VOICES,
      narratorVoiceId: 'af_sky',
      available: true
    });
  });

  it('still lists voices when the backend is not ready', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const backend = new FakeBackend();
    backend.unavailable = new ConfigurationError('model missing');

    await voicesCommand({ format: 'text' }, { config: loadConfig({}), backend });

    expect(log).toHaveBeenCalledWith('\nkokoro voices:');
    expect(log).toHaveBeenCalledWith(`  ${'af_sky'.padEnd(22)} ${'af_sky'.padEnd(10)} female  en-US (narrator)`);
    expect(warn).toHaveBeenCalledWith('\n⚠ Backend not ready: model missing');
  });
});
