import type { AppConfig } from '../config';
import type { BackendKind } from '../types';
import type { TTSBackend } from './backend';
import { ElevenLabsBackend } from './elevenlabs';
import { KokoroBackend } from './kokoro';
import { MacSpeechBackend } from './mac-speech';

export type { RenderOptions, TTSBackend } from './backend';
export { ElevenLabsBackend } from './elevenlabs';
export { KokoroBackend } from './kokoro';
export { MacSpeechBackend } from './mac-speech';

export function createBackend(config: AppConfig, kind: BackendKind = config.backend): TTSBackend {
  switch (kind) {
    case 'mac':
      return new MacSpeechBackend({
        sampleRate: config.audio.sampleRate,
        timeoutMs: config.engineTimeoutMs
      });
    case 'kokoro':
      return new KokoroBackend({
        pythonPath: config.kokoro.pythonPath,
        modelPath: config.kokoro.modelPath,
        voicesPath: config.kokoro.voicesPath,
        timeoutMs: config.engineTimeoutMs
      });
    case 'elevenlabs':
      return new ElevenLabsBackend({
        apiKey: config.elevenLabs.apiKey,
        modelId: config.elevenLabs.modelId,
        baseUrl: config.elevenLabs.baseUrl,
        requestsPerSecond: config.elevenLabs.requestsPerSecond,
        sampleRate: config.audio.sampleRate,
        timeoutMs: config.engineTimeoutMs
      });
  }
}
