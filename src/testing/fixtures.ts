import type { AudioClip, VoiceCatalog, VoiceOption, VoiceProfile } from '../types';
import type { RenderOptions, TTSBackend } from '../backends/backend';
import { SynthesisError } from '../errors';
import { wait } from '../utils/timeout';

export const TEST_VOICES: readonly VoiceOption[] = [
  { id: 'af_sky', name: 'af_sky', gender: 'female', language: 'en-US' },
  { id: 'am_adam', name: 'am_adam', gender: 'male', language: 'en-US' },
  { id: 'af_bella', name: 'af_bella', gender: 'female', language: 'en-US' },
  { id: 'am_echo', name: 'am_echo', gender: 'male', language: 'en-US' },
  { id: 'bf_emma', name: 'bf_emma', gender: 'female', language: 'en-GB' }
];

export const TEST_CATALOG: VoiceCatalog = { backend: 'kokoro', voices: TEST_VOICES, narratorVoiceId: 'af_sky' };

export const TEST_SAMPLE_RATE = 1000;

/** 16-bit mono clip whose every sample equals `value`. */
export function toneClip(frames: number, value: number, sampleRate = TEST_SAMPLE_RATE): AudioClip {
  const pcm = new Uint8Array(frames * 2);
  const view = new DataView(pcm.buffer);
  for (let i = 0; i < frames; i++) view.setInt16(i * 2, value, true);
  return { pcm, sampleRate, channelCount: 1, bitDepth: 16 };
}

export interface RenderCall {
  text: string;
  voiceId: string;
  speed?: number;
}

/**
 * In-process backend: renders ten frames per character of text, every sample set to
 * the text length, so tests can tell the clips apart in the merged track.
 */
export class FakeBackend implements TTSBackend {
  readonly kind = 'kokoro' as const;
  readonly calls: RenderCall[] = [];
  unavailable: Error | null = null;
  /** Text → number of times render should fail before succeeding. */
  readonly failures = new Map<string, number>();
  readonly delays = new Map<string, number>();
  readonly sampleRates = new Map<string, number>();
  onRender: ((call: RenderCall) => void) | null = null;

  catalog(): VoiceCatalog {
    return TEST_CATALOG;
  }

  async checkAvailability(): Promise<void> {
    if (this.unavailable) throw this.unavailable;
  }

  async render(text: string, voice: VoiceProfile, options: RenderOptions = {}): Promise<AudioClip> {
    const call: RenderCall = { text, voiceId: voice.voiceId, speed: options.speed };
    this.calls.push(call);
    this.onRender?.(call);

    await wait(this.delays.get(text) ?? 0);

    const remaining = this.failures.get(text) ?? 0;
    if (remaining > 0) {
      this.failures.set(text, remaining - 1);
      throw new SynthesisError('ENGINE_FAILED', `engine crashed on "${text}"`);
    }

    return toneClip(text.length * 10, text.length, this.sampleRates.get(text));
  }

  callsFor(text: string): RenderCall[] {
    return this.calls.filter(call => call.text === text);
  }
}
