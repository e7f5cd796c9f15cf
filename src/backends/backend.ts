import type { AudioClip, BackendKind, VoiceCatalog, VoiceOption, VoiceProfile } from '../types';
import { SynthesisError } from '../errors';

export interface RenderOptions {
  /** 1.0 is the engine's normal speaking rate. */
  speed?: number;
}

/**
 * A text-to-speech engine. Implementations are selected once from configuration;
 * the pipeline only ever talks to this interface.
 */
export interface TTSBackend {
  readonly kind: BackendKind;
  /** Upper bound on render calls started per second, for engines that meter requests. */
  readonly maxRequestsPerSecond?: number;

  catalog(): VoiceCatalog;

  /** Throws ConfigurationError when the engine cannot be used at all. */
  checkAvailability(): Promise<void>;

  render(text: string, voice: VoiceProfile, options?: RenderOptions): Promise<AudioClip>;
}

/** Strips characters engines choke on and collapses whitespace; empty results are rejected. */
export function prepareText(text: string): string {
  const cleaned = text.replace(/[\u0000\uFFFD]/g, '').replace(/\s+/g, ' ').trim();
  if (!/[\p{L}\p{N}]/u.test(cleaned)) {
    throw new SynthesisError('EMPTY_TEXT', 'Nothing to synthesize: segment text is empty');
  }
  return cleaned;
}

/**
 * Maps a stored profile onto this engine's voice list. Profiles made for another
 * engine keep working as long as the engine knows the same voice id.
 */
export function resolveVoice(voices: readonly VoiceOption[], profile: VoiceProfile, fallbackId: string): VoiceOption {
  const match =
    voices.find(voice => voice.id === profile.voiceId) ??
    voices.find(voice => voice.id === fallbackId) ??
    voices[0];

  if (!match) {
    throw new SynthesisError('ENGINE_UNAVAILABLE', 'Backend has no voices configured');
  }
  return match;
}

export function languageForVoiceId(id: string): string {
  return id.startsWith('b') ? 'en-GB' : 'en-US';
}
