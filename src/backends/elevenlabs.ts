import type { AudioClip, VoiceCatalog, VoiceOption, VoiceProfile } from '../types';
import { ConfigurationError, FormatError, SynthesisError } from '../errors';
import { validateClip } from '../audio/pcm';
import { withTimeout } from '../utils/timeout';
import type { RenderOptions, TTSBackend } from './backend';
import { prepareText, resolveVoice } from './backend';

export const ELEVENLABS_VOICES: readonly VoiceOption[] = [
  { id: 'EXAVITQu4vr4xnSDxMaL', name: 'Sarah', gender: 'female', language: 'en-US' },
  { id: '21m00Tcm4TlvDq8ikWAM', name: 'Rachel', gender: 'female', language: 'en-US' },
  { id: 'AZnzlk1XvdvUeBnXmlld', name: 'Domi', gender: 'female', language: 'en-US' },
  { id: 'MF3mGyEYCl7XYWbV9V6O', name: 'Elli', gender: 'female', language: 'en-US' },
  { id: 'pNInz6obpgDQGcFmaJgB', name: 'Adam', gender: 'male', language: 'en-US' },
  { id: 'ErXwobaYiN019PkySvjV', name: 'Antoni', gender: 'male', language: 'en-US' },
  { id: 'TxGEqnHWrfWFTfGW9XjX', name: 'Josh', gender: 'male', language: 'en-US' },
  { id: 'VR6AewLTigWG4xSOukaG', name: 'Arnold', gender: 'male', language: 'en-US' },
  { id: 'yoZ06aMxZJJ28mfd3POQ', name: 'Sam', gender: 'male', language: 'en-US' }
];

export const ELEVENLABS_NARRATOR_VOICE = 'EXAVITQu4vr4xnSDxMaL';

/** Raw PCM output rates the API offers. */
export const ELEVENLABS_SAMPLE_RATES: readonly number[] = [16000, 22050, 24000, 44100];

export interface ElevenLabsBackendOptions {
  apiKey: string | undefined;
  modelId: string;
  baseUrl: string;
  sampleRate: number;
  timeoutMs: number;
  requestsPerSecond?: number;
  fetchFn?: typeof fetch;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number.parseFloat(header);
  return Number.isNaN(seconds) || seconds < 0 ? undefined : seconds;
}

export class ElevenLabsBackend implements TTSBackend {
  readonly kind = 'elevenlabs' as const;
  readonly maxRequestsPerSecond?: number;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: ElevenLabsBackendOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.maxRequestsPerSecond = options.requestsPerSecond;
  }

  catalog(): VoiceCatalog {
    return { backend: this.kind, voices: ELEVENLABS_VOICES, narratorVoiceId: ELEVENLABS_NARRATOR_VOICE };
  }

  async checkAvailability(): Promise<void> {
    this.getApiKey();
    if (!ELEVENLABS_SAMPLE_RATES.includes(this.options.sampleRate)) {
      throw new ConfigurationError(
        `ElevenLabs cannot produce ${this.options.sampleRate} Hz audio. ` +
        `Set AUDIO_SAMPLE_RATE to one of: ${ELEVENLABS_SAMPLE_RATES.join(', ')}`
      );
    }
  }

  async render(text: string, voice: VoiceProfile, options: RenderOptions = {}): Promise<AudioClip> {
    const input = prepareText(text);
    const apiKey = this.getApiKey();
    const target = resolveVoice(ELEVENLABS_VOICES, voice, ELEVENLABS_NARRATOR_VOICE);
    const { baseUrl, modelId, sampleRate, timeoutMs } = this.options;

    const controller = new AbortController();
    const request = this.fetchFn(
      `${baseUrl}/v1/text-to-speech/${target.id}?output_format=pcm_${sampleRate}`,
      {
        method: 'POST',
        headers: {
          'xi-api-key': apiKey,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          text: input,
          model_id: modelId,
          voice_settings: {
            stability: 0.5,
            similarity_boost: 0.75,
            speed: options.speed ?? 1.0
          }
        }),
        signal: controller.signal
      }
    ).then(async response => {
      if (!response.ok) {
        const errorText = await response.text();
        throw this.errorForStatus(response, errorText);
      }
      return new Uint8Array(await response.arrayBuffer());
    }, (error: unknown) => {
      throw new SynthesisError('SERVER_ERROR', 'ElevenLabs request failed', { cause: error });
    });

    const pcm = await withTimeout(request, timeoutMs, () => {
      controller.abort();
      return new SynthesisError('ENGINE_TIMEOUT', `ElevenLabs did not respond within ${timeoutMs}ms`);
    });

    const clip: AudioClip = { pcm, sampleRate, channelCount: 1, bitDepth: 16 };
    try {
      validateClip(clip);
    } catch (error) {
      if (error instanceof FormatError) {
        throw new SynthesisError('INVALID_OUTPUT', `ElevenLabs returned unusable audio: ${error.message}`, { cause: error });
      }
      throw error;
    }
    return clip;
  }

  private getApiKey(): string {
    const apiKey = this.options.apiKey;

    if (!apiKey) {
      throw new ConfigurationError(
        'ElevenLabs API key not found. Set ELEVENLABS_API_KEY in .env file.\n' +
        'Get your API key from: https://elevenlabs.io/'
      );
    }

    return apiKey;
  }

  private errorForStatus(response: Response, errorText: string): SynthesisError {
    if (response.status === 401) {
      return new SynthesisError('AUTH_FAILED', 'Invalid ElevenLabs API key. Check ELEVENLABS_API_KEY in .env');
    }

    if (response.status === 429) {
      const retryAfter = response.headers.get('Retry-After');
      return new SynthesisError(
        'RATE_LIMITED',
        `Rate limit exceeded. Retry after ${retryAfter || 'unknown'} seconds.`,
        { retryAfterSeconds: parseRetryAfter(retryAfter) }
      );
    }

    if (response.status >= 500) {
      return new SynthesisError('SERVER_ERROR', `ElevenLabs server error: ${response.statusText}`);
    }

    return new SynthesisError('ENGINE_FAILED', `ElevenLabs API error: ${response.statusText}. ${errorText}`);
  }
}
