import type { AudioClip, VoiceCatalog, VoiceOption, VoiceProfile } from '../types';
import { ConfigurationError, SynthesisError } from '../errors';
import { withTimeout } from '../utils/timeout';
import type { RenderOptions, TTSBackend } from './backend';
import { prepareText, resolveVoice } from './backend';
import { assertSucceeded, runCommand, type CommandRunner } from './command-runner';
import { readEngineOutput, withStagingFiles } from './staging';

// Voice ids are shared with the Kokoro catalog so a cast survives switching engines.
export const MAC_VOICES: readonly VoiceOption[] = [
  { id: 'af_sky', name: 'Samantha', gender: 'female', language: 'en-US' },
  { id: 'af_heart', name: 'Victoria', gender: 'female', language: 'en-US' },
  { id: 'af_bella', name: 'Zoey', gender: 'female', language: 'en-US' },
  { id: 'af_sarah', name: 'Allison', gender: 'female', language: 'en-US' },
  { id: 'am_echo', name: 'Alex', gender: 'male', language: 'en-US' },
  { id: 'am_adam', name: 'Fred', gender: 'male', language: 'en-US' },
  { id: 'am_michael', name: 'Ralph', gender: 'male', language: 'en-US' },
  { id: 'bf_emma', name: 'Serena', gender: 'female', language: 'en-GB' },
  { id: 'bm_daniel', name: 'Daniel', gender: 'male', language: 'en-GB' },
  { id: 'bm_george', name: 'Oliver', gender: 'male', language: 'en-GB' }
];

/** Kokoro ids with no system voice of their own, mapped to the nearest one above. */
export const MAC_VOICE_ALIASES: Readonly<Record<string, string>> = {
  af_nova: 'af_sky',
  af_nicole: 'af_sky',
  am_liam: 'am_echo',
  bm_lewis: 'bm_george',
  bm_fable: 'bm_george',
  bf_alice: 'bf_emma',
  bf_lily: 'bf_emma',
  bf_isabella: 'bf_emma'
};

export const MAC_NARRATOR_VOICE = 'af_sky';

/** `say` words per minute at speed 1.0. */
const BASE_RATE = 180;

export interface MacSpeechBackendOptions {
  sampleRate: number;
  timeoutMs: number;
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  stagingRoot?: string;
}

export class MacSpeechBackend implements TTSBackend {
  readonly kind = 'mac' as const;
  private readonly runner: CommandRunner;

  constructor(private readonly options: MacSpeechBackendOptions) {
    this.runner = options.runner ?? runCommand;
  }

  catalog(): VoiceCatalog {
    return { backend: this.kind, voices: MAC_VOICES, narratorVoiceId: MAC_NARRATOR_VOICE };
  }

  async checkAvailability(): Promise<void> {
    const platform = this.options.platform ?? process.platform;
    if (platform !== 'darwin') {
      throw new ConfigurationError(`The mac backend needs macOS (say and afconvert); this is ${platform}`);
    }
  }

  async render(text: string, voice: VoiceProfile, options: RenderOptions = {}): Promise<AudioClip> {
    const input = prepareText(text);
    const profile = { ...voice, voiceId: MAC_VOICE_ALIASES[voice.voiceId] ?? voice.voiceId };
    const macVoice = resolveVoice(MAC_VOICES, profile, MAC_NARRATOR_VOICE);
    const rate = Math.round(BASE_RATE * (options.speed ?? 1.0));
    const { sampleRate, timeoutMs } = this.options;

    return withStagingFiles(input, { outputExtension: '.wav', root: this.options.stagingRoot }, async files => {
      const aiffPath = files.scratch('speech.aiff');

      const run = async (): Promise<void> => {
        const spoken = await this.runner(
          'say',
          ['-v', macVoice.name, '-r', String(rate), '-f', files.inputPath, '-o', aiffPath],
          { timeoutMs }
        );
        assertSucceeded('say', spoken);

        const converted = await this.runner(
          'afconvert',
          ['-f', 'WAVE', '-d', `LEI16@${sampleRate}`, aiffPath, files.outputPath],
          { timeoutMs }
        );
        assertSucceeded('afconvert', converted);
      };

      await withTimeout(
        run(),
        timeoutMs,
        () => new SynthesisError('ENGINE_TIMEOUT', `say did not finish within ${timeoutMs}ms`)
      );

      return readEngineOutput('afconvert', files.outputPath);
    });
  }
}
