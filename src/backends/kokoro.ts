import { access } from 'fs/promises';
import type { AudioClip, Gender, VoiceCatalog, VoiceOption, VoiceProfile } from '../types';
import { ConfigurationError, SynthesisError } from '../errors';
import { withTimeout } from '../utils/timeout';
import type { RenderOptions, TTSBackend } from './backend';
import { languageForVoiceId, prepareText, resolveVoice } from './backend';
import { assertSucceeded, runCommand, type CommandRunner } from './command-runner';
import { readEngineOutput, withStagingFiles } from './staging';

const KOKORO_VOICE_IDS = [
  'af_alloy', 'af_aoede', 'af_bella', 'af_heart', 'af_jessica', 'af_kore',
  'af_nicole', 'af_nova', 'af_river', 'af_sarah', 'af_sky',
  'am_adam', 'am_echo', 'am_eric', 'am_fenrir', 'am_liam', 'am_michael', 'am_onyx', 'am_puck',
  'bf_alice', 'bf_emma', 'bf_isabella', 'bf_lily',
  'bm_daniel', 'bm_fable', 'bm_george', 'bm_lewis'
] as const;

function genderForVoiceId(id: string): Gender {
  const marker = id.charAt(1);
  if (marker === 'f') return 'female';
  if (marker === 'm') return 'male';
  return 'unknown';
}

// Ids are "<accent><gender>_<name>": a/b for American/British, f/m for the voice.
export const KOKORO_VOICES: readonly VoiceOption[] = KOKORO_VOICE_IDS.map(id => ({
  id,
  name: id,
  gender: genderForVoiceId(id),
  language: languageForVoiceId(id)
}));

export const KOKORO_NARRATOR_VOICE = 'af_sky';

export interface KokoroBackendOptions {
  pythonPath: string;
  modelPath: string;
  voicesPath: string;
  timeoutMs: number;
  runner?: CommandRunner;
  stagingRoot?: string;
}

export class KokoroBackend implements TTSBackend {
  readonly kind = 'kokoro' as const;
  private readonly runner: CommandRunner;

  constructor(private readonly options: KokoroBackendOptions) {
    this.runner = options.runner ?? runCommand;
  }

  catalog(): VoiceCatalog {
    return { backend: this.kind, voices: KOKORO_VOICES, narratorVoiceId: KOKORO_NARRATOR_VOICE };
  }

  async checkAvailability(): Promise<void> {
    const missing = await this.missingAssets();
    if (missing.length > 0) {
      throw new ConfigurationError(
        `Kokoro model files not found: ${missing.join(', ')}\n` +
        'Set KOKORO_MODEL_PATH and KOKORO_VOICES_PATH, or place them in STORAGE_DIR.'
      );
    }
  }

  async render(text: string, voice: VoiceProfile, options: RenderOptions = {}): Promise<AudioClip> {
    const input = prepareText(text);

    const missing = await this.missingAssets();
    if (missing.length > 0) {
      throw new SynthesisError('MISSING_ASSETS', `Kokoro model files not found: ${missing.join(', ')}`);
    }

    const kokoroVoice = resolveVoice(KOKORO_VOICES, voice, KOKORO_NARRATOR_VOICE);
    const { pythonPath, modelPath, voicesPath, timeoutMs } = this.options;

    return withStagingFiles(input, { outputExtension: '.wav', root: this.options.stagingRoot }, async files => {
      const args = [
        '-m', 'kokoro_tts',
        files.inputPath, files.outputPath,
        '--voice', kokoroVoice.name,
        '--speed', String(options.speed ?? 1.0),
        '--model', modelPath,
        '--voices', voicesPath
      ];

      const result = await withTimeout(
        this.runner(pythonPath, args, { timeoutMs }),
        timeoutMs,
        () => new SynthesisError('ENGINE_TIMEOUT', `kokoro_tts did not finish within ${timeoutMs}ms`)
      );
      assertSucceeded('kokoro_tts', result);

      return readEngineOutput('kokoro_tts', files.outputPath);
    });
  }

  private async missingAssets(): Promise<string[]> {
    const paths = [this.options.modelPath, this.options.voicesPath];
    const checks = await Promise.all(
      paths.map(filePath => access(filePath).then(() => null, () => filePath))
    );
    return checks.filter((filePath): filePath is string => filePath !== null);
  }
}
