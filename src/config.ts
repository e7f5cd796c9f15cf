import * as path from 'path';
import { availableParallelism } from 'os';
import type { BackendKind } from './types';
import { ConfigurationError } from './errors';

export interface AppConfig {
  backend: BackendKind;
  storageDir: string;
  kokoro: {
    pythonPath: string;
    modelPath: string;
    voicesPath: string;
  };
  elevenLabs: {
    apiKey: string | undefined;
    modelId: string;
    baseUrl: string;
    requestsPerSecond: number;
  };
  llm: {
    enabled: boolean;
    baseUrl: string;
    model: string;
    timeoutMs: number;
  };
  audio: {
    sampleRate: number;
    speed: number;
    pauseMs: number;
  };
  maxSegmentChars: number;
  segmentConcurrency: number;
  chapterConcurrency: number;
  engineTimeoutMs: number;
}

const BACKENDS: readonly BackendKind[] = ['mac', 'kokoro', 'elevenlabs'];

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number, minimum = 1): number {
  const envValue = env[name];

  if (!envValue) {
    return fallback;
  }

  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed) || parsed < minimum) {
    console.warn(`Invalid ${name} value "${envValue}". Using minimum value of ${minimum}.`);
    return minimum;
  }

  return parsed;
}

function readPositiveFloat(env: Env, name: string, fallback: number): number {
  const envValue = env[name];

  if (!envValue) {
    return fallback;
  }

  const parsed = Number.parseFloat(envValue);
  if (Number.isNaN(parsed) || parsed <= 0) {
    console.warn(`Invalid ${name} value "${envValue}". Using default of ${fallback}.`);
    return fallback;
  }

  return parsed;
}

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const envValue = env[name]?.trim().toLowerCase();
  if (!envValue) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(envValue)) return true;
  if (['0', 'false', 'no', 'off'].includes(envValue)) return false;

  console.warn(`Invalid ${name} value "${envValue}". Using default of ${fallback}.`);
  return fallback;
}

export function parseBackendKind(value: string): BackendKind {
  const kind = BACKENDS.find(backend => backend === value.trim().toLowerCase());
  if (!kind) {
    throw new ConfigurationError(`Unknown TTS backend "${value}". Expected one of: ${BACKENDS.join(', ')}`);
  }
  return kind;
}

/** Reads configuration from the environment (populated from `.env` by the CLI). */
export function loadConfig(env: Env = process.env): AppConfig {
  const storageDir = path.resolve(env.STORAGE_DIR || './storage');

  return {
    backend: parseBackendKind(env.TTS_BACKEND || 'kokoro'),
    storageDir,
    kokoro: {
      pythonPath: env.KOKORO_PYTHON || 'python3',
      modelPath: env.KOKORO_MODEL_PATH || path.join(storageDir, 'kokoro-v1.0.onnx'),
      voicesPath: env.KOKORO_VOICES_PATH || path.join(storageDir, 'voices-v1.0.bin')
    },
    elevenLabs: {
      apiKey: env.ELEVENLABS_API_KEY || undefined,
      modelId: env.ELEVENLABS_MODEL_ID || 'eleven_flash_v2_5',
      baseUrl: env.ELEVENLABS_BASE_URL || 'https://api.elevenlabs.io',
      requestsPerSecond: readPositiveInt(env, 'REQUESTS_PER_SECOND', 3)
    },
    llm: {
      enabled: readBoolean(env, 'LLM_ENABLED', true),
      baseUrl: env.OLLAMA_URL || 'http://localhost:11434',
      model: env.LLM_MODEL || 'llama3.1',
      timeoutMs: readPositiveInt(env, 'LLM_TIMEOUT_MS', 15000, 100)
    },
    audio: {
      sampleRate: readPositiveInt(env, 'AUDIO_SAMPLE_RATE', 24000, 8000),
      speed: readPositiveFloat(env, 'AUDIO_SPEED', 1.0),
      pauseMs: readPositiveInt(env, 'PAUSE_MS', 300, 0)
    },
    maxSegmentChars: readPositiveInt(env, 'MAX_SEGMENT_CHARS', 5000, 100),
    segmentConcurrency: readPositiveInt(env, 'SEGMENT_CONCURRENCY', 4),
    chapterConcurrency: readPositiveInt(env, 'CHAPTER_CONCURRENCY', availableParallelism()),
    engineTimeoutMs: readPositiveInt(env, 'ENGINE_TIMEOUT_MS', 120000, 1000)
  };
}
