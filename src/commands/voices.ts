import type { VoicesCommandOptions } from '../types';
import { loadConfig, parseBackendKind } from '../config';
import { createBackend } from '../backends';
import { errorMessage } from '../errors';
import type { CommandDeps } from './generate';

export async function voicesCommand(options: VoicesCommandOptions, deps: CommandDeps = {}): Promise<void> {
  try {
    const config = deps.config ?? loadConfig();
    const kind = options.backend ? parseBackendKind(options.backend) : config.backend;
    const backend = deps.backend ?? createBackend(config, kind);
    const catalog = backend.catalog();

    let unavailable: string | null = null;
    try {
      await backend.checkAvailability();
    } catch (error) {
      unavailable = errorMessage(error);
    }

    if (options.format === 'json') {
      console.log(JSON.stringify({ ...catalog, available: unavailable === null, error: unavailable ?? undefined }, null, 2));
      return;
    }

    console.log(`\n${catalog.backend} voices:`);
    for (const voice of catalog.voices) {
      const marker = voice.id === catalog.narratorVoiceId ? ' (narrator)' : '';
      console.log(`  ${voice.id.padEnd(22)} ${voice.name.padEnd(10)} ${voice.gender.padEnd(7)} ${voice.language}${marker}`);
    }

    if (unavailable) {
      console.warn(`\n⚠ Backend not ready: ${unavailable}`);
    }
  } catch (error) {
    console.error(`\nError: ${errorMessage(error)}`);
    process.exit(1);
  }
}
