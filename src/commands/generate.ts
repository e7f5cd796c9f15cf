import ora from 'ora';
import * as path from 'path';
import type { BackendKind, Chapter, GenerateCommandOptions, GenerationSummary, PipelineState } from '../types';
import type { TTSBackend } from '../backends/backend';
import type { CharacterExtractor } from '../services/llm-client';
import { loadConfig, parseBackendKind, type AppConfig } from '../config';
import { createBackend } from '../backends';
import { parseInput } from '../parsers/parser';
import { segmentText } from '../segmenter';
import { CharacterDetector } from '../characters/detector';
import { OllamaClient } from '../services/llm-client';
import { FileBookStateStore } from '../services/book-state-store';
import { SynthesisPipeline } from '../pipeline/synthesis-pipeline';
import { ensureOutputDir, saveWavFile, stateDirFor } from '../generator';
import { ChapterGenerationError, errorMessage } from '../errors';

/** Collaborators the command builds from configuration unless given. */
export interface CommandDeps {
  config?: AppConfig;
  backend?: TTSBackend;
  extractor?: CharacterExtractor | null;
}

export function parsePositiveInt(value: string | undefined, name: string, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    console.warn(`Invalid ${name} value "${value}". Using minimum value of 1.`);
    return 1;
  }

  return parsed;
}

/** Parses `--cast` entries of the form `name=voiceId`. */
export function parseCastEntries(entries: readonly string[]): Array<{ name: string; voiceId: string }> {
  return entries.map(entry => {
    const separator = entry.lastIndexOf('=');
    const name = entry.slice(0, separator).trim();
    const voiceId = entry.slice(separator + 1).trim();

    if (separator <= 0 || !name || !voiceId) {
      throw new Error(`Invalid --cast value "${entry}". Expected name=voiceId`);
    }
    return { name, voiceId };
  });
}

export function bookIdFromSource(source: string): string {
  const slug = path
    .basename(source, path.extname(source))
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'book';
}

function dryRunSummary(
  chapters: Chapter[],
  config: AppConfig,
  base: Pick<GenerationSummary, 'bookId' | 'backend' | 'outputDir' | 'source'>
): GenerationSummary {
  const detector = new CharacterDetector();
  const characters = new Map<string, { key: string; displayName: string }>();

  const summary: GenerationSummary = {
    success: true,
    ...base,
    chapters: [],
    characters: [],
    totalChapters: chapters.length
  };

  chapters.forEach((chapter, i) => {
    const segments = segmentText(chapter.content, { maxSegmentChars: config.maxSegmentChars }).toArray();
    for (const character of detector.detectHeuristic(segments)) {
      if (!characters.has(character.key)) {
        characters.set(character.key, { key: character.key, displayName: character.displayName });
      }
    }
    summary.chapters.push({ index: i, title: chapter.title, segments: segments.length });
  });

  summary.characters = [...characters.values()];
  return summary;
}

function describeState(state: PipelineState): string {
  if (state.status === 'synthesizing') return `synthesizing ${state.completed}/${state.total}`;
  return state.status;
}

export async function generateCommand(
  input: string,
  options: GenerateCommandOptions,
  deps: CommandDeps = {}
): Promise<void> {
  const isJsonMode = options.format === 'json';
  const spinner = isJsonMode ? null : ora('Initializing...').start();
  let backendKind: BackendKind | undefined;

  try {
    const config = deps.config ?? loadConfig();
    backendKind = options.backend ? parseBackendKind(options.backend) : config.backend;
    const segmentConcurrency = parsePositiveInt(
      options.segmentConcurrency,
      '--segment-concurrency',
      config.segmentConcurrency
    );
    const cast = parseCastEntries(options.cast ?? []);

    if (spinner) spinner.text = 'Parsing input...';
    const result = await parseInput(input);
    const bookId = options.bookId || bookIdFromSource(result.source);

    if (spinner) spinner.succeed(`Found ${result.chapters.length} chapters in ${result.type.toUpperCase()}`);

    if (options.dryRun) {
      const summary = dryRunSummary(result.chapters, config, {
        bookId,
        backend: backendKind,
        outputDir: options.output,
        source: result.source
      });

      if (isJsonMode) {
        console.log(JSON.stringify(summary, null, 2));
      } else {
        console.log('\nDry run - no audio generated\n');
        console.log('Chapters detected:');
        summary.chapters.forEach(ch => {
          console.log(`  ${ch.index + 1}. ${ch.title} (${ch.segments} segments)`);
        });
        console.log(`\nSpeakers: ${summary.characters.map(c => c.displayName).join(', ')}`);
      }
      return;
    }

    const backend = deps.backend ?? createBackend(config, backendKind);
    if (spinner) spinner.start(`Checking ${backend.kind} backend...`);
    await backend.checkAvailability();

    const outputDir = await ensureOutputDir(options.output);

    const useLlm = options.llm !== false && config.llm.enabled;
    let extractor: CharacterExtractor | null = null;
    if (useLlm) {
      extractor =
        deps.extractor !== undefined
          ? deps.extractor
          : new OllamaClient({ baseUrl: config.llm.baseUrl, model: config.llm.model, timeoutMs: config.llm.timeoutMs });
    }

    const pipeline = new SynthesisPipeline({
      backend,
      store: new FileBookStateStore(stateDirFor(outputDir)),
      detector: new CharacterDetector({
        extractor,
        segmenter: { maxSegmentChars: config.maxSegmentChars }
      }),
      segmenter: { maxSegmentChars: config.maxSegmentChars },
      segmentConcurrency,
      chapterConcurrency: config.chapterConcurrency,
      pauseMs: config.audio.pauseMs,
      speed: config.audio.speed
    });

    if (options.resetVoices) {
      await pipeline.resetVoices(bookId);
    }
    for (const { name, voiceId } of cast) {
      await pipeline.setCharacterVoice(bookId, name, voiceId);
    }

    const summary: GenerationSummary = {
      success: true,
      bookId,
      backend: backend.kind,
      chapters: [],
      characters: [],
      totalChapters: result.chapters.length,
      outputDir,
      source: result.source
    };

    const total = result.chapters.length;
    let finished = 0;
    const progress = (detail?: string) => {
      if (spinner) spinner.text = `Generating ${total} chapters (${finished}/${total})${detail ? ` - ${detail}` : ''}`;
    };
    const unsubscribe = pipeline.onStateChange((key, state) => {
      progress(`${key}: ${describeState(state)}`);
    });

    if (spinner) spinner.start();
    progress();

    const tasks = result.chapters.map(async (chapter, i) => {
      const label = `${i + 1}/${total}`;
      try {
        const generated = await pipeline.generate({ bookId, chapterId: chapter.id, text: chapter.content });
        const filePath = await saveWavFile(generated.audio, i, total, outputDir);

        summary.chapters.push({
          index: i,
          title: chapter.title,
          segments: generated.segments.length,
          durationSeconds: Math.round(generated.audio.durationSeconds * 100) / 100,
          filePath
        });
        finished++;
        progress();
        if (!isJsonMode) console.log(`  ✓ Chapter ${label}: ${chapter.title} → ${filePath}`);
      } catch (error) {
        summary.success = false;
        summary.chapters.push({
          index: i,
          title: chapter.title,
          segments: 0,
          error: errorMessage(error),
          code: error instanceof ChapterGenerationError ? error.code : 'INTERNAL_ERROR'
        });
        finished++;
        progress();
        if (!isJsonMode) console.log(`  ✗ Chapter ${label}: ${chapter.title} - ${errorMessage(error)}`);
      }
    });

    await Promise.all(tasks);
    unsubscribe();
    if (spinner) spinner.stop();

    summary.chapters.sort((a, b) => a.index - b.index);
    const state = await pipeline.loadBookState(bookId);
    summary.characters = Object.values(state?.characters ?? {}).map(record => ({
      key: record.key,
      displayName: record.displayName,
      voiceId: record.voice.voiceId
    }));

    const failed = summary.chapters.filter(ch => ch.error);

    if (isJsonMode) {
      console.log(JSON.stringify(summary, null, 2));
    } else if (failed.length === 0) {
      console.log(`\n✓ Generated all ${total} chapters in ${outputDir}`);
      console.log('Cast:');
      summary.characters.forEach(c => console.log(`  ${c.displayName}: ${c.voiceId}`));
    } else {
      console.log(`\n⚠ Generated ${total - failed.length}/${total} chapters`);
      console.log('Failed chapters:', failed.map(f => f.title).join(', '));
    }

    if (failed.length > 0) process.exitCode = 1;
  } catch (error) {
    if (spinner) spinner.fail('Generation failed');
    const errorMsg = errorMessage(error);

    if (isJsonMode) {
      const errorResult = {
        success: false,
        error: errorMsg,
        backend: backendKind,
        chapters: [],
        totalChapters: 0,
        outputDir: options.output,
        source: input
      };
      console.log(JSON.stringify(errorResult, null, 2));
    } else {
      console.error(`\nError: ${errorMsg}`);
    }
    process.exit(1);
  }
}
