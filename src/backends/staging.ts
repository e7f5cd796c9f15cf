import * as path from 'path';
import { tmpdir } from 'os';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import type { AudioClip } from '../types';
import { FormatError, SynthesisError } from '../errors';
import { decodeWav } from '../audio/wav';

export interface StagingFiles {
  dir: string;
  /** Plain-text file holding the text the engine reads. */
  inputPath: string;
  /** Audio file the engine writes; never the same file or extension as the input. */
  outputPath: string;
  /** Another scratch file in the same directory, for engines that need an intermediate. */
  scratch(fileName: string): string;
}

export interface StagingOptions {
  outputExtension: '.wav' | '.aiff';
  root?: string;
}

/**
 * Stages `text` in a fresh scratch directory for one engine call. The directory and
 * everything in it is removed however `fn` exits.
 */
export async function withStagingFiles<T>(
  text: string,
  options: StagingOptions,
  fn: (files: StagingFiles) => Promise<T>
): Promise<T> {
  const dir = await mkdtemp(path.join(options.root ?? tmpdir(), 'storyvoice-'));

  try {
    const files: StagingFiles = {
      dir,
      inputPath: path.join(dir, 'input.txt'),
      outputPath: path.join(dir, `output${options.outputExtension}`),
      scratch: fileName => path.join(dir, fileName)
    };
    await writeFile(files.inputPath, text, { encoding: 'utf-8' });
    return await fn(files);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Reads and decodes the WAV an engine wrote; anything unreadable is INVALID_OUTPUT. */
export async function readEngineOutput(engine: string, outputPath: string): Promise<AudioClip> {
  let bytes: Buffer;
  try {
    bytes = await readFile(outputPath);
  } catch (error) {
    throw new SynthesisError('INVALID_OUTPUT', `${engine} did not write ${path.basename(outputPath)}`, { cause: error });
  }

  try {
    return decodeWav(bytes);
  } catch (error) {
    if (error instanceof FormatError) {
      throw new SynthesisError('INVALID_OUTPUT', `${engine} wrote unusable audio: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
