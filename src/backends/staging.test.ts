import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as path from 'path';
import { tmpdir } from 'os';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { readEngineOutput, withStagingFiles } from './staging';
import { SynthesisError } from '../errors';
import { encodeWav } from '../audio/wav';
import { toneClip } from '../testing/fixtures';

describe('withStagingFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'staging-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes the text to an input file distinct from the output file', async () => {
    const seen = await withStagingFiles('Hello there.', { outputExtension: '.wav', root }, async files => {
      return {
        input: await readFile(files.inputPath, 'utf-8'),
        inputExt: path.extname(files.inputPath),
        outputExt: path.extname(files.outputPath),
        scratchDir: path.dirname(files.scratch('speech.aiff')),
        dir: files.dir
      };
    });

    expect(seen.input).toBe('Hello there.');
    expect(seen.inputExt).toBe('.txt');
    expect(seen.outputExt).toBe('.wav');
    expect(seen.scratchDir).toBe(seen.dir);
    expect(await readdir(root)).toEqual([]);
  });

  it('removes the directory when the callback throws', async () => {
    await expect(
      withStagingFiles('text', { outputExtension: '.wav', root }, async () => {
        throw new Error('engine exploded');
      })
    ).rejects.toThrow('engine exploded');

    expect(await readdir(root)).toEqual([]);
  });
});

describe('readEngineOutput', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'engine-output-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('decodes the WAV the engine wrote', async () => {
    const clip = toneClip(4, 9);
    const outputPath = path.join(dir, 'output.wav');
    await writeFile(outputPath, encodeWav(clip));

    expect(await readEngineOutput('kokoro_tts', outputPath)).toEqual(clip);
  });

  it('reports a missing file as invalid output', async () => {
    const error = await readEngineOutput('kokoro_tts', path.join(dir, 'output.wav')).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({ reason: 'INVALID_OUTPUT', message: 'kokoro_tts did not write output.wav' });
  });

  it('reports undecodable audio as invalid output', async () => {
    const outputPath = path.join(dir, 'output.wav');
    await writeFile(outputPath, 'definitely not audio');

    const error = await readEngineOutput('afconvert', outputPath).catch((reason: unknown) => reason);

    expect(error).toMatchObject({
      reason: 'INVALID_OUTPUT',
      message: 'afconvert wrote unusable audio: not a RIFF/WAVE file'
    });
  });
});
