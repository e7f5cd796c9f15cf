import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as path from 'path';
import { tmpdir } from 'os';
import { access, mkdtemp, rm, writeFile } from 'fs/promises';
import { bookIdFromSource, generateCommand, parseCastEntries, parsePositiveInt } from './generate';
import { loadConfig } from '../config';
import { ConfigurationError } from '../errors';
import { FakeBackend } from '../testing/fixtures';

const CHAPTER = 'Chapter 1\nAlice said, "Hello there." Bob whispered, "Is anyone home?"\n';

function lastJson(log: { mock: { calls: unknown[][] } }): unknown {
  const calls = log.mock.calls;
  return JSON.parse(String(calls[calls.length - 1]?.[0]));
}

describe('generateCommand', () => {
  let dir: string;
  let input: string;
  let output: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'generate-test-'));
    input = path.join(dir, 'The Book.txt');
    output = path.join(dir, 'out');
    await writeFile(input, CHAPTER);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(dir, { recursive: true, force: true });
  });

  it('previews chapters and speakers on a dry run', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    await generateCommand(input, { output, format: 'json', dryRun: true }, { config: loadConfig({}) });

    expect(lastJson(log)).toEqual({
      success: true,
      bookId: 'the-book',
      backend: 'kokoro',
      outputDir: output,
      source: 'The Book.txt',
      chapters: [{ index: 0, title: 'Chapter 1', segments: 4 }],
      characters: [
        { key: 'narrator', displayName: 'Narrator' },
        { key: 'alice', displayName: 'Alice' },
        { key: 'bob', displayName: 'Bob' }
      ],
      totalChapters: 1
    });
    await expect(access(output)).rejects.toThrow();
  });

  it('prints a readable dry-run preview', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    await generateCommand(input, { output, format: 'text', dryRun: true }, { config: loadConfig({}) });

    expect(log).toHaveBeenCalledWith('  1. Chapter 1 (4 segments)');
    expect(log).toHaveBeenCalledWith('\nSpeakers: Narrator, Alice, Bob');
  });

  it('generates chapter files and remembers the cast', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const backend = new FakeBackend();

    await generateCommand(
      input,
      { output, format: 'json', cast: ['Bob=bf_emma'] },
      { config: loadConfig({}), backend, extractor: null }
    );

    const filePath = path.join(output, '01.wav');
    expect(lastJson(log)).toEqual({
      success: true,
      bookId: 'the-book',
      backend: 'kokoro',
      outputDir: output,
      source: 'The Book.txt',
      chapters: [{ index: 0, title: 'Chapter 1', segments: 4, durationSeconds: 1.42, filePath }],
      characters: [
        { key: 'bob', displayName: 'Bob', voiceId: 'bf_emma' },
        { key: 'narrator', displayName: 'Narrator', voiceId: 'af_sky' },
        { key: 'alice', displayName: 'Alice', voiceId: 'af_bella' }
      ],
      totalChapters: 1
    });
    await expect(access(filePath)).resolves.toBeUndefined();
    await expect(access(path.join(output, '.storyvoice', 'the-book.voices.json'))).resolves.toBeUndefined();
    expect(process.exitCode).toBeUndefined();
  });

  it('reports failed chapters and sets a failing exit code', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const backend = new FakeBackend();
    backend.failures.set('Hello there.', 2);

    await generateCommand(input, { output, format: 'json' }, { config: loadConfig({}), backend, extractor: null });

    expect(lastJson(log)).toMatchObject({
      success: false,
      chapters: [
        {
          index: 0,
          title: 'Chapter 1',
          segments: 0,
          code: 'SYNTHESIS_ERROR',
          error: 'Chapter the-book:chapter-01 failed while synthesizing: engine crashed on "Hello there."'
        }
      ]
    });
    expect(process.exitCode).toBe(1);
  });

  it('exits once before any chapter when the backend is not ready', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });
    const backend = new FakeBackend();
    backend.unavailable = new ConfigurationError('engine offline');

    await expect(
      generateCommand(input, { output, format: 'json' }, { config: loadConfig({}), backend, extractor: null })
    ).rejects.toThrow('process.exit');

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
    expect(lastJson(log)).toEqual({
      success: false,
      error: 'engine offline',
      backend: 'kokoro',
      chapters: [],
      totalChapters: 0,
      outputDir: output,
      source: input
    });
    expect(backend.calls).toEqual([]);
    await expect(access(output)).rejects.toThrow();
  });

  it('exits with an error for invalid options', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(
      generateCommand(input, { output, format: 'json', cast: ['nobody'] }, { config: loadConfig({}) })
    ).rejects.toThrow('process.exit');

    expect(exit).toHaveBeenCalledWith(1);
    expect(lastJson(log)).toMatchObject({
      success: false,
      error: 'Invalid --cast value "nobody". Expected name=voiceId'
    });
  });
});

describe('parseCastEntries', () => {
  it('splits at the last equals sign', () => {
    expect(parseCastEntries(['Mary Jane=af_bella', 'a=b=am_adam'])).toEqual([
      { name: 'Mary Jane', voiceId: 'af_bella' },
      { name: 'a=b', voiceId: 'am_adam' }
    ]);
  });

  it('rejects entries without a name or voice', () => {
    expect(() => parseCastEntries(['=af_bella'])).toThrow('Invalid --cast value "=af_bella". Expected name=voiceId');
    expect(() => parseCastEntries(['Alice='])).toThrow('Invalid --cast value "Alice="');
  });
});

describe('bookIdFromSource', () => {
  it('slugs the file name', () => {
    expect(bookIdFromSource('My Great Book!.txt')).toBe('my-great-book');
    expect(bookIdFromSource('???.txt')).toBe('book');
  });
});

describe('parsePositiveInt', () => {
  it('uses the fallback when unset and clamps invalid values', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(parsePositiveInt(undefined, '--segment-concurrency', 4)).toBe(4);
    expect(parsePositiveInt('8', '--segment-concurrency', 4)).toBe(8);
    expect(parsePositiveInt('0', '--segment-concurrency', 4)).toBe(1);
  });
});
