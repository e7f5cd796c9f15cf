import * as path from 'path';
import { createHash } from 'crypto';
import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import type { BookVoiceState } from '../types';

/** Where a book's voice table lives between runs. */
export interface BookStateStore {
  load(bookId: string): Promise<BookVoiceState | null>;
  save(state: BookVoiceState): Promise<void>;
  clear(bookId: string): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isValidVoice(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value.voiceId === 'string' &&
    typeof value.backend === 'string' &&
    typeof value.backendVoiceName === 'string' &&
    typeof value.language === 'string'
  );
}

function isValidCharacter(value: unknown): boolean {
  return (
    isRecord(value) &&
    typeof value.key === 'string' &&
    typeof value.displayName === 'string' &&
    isValidVoice(value.voice)
  );
}

function isValidDetection(value: unknown): boolean {
  if (!isRecord(value)) return false;
  if (typeof value.textHash !== 'string' || typeof value.detectedAt !== 'string') return false;
  if (value.tier !== 'heuristic' && value.tier !== 'llm+heuristic') return false;

  return (
    Array.isArray(value.characters) &&
    value.characters.every(
      (c: unknown) =>
        isRecord(c) && typeof c.key === 'string' && typeof c.displayName === 'string' && isStringArray(c.sources)
    )
  );
}

export function isValidState(state: unknown): state is BookVoiceState {
  if (!isRecord(state)) return false;

  if (
    typeof state.bookId !== 'string' ||
    typeof state.updatedAt !== 'string' ||
    !isRecord(state.characters) ||
    !isRecord(state.detections)
  ) {
    return false;
  }

  return (
    Object.values(state.characters).every(isValidCharacter) &&
    Object.values(state.detections).every(isValidDetection)
  );
}

/** File-system safe name for a book id; ids that needed changing get a hash suffix so they stay distinct. */
export function stateFileName(bookId: string): string {
  const slug = bookId.replace(/[^\w.-]+/g, '_').replace(/^\.+/, '_');
  if (slug === bookId && slug.length > 0) {
    return `${slug}.voices.json`;
  }
  const hash = createHash('sha256').update(bookId).digest('hex').slice(0, 8);
  return `${slug}-${hash}.voices.json`;
}

export class FileBookStateStore implements BookStateStore {
  constructor(private readonly dir: string) {}

  private getStatePath(bookId: string): string {
    return path.join(path.resolve(this.dir), stateFileName(bookId));
  }

  async save(state: BookVoiceState): Promise<void> {
    const statePath = this.getStatePath(state.bookId);
    await mkdir(path.dirname(statePath), { recursive: true });

    const tmpPath = `${statePath}.tmp`;
    await writeFile(tmpPath, JSON.stringify(state, null, 2), 'utf-8');
    await rename(tmpPath, statePath);
  }

  async load(bookId: string): Promise<BookVoiceState | null> {
    const statePath = this.getStatePath(bookId);

    let raw: string;
    try {
      raw = await readFile(statePath, 'utf-8');
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) return null;
      throw error;
    }

    let state: unknown;
    try {
      state = JSON.parse(raw);
    } catch {
      console.warn(`Failed to parse voice table ${statePath}, ignoring`);
      return null;
    }

    if (!isValidState(state) || state.bookId !== bookId) {
      console.warn(`Invalid voice table ${statePath}, ignoring`);
      return null;
    }

    return state;
  }

  async clear(bookId: string): Promise<void> {
    try {
      await unlink(this.getStatePath(bookId));
    } catch (error) {
      if (!isErrnoCode(error, 'ENOENT')) throw error;
    }
  }
}

export class MemoryBookStateStore implements BookStateStore {
  private states = new Map<string, BookVoiceState>();

  async load(bookId: string): Promise<BookVoiceState | null> {
    const state = this.states.get(bookId);
    return state ? structuredClone(state) : null;
  }

  async save(state: BookVoiceState): Promise<void> {
    this.states.set(state.bookId, structuredClone(state));
  }

  async clear(bookId: string): Promise<void> {
    this.states.delete(bookId);
  }
}
