import PQueue from 'p-queue';
import { createHash } from 'crypto';
import { availableParallelism } from 'os';
import type {
  AudioClip,
  BookVoiceState,
  ChapterGenerationResult,
  ChapterRequest,
  CharacterRecord,
  DetectionResult,
  PipelineState,
  PipelineStatus,
  ResolvedSegment,
  Segment,
  VoiceMap
} from '../types';
import type { TTSBackend } from '../backends/backend';
import type { BookStateStore } from '../services/book-state-store';
import { CharacterDetector } from '../characters/detector';
import { NARRATOR_KEY, NARRATOR_REF } from '../characters/canonical';
import { concatenateClips } from '../audio/concatenator';
import { segmentText, type SegmenterOptions } from '../segmenter';
import { KeyedMutex } from '../services/keyed-mutex';
import { SynthesisQueue } from '../services/synthesis-queue';
import { VoiceAssigner, createBookState, speakerKeyFor } from '../voices/voice-assigner';
import {
  CancelledError,
  ChapterGenerationError,
  FormatError,
  SynthesisError,
  errorMessage,
  toFailureReason
} from '../errors';

export interface SynthesisPipelineOptions {
  backend: TTSBackend;
  store: BookStateStore;
  /** Defaults to heuristic-only detection. */
  detector?: CharacterDetector;
  assigner?: VoiceAssigner;
  segmenter?: SegmenterOptions;
  segmentConcurrency?: number;
  chapterConcurrency?: number;
  pauseMs?: number;
  speed?: number;
  retryDelayMs?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export type StateListener = (chapterKey: string, state: PipelineState) => void;

const TRANSITIONS: Record<PipelineStatus, readonly PipelineStatus[]> = {
  pending: ['segmenting'],
  segmenting: ['detecting', 'assigning'],
  detecting: ['assigning'],
  assigning: ['synthesizing'],
  synthesizing: ['synthesizing', 'concatenating'],
  concatenating: ['ready'],
  ready: [],
  failed: []
};

export function chapterKeyFor(request: Pick<ChapterRequest, 'bookId' | 'chapterId'>): string {
  return `${request.bookId}:${request.chapterId}`;
}

export function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

interface InFlightRun {
  promise: Promise<ChapterGenerationResult>;
  controller: AbortController;
}

/**
 * Turns chapter text into one chapter-level audio track. Runs are keyed by
 * `bookId:chapterId`; a second request for a chapter that is still running joins
 * the first. Chapter runs share a bounded worker queue, and segment renders share
 * one synthesis queue across every chapter.
 */
export class SynthesisPipeline {
  private readonly backend: TTSBackend;
  private readonly store: BookStateStore;
  private readonly detector: CharacterDetector;
  private readonly assigner: VoiceAssigner;
  private readonly workers: PQueue;
  private readonly synthesis: SynthesisQueue;
  private readonly locks = new KeyedMutex();
  private readonly inFlight = new Map<string, InFlightRun>();
  private readonly states = new Map<string, PipelineState>();
  private readonly listeners = new Set<StateListener>();

  constructor(private readonly options: SynthesisPipelineOptions) {
    this.backend = options.backend;
    this.store = options.store;
    this.detector = options.detector ?? new CharacterDetector({ segmenter: options.segmenter });
    this.assigner = options.assigner ?? new VoiceAssigner();
    this.workers = new PQueue({ concurrency: options.chapterConcurrency ?? availableParallelism() });
    this.synthesis = new SynthesisQueue({
      concurrency: options.segmentConcurrency ?? 4,
      requestsPerSecond: options.backend.maxRequestsPerSecond,
      maxRetries: 1,
      retryDelayMs: options.retryDelayMs
    });
  }

  generate(request: ChapterRequest, options: RunOptions = {}): Promise<ChapterGenerationResult> {
    const key = chapterKeyFor(request);
    const existing = this.inFlight.get(key);
    if (existing) return existing.promise;

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onAbort, { once: true });
    }

    this.setState(key, { status: 'pending' });

    const promise = this.workers
      .add(() => this.run(key, request, controller.signal), { throwOnTimeout: true })
      .finally(() => {
        options.signal?.removeEventListener('abort', onAbort);
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, { promise, controller });
    return promise;
  }

  /** Returns false when no run for the chapter is in flight. */
  cancel(chapterKey: string): boolean {
    const run = this.inFlight.get(chapterKey);
    if (!run) return false;
    run.controller.abort();
    return true;
  }

  getState(chapterKey: string): PipelineState | undefined {
    return this.states.get(chapterKey);
  }

  isInFlight(chapterKey: string): boolean {
    return this.inFlight.has(chapterKey);
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Rebinds one character's voice for a book; later runs pick it up. */
  async setCharacterVoice(bookId: string, name: string, voiceId: string): Promise<CharacterRecord> {
    return this.updateBookState(bookId, state =>
      this.assigner.setCharacterVoice(state, name, voiceId, this.backend.catalog())
    );
  }

  async resetVoices(bookId: string): Promise<void> {
    await this.updateBookState(bookId, state => this.assigner.resetVoices(state));
  }

  async loadBookState(bookId: string): Promise<BookVoiceState | null> {
    return this.store.load(bookId);
  }

  private async updateBookState<T>(bookId: string, fn: (state: BookVoiceState) => T): Promise<T> {
    return this.locks.runExclusive(bookId, async () => {
      const state = (await this.store.load(bookId)) ?? createBookState(bookId);
      const result = fn(state);
      await this.store.save(state);
      return result;
    });
  }

  private async run(key: string, request: ChapterRequest, signal: AbortSignal): Promise<ChapterGenerationResult> {
    let current: PipelineStatus = 'pending';
    const enter = (state: PipelineState) => {
      this.transition(key, current, state);
      current = state.status;
    };

    try {
      this.throwIfCancelled(signal);
      await this.backend.checkAvailability();
      this.throwIfCancelled(signal);

      enter({ status: 'segmenting' });
      const segments = segmentText(request.text, this.options.segmenter).toArray();
      if (segments.length === 0) {
        throw new FormatError(`chapter ${request.chapterId} has no speakable text`);
      }
      const textHash = hashText(request.text);

      let detection: ChapterGenerationResult['detection'];
      const cached = (await this.store.load(request.bookId))?.detections[request.chapterId];
      if (cached && cached.textHash === textHash) {
        detection = { characters: cached.characters, tier: cached.tier, cached: true };
      } else {
        enter({ status: 'detecting' });
        detection = { ...(await this.detector.detect(request.text, segments)), cached: false };
      }
      this.throwIfCancelled(signal);

      enter({ status: 'assigning' });
      const { voiceMap, characters } = await this.assignVoices(request, detection, textHash);
      this.throwIfCancelled(signal);

      const resolved = this.resolveSegments(segments, voiceMap, characters);
      const total = resolved.length;
      enter({ status: 'synthesizing', completed: 0, total });

      const clips = await this.renderAll(key, resolved, signal, completed => {
        enter({ status: 'synthesizing', completed, total });
      });
      this.throwIfCancelled(signal);

      enter({ status: 'concatenating' });
      const audio = concatenateClips(key, clips, { pauseMs: this.options.pauseMs });

      enter({ status: 'ready' });
      return { audio, segments: resolved, characters, detection };
    } catch (error) {
      const cancelled = signal.aborted || error instanceof CancelledError;
      const reason = cancelled
        ? { code: 'CANCELLED' as const, message: 'Generation cancelled' }
        : toFailureReason(error);

      this.setState(key, { status: 'failed', reason });
      throw new ChapterGenerationError(key, current, reason, { cause: error });
    }
  }

  private async assignVoices(
    request: ChapterRequest,
    detection: DetectionResult & { cached: boolean },
    textHash: string
  ): Promise<{ voiceMap: VoiceMap; characters: CharacterRecord[] }> {
    return this.updateBookState(request.bookId, state => {
      const voiceMap = this.assigner.assign(state, detection.characters, this.backend.catalog());

      // A run where the LLM tier failed is not cached, so the next run tries it again.
      if (!detection.cached && !detection.llmError) {
        state.detections[request.chapterId] = {
          textHash,
          tier: detection.tier,
          characters: detection.characters,
          detectedAt: new Date().toISOString()
        };
      }

      const characters = [...voiceMap.keys()].flatMap(characterKey => {
        const record = state.characters[characterKey];
        return record ? [record] : [];
      });
      return { voiceMap, characters };
    });
  }

  private resolveSegments(segments: Segment[], voiceMap: VoiceMap, characters: CharacterRecord[]): ResolvedSegment[] {
    const records = new Map(characters.map(record => [record.key, record]));
    const narrator = records.get(NARRATOR_KEY);
    if (!narrator) {
      throw new Error('Voice assignment produced no narrator');
    }

    return segments.map(segment => {
      const record = records.get(speakerKeyFor(segment)) ?? narrator;
      return {
        ...segment,
        speaker: record.key === NARRATOR_KEY ? NARRATOR_REF : { key: record.key, displayName: record.displayName },
        voice: voiceMap.get(record.key) ?? narrator.voice
      };
    });
  }

  private async renderAll(
    key: string,
    segments: ResolvedSegment[],
    signal: AbortSignal,
    onProgress: (completed: number) => void
  ): Promise<AudioClip[]> {
    let completed = 0;
    let halted = false;

    const tasks = segments.map(segment =>
      this.synthesis
        .execute(async () => {
          if (halted || signal.aborted) {
            throw new CancelledError(`Segment ${segment.index} of ${key} was not started`);
          }

          try {
            return await this.backend.render(segment.text, segment.voice, { speed: this.options.speed });
          } catch (error) {
            if (error instanceof SynthesisError) error.segmentIndex = segment.index;
            throw error;
          }
        })
        .then(
          clip => {
            completed++;
            if (!halted && !signal.aborted) onProgress(completed);
            return clip;
          },
          (error: unknown) => {
            if (!halted && !(error instanceof CancelledError)) {
              console.warn(`Segment ${segment.index} of ${key} failed: ${errorMessage(error)}`);
            }
            halted = true;
            throw error;
          }
        )
    );

    return Promise.all(tasks);
  }

  private transition(key: string, from: PipelineStatus, to: PipelineState): void {
    if (!TRANSITIONS[from].includes(to.status)) {
      throw new Error(`Illegal pipeline transition for ${key}: ${from} -> ${to.status}`);
    }
    this.setState(key, to);
  }

  private setState(key: string, state: PipelineState): void {
    this.states.set(key, state);
    for (const listener of this.listeners) {
      try {
        listener(key, state);
      } catch (error) {
        console.warn(`State listener failed for ${key}: ${errorMessage(error)}`);
      }
    }
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new CancelledError('Generation cancelled');
    }
  }
}
