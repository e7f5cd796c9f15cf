import type { DetectedCharacter, DetectionResult, DetectionSource, Gender, Segment } from '../types';
import type { CharacterExtractor } from '../services/llm-client';
import { DetectionTimeout, errorMessage } from '../errors';
import { segmentText, type SegmenterOptions } from '../segmenter';
import { NARRATOR_DISPLAY_NAME, NARRATOR_KEY, canonicalKey, displayNameFor } from './canonical';

export const DEFAULT_EXCERPT_CHARS = 8000;

export interface CharacterDetectorOptions {
  /** LLM tier; leave out to run the heuristic tier alone. */
  extractor?: CharacterExtractor | null;
  excerptChars?: number;
  segmenter?: SegmenterOptions;
}

class Roster {
  private readonly entries = new Map<string, DetectedCharacter>();

  constructor() {
    this.entries.set(NARRATOR_KEY, {
      key: NARRATOR_KEY,
      displayName: NARRATOR_DISPLAY_NAME,
      sources: ['heuristic']
    });
  }

  add(name: string, source: DetectionSource, gender?: Gender): void {
    const key = canonicalKey(name);
    if (key.length === 0) return;

    const existing = this.entries.get(key);
    if (existing) {
      if (!existing.sources.includes(source)) existing.sources.push(source);
      if (gender && gender !== 'unknown' && !existing.gender) existing.gender = gender;
      return;
    }

    const entry: DetectedCharacter = { key, displayName: displayNameFor(name), sources: [source] };
    if (gender && gender !== 'unknown') entry.gender = gender;
    this.entries.set(key, entry);
  }

  list(): DetectedCharacter[] {
    return [...this.entries.values()];
  }
}

/**
 * Finds the speaking characters of a chapter. Attributions found by the segmenter are the
 * heuristic tier and always run; an optional LLM tier can only add roster entries and
 * gender hints. Every spelling of the narrator lands on the single "narrator" key.
 */
export class CharacterDetector {
  private readonly extractor: CharacterExtractor | null;
  private readonly excerptChars: number;

  constructor(private readonly options: CharacterDetectorOptions = {}) {
    this.extractor = options.extractor ?? null;
    this.excerptChars = options.excerptChars ?? DEFAULT_EXCERPT_CHARS;
  }

  get llmEnabled(): boolean {
    return this.extractor !== null;
  }

  /** Heuristic tier: every distinct attributed name becomes a candidate. */
  detectHeuristic(segments: Iterable<Segment>): DetectedCharacter[] {
    return this.heuristicRoster(segments).list();
  }

  async detect(text: string, segments?: Iterable<Segment>): Promise<DetectionResult> {
    const roster = this.heuristicRoster(segments ?? segmentText(text, this.options.segmenter));

    if (!this.extractor) {
      return { characters: roster.list(), tier: 'heuristic' };
    }

    try {
      const found = await this.extractor.extractCharacters(this.excerpt(text));
      if (found.length === 0) {
        console.warn('LLM returned no recognisable character list, using heuristic detection only');
        return { characters: roster.list(), tier: 'heuristic', llmError: 'empty or malformed response' };
      }

      for (const character of found) {
        roster.add(character.name, 'llm', character.gender);
      }
      return { characters: roster.list(), tier: 'llm+heuristic' };
    } catch (error) {
      if (!(error instanceof DetectionTimeout)) {
        console.warn(`LLM character detection failed unexpectedly: ${errorMessage(error)}`);
      } else {
        console.warn(`LLM character detection unavailable (${error.reason}), using heuristic detection only`);
      }
      return { characters: roster.list(), tier: 'heuristic', llmError: errorMessage(error) };
    }
  }

  private heuristicRoster(segments: Iterable<Segment>): Roster {
    const roster = new Roster();
    for (const segment of segments) {
      if (segment.attribution) roster.add(segment.attribution.name, 'heuristic');
    }
    return roster;
  }

  private excerpt(text: string): string {
    if (text.length <= this.excerptChars) return text;

    const cut = text.lastIndexOf(' ', this.excerptChars);
    return text.slice(0, cut > 0 ? cut : this.excerptChars);
  }
}
