import type { Attribution, Segment, SegmentKind } from './types';
import { NARRATOR_DISPLAY_NAME, canonicalKey, cleanName } from './characters/canonical';

export const DEFAULT_MAX_SEGMENT_CHARS = 5000;

export interface SegmenterOptions {
  /** Longest run handed to a backend in one call; longer runs are split at paragraph or sentence breaks. */
  maxSegmentChars?: number;
}

export const SPEECH_VERBS = [
  'said', 'says', 'asked', 'asks', 'replied', 'replies', 'whispered', 'whispers',
  'shouted', 'shouts', 'called', 'murmured', 'muttered', 'yelled', 'answered',
  'sighed', 'hissed', 'growled', 'declared', 'demanded', 'insisted', 'suggested',
  'continued', 'added', 'agreed', 'warned', 'pleaded', 'begged', 'barked',
  'ordered', 'screamed', 'announced', 'cried', 'exclaimed', 'snapped', 'retorted',
  'interrupted', 'protested', 'remarked', 'explained', 'stammered', 'stuttered',
  'sobbed', 'roared', 'sneered', 'repeated', 'laughed', 'breathed', 'told'
] as const;

const HONORIFIC = '(?:Mr|Mrs|Ms|Miss|Dr|Prof|Professor|Captain|Lady|Lord|Sir|Aunt|Uncle)\\.? ';
const WORD = "\\p{Lu}(?:[\\p{L}-]|['’](?=\\p{Lu}))*";
const SPEAKER = `(?:${HONORIFIC})?${WORD}(?: ${WORD})?|he|she|they|we`;
const VERBS = SPEECH_VERBS.join('|');
const CONTRACTION = "(?:['’](?:d|s|ll))?";
const FILLER = '(?:(?:had|has|then|now|\\p{Ll}+ly) )?';

const NAME_FIRST = new RegExp(
  `(?<![\\p{L}'’])(${SPEAKER})${CONTRACTION} ${FILLER}(${VERBS})(?!\\p{L})`,
  'gu'
);
const VERB_FIRST = new RegExp(`(?<!\\p{L})(${VERBS}) (${SPEAKER})(?!\\p{L})`, 'gu');

const QUOTE_PATTERN = /"([^"]*)"|“([^”]*)”/g;
const SENTENCE_BREAK = /(?<!\b(?:Mr|Mrs|Ms|Dr|St|Prof)\.)(?<=[.!?])\s+/;
const SPEAKABLE = /[\p{L}\p{N}]/u;

const PRONOUNS = new Set(['he', 'she', 'they', 'we', 'i']);
const FIRST_PERSON = new Set(['i', 'we']);

// Capitalised words that open a clause but never name a speaker.
const CONNECTIVES = new Set([
  'Then', 'And', 'But', 'So', 'When', 'While', 'As', 'Finally', 'Suddenly', 'Later',
  'Now', 'Still', 'Yet', 'Again', 'Instead', 'Meanwhile', 'Once', 'After', 'Before',
  'Because', 'If', 'Though', 'Although', 'Well', 'Oh', 'Yes', 'No', 'At', 'Eventually'
]);
const NOT_SPEAKERS = new Set([
  'The', 'A', 'An', 'It', 'This', 'That', 'There', 'Here', 'You', 'Everyone', 'Someone',
  'Somebody', 'Everybody', 'Nobody', 'Anyone', 'One', 'Who', 'What', 'Nothing'
]);

export interface AttributionMatch {
  name: string;
  verb: string;
  pronoun: boolean;
  /** Offset of the match inside the whitespace-normalised clause. */
  index: number;
}

export type ClausePosition = 'before' | 'after';

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ');
}

export function splitSentences(text: string): string[] {
  return text.split(SENTENCE_BREAK).filter(sentence => sentence.length > 0);
}

function interpretSpeaker(raw: string): { name: string; pronoun: boolean } | null {
  const words = raw.split(' ');
  while (words.length > 0 && CONNECTIVES.has(words[0] ?? '')) {
    words.shift();
  }

  const first = words[0];
  if (first === undefined || NOT_SPEAKERS.has(first)) return null;

  if (words.length === 1 && PRONOUNS.has(first.toLowerCase())) {
    return { name: first.toLowerCase(), pronoun: true };
  }

  return { name: words.join(' '), pronoun: false };
}

function attributionMatches(clause: string): AttributionMatch[] {
  const matches: AttributionMatch[] = [];

  for (const match of clause.matchAll(NAME_FIRST)) {
    const speaker = interpretSpeaker(match[1] ?? '');
    if (speaker && match[2]) {
      matches.push({ ...speaker, verb: match[2], index: match.index ?? 0 });
    }
  }

  for (const match of clause.matchAll(VERB_FIRST)) {
    const speaker = interpretSpeaker(match[2] ?? '');
    if (speaker && match[1]) {
      matches.push({ ...speaker, verb: match[1], index: match.index ?? 0 });
    }
  }

  return matches.sort((a, b) => a.index - b.index);
}

/**
 * Finds a `<name> <speech-verb>` or `<speech-verb> <name>` attribution in a clause.
 * Whitespace runs are collapsed first; `'d`, `'s` and `'ll` after a name still end the name.
 * Clauses before a quote prefer their last match, clauses after it their first.
 */
export function findAttribution(clause: string, position: ClausePosition = 'before'): AttributionMatch | null {
  const matches = attributionMatches(normalizeWhitespace(clause));
  const match = position === 'before' ? matches[matches.length - 1] : matches[0];
  return match ?? null;
}

interface QuoteAttribution {
  match: AttributionMatch;
  from: ClausePosition;
}

function isSameMatch(a: AttributionMatch, b: AttributionMatch): boolean {
  return a.name === b.name && a.verb === b.verb;
}

/**
 * `consumed` is the match a clause after the previous quote already used. When the
 * clause before this quote is that same clause, the clause after this quote wins.
 */
function attributeQuote(before: string, after: string, consumed: AttributionMatch | null): QuoteAttribution | null {
  const preceding = splitSentences(normalizeWhitespace(before).trim());
  const following = splitSentences(normalizeWhitespace(after).trim());

  const adjacentBefore = findAttribution(preceding[preceding.length - 1] ?? '', 'before');
  const adjacentAfter = findAttribution(following[0] ?? '', 'after');

  if (adjacentBefore && adjacentAfter && consumed && isSameMatch(adjacentBefore, consumed)) {
    return { match: adjacentAfter, from: 'after' };
  }
  if (adjacentBefore) return { match: adjacentBefore, from: 'before' };
  if (adjacentAfter) return { match: adjacentAfter, from: 'after' };

  const windowBefore = findAttribution(preceding.slice(-2).join(' '), 'before');
  if (windowBefore) return { match: windowBefore, from: 'before' };

  const windowAfter = findAttribution(following.slice(0, 2).join(' '), 'after');
  return windowAfter ? { match: windowAfter, from: 'after' } : null;
}

interface Range {
  start: number;
  end: number;
}

function trimRange(text: string, start: number, end: number): Range | null {
  while (start < end && /\s/.test(text.charAt(start))) start++;
  while (end > start && /\s/.test(text.charAt(end - 1))) end--;
  return SPEAKABLE.test(text.slice(start, end)) ? { start, end } : null;
}

/**
 * Splits a range into pieces no longer than maxChars, preferring paragraph breaks,
 * then sentence breaks, then spaces, so a piece ends near the limit.
 */
export function splitRange(text: string, start: number, end: number, maxChars: number): Range[] {
  const ranges: Range[] = [];
  let cursor = start;

  while (cursor < end) {
    let cut = Math.min(cursor + maxChars, end);

    if (cut < end) {
      const slice = text.substring(cursor, cut);
      const paragraphEnd = slice.lastIndexOf('\n\n');

      let sentenceEnd = -1;
      const sentencePattern = /[.!?]["”]?\s/g;
      let match: RegExpExecArray | null;
      while ((match = sentencePattern.exec(slice)) !== null) {
        sentenceEnd = match.index + match[0].length - 1;
      }

      const spaceEnd = slice.lastIndexOf(' ');
      const half = maxChars / 2;

      if (paragraphEnd > half) {
        cut = cursor + paragraphEnd;
      } else if (sentenceEnd > half) {
        cut = cursor + sentenceEnd;
      } else if (spaceEnd > 0) {
        cut = cursor + spaceEnd;
      }
    }

    const piece = trimRange(text, cursor, cut);
    if (piece) ranges.push(piece);
    cursor = cut;
  }

  return ranges;
}

function* iterateSegments(text: string, options: SegmenterOptions): Generator<Segment, void, undefined> {
  const maxChars = Math.max(1, options.maxSegmentChars ?? DEFAULT_MAX_SEGMENT_CHARS);
  const quotes = [...text.matchAll(QUOTE_PATTERN)];

  let index = 0;
  let cursor = 0;
  let lastDialogueKey: string | null = null;
  let previous: { match: AttributionMatch; from: ClausePosition; name: string | null } | null = null;
  const namedSpeakers: string[] = [];

  function* emit(
    range: Range,
    outer: Range,
    kind: SegmentKind,
    attribution: Attribution | null
  ): Generator<Segment, void, undefined> {
    const pieces = splitRange(text, range.start, range.end, maxChars);
    for (let i = 0; i < pieces.length; i++) {
      const piece = pieces[i];
      if (!piece) continue;
      yield {
        index: index++,
        start: i === 0 ? outer.start : piece.start,
        end: i === pieces.length - 1 ? outer.end : piece.end,
        text: text.slice(piece.start, piece.end),
        kind,
        speaker: null,
        attribution
      };
    }
  }

  function* narration(start: number, end: number): Generator<Segment, void, undefined> {
    const range = trimRange(text, start, end);
    if (range) yield* emit(range, range, 'narration', null);
  }

  function resolveSpeaker(match: AttributionMatch): string | null {
    if (!match.pronoun) {
      const name = cleanName(match.name);
      const key = canonicalKey(name);
      const seen = namedSpeakers.findIndex(existing => canonicalKey(existing) === key);
      if (seen >= 0) namedSpeakers.splice(seen, 1);
      namedSpeakers.push(name);
      return name;
    }

    if (FIRST_PERSON.has(match.name)) return NARRATOR_DISPLAY_NAME;

    for (let i = namedSpeakers.length - 1; i >= 0; i--) {
      const candidate = namedSpeakers[i];
      if (candidate !== undefined && canonicalKey(candidate) !== lastDialogueKey) {
        return candidate;
      }
    }
    return null;
  }

  for (let q = 0; q < quotes.length; q++) {
    const quote = quotes[q];
    if (!quote || quote.index === undefined) continue;

    const quoteStart = quote.index;
    const quoteEnd = quote.index + quote[0].length;
    const nextStart = quotes[q + 1]?.index ?? text.length;

    yield* narration(cursor, quoteStart);

    const consumed = previous?.from === 'after' ? previous.match : null;
    const found = attributeQuote(text.slice(cursor, quoteStart), text.slice(quoteEnd, nextStart), consumed);
    let name: string | null = null;

    if (found) {
      // A clause between two quotes that attributed the earlier one names the same speaker.
      const sharedClause: boolean =
        previous !== null &&
        previous.from === 'after' &&
        found.from === 'before' &&
        isSameMatch(previous.match, found.match);

      name = sharedClause && previous ? previous.name : resolveSpeaker(found.match);
      previous = { ...found, name };
    } else {
      previous = null;
    }

    const inner = trimRange(text, quoteStart + 1, quoteEnd - 1);
    if (inner) {
      const outer = { start: quoteStart, end: quoteEnd };
      if (name !== null && found) {
        const attribution: Attribution = {
          name,
          verb: found.match.verb,
          via: found.match.pronoun ? 'pronoun' : 'name'
        };
        lastDialogueKey = canonicalKey(name);
        yield* emit(inner, outer, 'dialogue', attribution);
      } else {
        yield* emit(inner, outer, 'narration', null);
      }
    }

    cursor = quoteEnd;
  }

  yield* narration(cursor, text.length);
}

/** Lazy, restartable segment sequence: every iteration rescans the text from the start. */
export class SegmentSequence implements Iterable<Segment> {
  constructor(
    readonly text: string,
    private readonly options: SegmenterOptions = {}
  ) {}

  [Symbol.iterator](): Iterator<Segment> {
    return iterateSegments(this.text, this.options);
  }

  toArray(): Segment[] {
    return [...this];
  }
}

export function segmentText(text: string, options: SegmenterOptions = {}): SegmentSequence {
  return new SegmentSequence(text, options);
}
