import type { Gender } from '../types';
import { DetectionTimeout, errorMessage } from '../errors';
import { withTimeout } from '../utils/timeout';

export interface LlmCharacter {
  name: string;
  gender?: Gender;
}

/** Anything that can turn a passage of prose into a list of speaking characters. */
export interface CharacterExtractor {
  extractCharacters(text: string): Promise<LlmCharacter[]>;
}

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetchFn?: typeof fetch;
}

export function buildCharacterPrompt(text: string): string {
  return `Identify every character who speaks in the following passage from a book.

For each character give:
- name: how the text refers to them
- gender: male, female or unknown

Do not include the narrator. Return ONLY JSON of this shape:
{"characters": [{"name": "Character Name", "gender": "female"}]}

Passage:
${text}

JSON:`;
}

/**
 * Client for an Ollama-compatible `/api/generate` endpoint.
 * Every failure to get an answer in time surfaces as {@link DetectionTimeout}.
 */
export class OllamaClient implements CharacterExtractor {
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: OllamaClientOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async extractCharacters(text: string): Promise<LlmCharacter[]> {
    const raw = await this.generate(buildCharacterPrompt(text));
    return parseCharacterList(raw);
  }

  async generate(prompt: string): Promise<string> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/api/generate`;
    const controller = new AbortController();
    const timeoutMs = this.options.timeoutMs;

    const request = (async () => {
      let response: Response;
      try {
        response = await this.fetchFn(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            model: this.options.model,
            prompt,
            stream: false,
            format: 'json'
          }),
          signal: controller.signal
        });
      } catch (error) {
        if (controller.signal.aborted) {
          throw new DetectionTimeout('timeout', `LLM request exceeded ${timeoutMs}ms`, { cause: error });
        }
        throw new DetectionTimeout('unreachable', `LLM endpoint unreachable: ${errorMessage(error)}`, {
          cause: error
        });
      }

      if (!response.ok) {
        throw new DetectionTimeout('bad-status', `LLM endpoint returned ${response.status} ${response.statusText}`);
      }

      const body: unknown = await response.json();
      if (typeof body === 'object' && body !== null && 'response' in body && typeof body.response === 'string') {
        return body.response;
      }
      return typeof body === 'string' ? body : JSON.stringify(body);
    })();

    // The watchdog covers engines that ignore the abort signal.
    return withTimeout(request, timeoutMs, () => {
      controller.abort();
      return new DetectionTimeout('timeout', `LLM request exceeded ${timeoutMs}ms`);
    });
  }
}

function toGender(value: unknown): Gender | undefined {
  if (typeof value !== 'string') return undefined;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'female' || lowered === 'male' || lowered === 'unknown') return lowered;
  return undefined;
}

function isUsableName(name: string): boolean {
  const trimmed = name.trim();
  return trimmed.length > 0 && trimmed.length <= 60 && /\p{L}/u.test(trimmed);
}

function fromValue(value: unknown): LlmCharacter[] {
  if (Array.isArray(value)) {
    return value.flatMap((item: unknown): LlmCharacter[] => {
      if (typeof item === 'string') return [{ name: item }];
      if (typeof item === 'object' && item !== null && 'name' in item && typeof item.name === 'string') {
        const gender = 'gender' in item ? toGender(item.gender) : undefined;
        return [gender ? { name: item.name, gender } : { name: item.name }];
      }
      return [];
    });
  }

  if (typeof value === 'object' && value !== null) {
    if ('characters' in value) return fromValue(value.characters);

    // {"Alice": {"gender": "female"}, ...}
    return Object.entries(value).map(([name, details]): LlmCharacter => {
      const gender =
        typeof details === 'object' && details !== null && 'gender' in details ? toGender(details.gender) : undefined;
      return gender ? { name, gender } : { name };
    });
  }

  return [];
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function embeddedJson(text: string): unknown {
  const whole = tryJson(text.trim());
  if (whole !== undefined) return whole;

  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start >= 0 && end > start) {
      const parsed = tryJson(text.slice(start, end + 1));
      if (parsed !== undefined) return parsed;
    }
  }
  return undefined;
}

/**
 * Reads a character list out of a model answer. Accepts bare JSON, JSON wrapped in prose,
 * and bulleted or numbered lists; anything else yields an empty list.
 */
export function parseCharacterList(raw: string): LlmCharacter[] {
  const parsed = embeddedJson(raw);
  let characters = parsed === undefined ? [] : fromValue(parsed);

  if (characters.length === 0) {
    characters = raw
      .split('\n')
      .map(line => /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/.exec(line)?.[1])
      .filter((item): item is string => item !== undefined)
      .map(item => {
        const name = item.split(/\s*[:(]|\s+[-–—]\s/)[0] ?? item;
        const gender = /\b(female|male)\b/i.exec(item)?.[1];
        const hint = toGender(gender);
        return hint ? { name, gender: hint } : { name };
      });
  }

  const seen = new Set<string>();
  return characters
    .map(character => ({ ...character, name: character.name.replace(/\*+/g, '').trim() }))
    .filter(character => {
      const key = character.name.toLowerCase();
      if (!isUsableName(character.name) || seen.has(key)) return false;
      seen.add(key);
      return true;
    });
}
