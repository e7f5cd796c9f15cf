import type {
  BookVoiceState,
  CharacterRecord,
  DetectedCharacter,
  Gender,
  Segment,
  VoiceCatalog,
  VoiceMap,
  VoiceOption,
  VoiceProfile
} from '../types';
import { NARRATOR_DISPLAY_NAME, NARRATOR_KEY, canonicalKey, displayNameFor } from '../characters/canonical';
import { ConfigurationError } from '../errors';

export function createBookState(bookId: string): BookVoiceState {
  return { bookId, characters: {}, detections: {}, updatedAt: new Date().toISOString() };
}

export function toVoiceProfile(voice: VoiceOption, catalog: VoiceCatalog): VoiceProfile {
  return {
    voiceId: voice.id,
    backend: catalog.backend,
    backendVoiceName: voice.name,
    language: voice.language
  };
}

/** False for bindings made against a backend whose voice ids this catalog does not know. */
export function isVoiceInCatalog(voice: VoiceProfile, catalog: VoiceCatalog): boolean {
  return catalog.voices.some(option => option.id === voice.voiceId);
}

/** Unresolved speakers are read by the narrator. */
export function speakerKeyFor(segment: Segment): string {
  if (segment.speaker) return segment.speaker.key;
  if (segment.attribution) return canonicalKey(segment.attribution.name);
  return NARRATOR_KEY;
}

/**
 * Binds characters to voices for one book. Existing bindings are never changed by
 * {@link VoiceAssigner.assign}; only {@link VoiceAssigner.setCharacterVoice} and
 * {@link VoiceAssigner.resetVoices} rewrite them. Callers hold the book's lock.
 */
export class VoiceAssigner {
  assign(state: BookVoiceState, characters: Iterable<DetectedCharacter>, catalog: VoiceCatalog): VoiceMap {
    const narrator = this.ensureNarrator(state, catalog);
    const map: VoiceMap = new Map([[NARRATOR_KEY, narrator.voice]]);

    for (const character of characters) {
      const key = canonicalKey(character.key);
      if (key === NARRATOR_KEY || key.length === 0) continue;

      let record = state.characters[key];
      if (!record || !isVoiceInCatalog(record.voice, catalog)) {
        const gender = character.gender ?? record?.gender;
        record = {
          key,
          displayName: record?.displayName ?? displayNameFor(character.displayName),
          voice: this.pickVoice(state, catalog, gender)
        };
        if (gender) record.gender = gender;
        state.characters[key] = record;
      }
      map.set(key, record.voice);
    }

    state.updatedAt = new Date().toISOString();
    return map;
  }

  setCharacterVoice(state: BookVoiceState, name: string, voiceId: string, catalog: VoiceCatalog): CharacterRecord {
    const voice = catalog.voices.find(option => option.id === voiceId);
    if (!voice) {
      throw new ConfigurationError(`Unknown ${catalog.backend} voice "${voiceId}"`);
    }

    const key = canonicalKey(name);
    const existing = state.characters[key];
    const record: CharacterRecord = {
      ...existing,
      key,
      displayName: existing?.displayName ?? displayNameFor(name),
      voice: toVoiceProfile(voice, catalog)
    };
    state.characters[key] = record;
    state.updatedAt = new Date().toISOString();
    return record;
  }

  resetVoices(state: BookVoiceState): void {
    state.characters = {};
    state.updatedAt = new Date().toISOString();
  }

  private ensureNarrator(state: BookVoiceState, catalog: VoiceCatalog): CharacterRecord {
    const existing = state.characters[NARRATOR_KEY];
    if (existing && isVoiceInCatalog(existing.voice, catalog)) return existing;

    const voice = catalog.voices.find(option => option.id === catalog.narratorVoiceId) ?? catalog.voices[0];
    if (!voice) {
      throw new ConfigurationError(`The ${catalog.backend} backend offers no voices`);
    }

    const record: CharacterRecord = {
      key: NARRATOR_KEY,
      displayName: NARRATOR_DISPLAY_NAME,
      voice: toVoiceProfile(voice, catalog)
    };
    state.characters[NARRATOR_KEY] = record;
    return record;
  }

  private pickVoice(state: BookVoiceState, catalog: VoiceCatalog, hint?: Gender): VoiceProfile {
    const records = Object.values(state.characters);
    const narratorVoiceId = state.characters[NARRATOR_KEY]?.voice.voiceId ?? catalog.narratorVoiceId;
    const bound = new Set(records.map(record => record.voice.voiceId));
    const unused = catalog.voices.filter(voice => !bound.has(voice.id));

    if (unused.length > 0) {
      const gender = hint && hint !== 'unknown' ? hint : this.alternateGender(state, catalog, narratorVoiceId);
      const choice = unused.find(voice => voice.gender === gender) ?? unused[0];
      if (choice) return toVoiceProfile(choice, catalog);
    }

    // Pool exhausted: share voices round-robin, never the narrator's.
    const shareable = catalog.voices.filter(voice => voice.id !== narratorVoiceId);
    const pool = shareable.length > 0 ? shareable : catalog.voices;
    const others = records.filter(record => record.key !== NARRATOR_KEY).length;
    const choice = pool[others % pool.length];
    if (!choice) {
      throw new ConfigurationError(`The ${catalog.backend} backend offers no voices`);
    }
    return toVoiceProfile(choice, catalog);
  }

  /** Alternates genders for characters without a hint, starting opposite the narrator. */
  private alternateGender(state: BookVoiceState, catalog: VoiceCatalog, narratorVoiceId: string): Gender {
    const narratorGender = catalog.voices.find(voice => voice.id === narratorVoiceId)?.gender ?? 'female';
    const opposite: Gender = narratorGender === 'male' ? 'female' : 'male';
    const others = Object.keys(state.characters).filter(key => key !== NARRATOR_KEY).length;
    return others % 2 === 0 ? opposite : narratorGender;
  }
}
