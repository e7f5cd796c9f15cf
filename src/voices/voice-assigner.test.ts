import { describe, expect, it } from 'vitest';
import { VoiceAssigner, createBookState, speakerKeyFor } from './voice-assigner';
import { canonicalKey } from '../characters/canonical';
import { ConfigurationError } from '../errors';
import { TEST_CATALOG } from '../testing/fixtures';
import type { DetectedCharacter, Gender, Segment, VoiceCatalog } from '../types';

function detected(name: string, gender?: Gender): DetectedCharacter {
  const character: DetectedCharacter = { key: canonicalKey(name), displayName: name, sources: ['heuristic'] };
  if (gender) character.gender = gender;
  return character;
}

function voiceIds(map: Map<string, { voiceId: string }>): Record<string, string> {
  return Object.fromEntries([...map].map(([key, voice]) => [key, voice.voiceId]));
}

describe('VoiceAssigner', () => {
  const assigner = new VoiceAssigner();

  it('gives the narrator the catalog narrator voice and alternates genders for the rest', () => {
    const state = createBookState('book');

    const map = assigner.assign(state, [detected('Narrator'), detected('Alice'), detected('Bob')], TEST_CATALOG);

    expect(voiceIds(map)).toEqual({ narrator: 'af_sky', alice: 'am_adam', bob: 'af_bella' });
    expect(state.characters.alice?.voice).toEqual({
      voiceId: 'am_adam',
      backend: 'kokoro',
      backendVoiceName: 'am_adam',
      language: 'en-US'
    });
  });

  it('follows gender hints', () => {
    const state = createBookState('book');

    const map = assigner.assign(state, [detected('Carol', 'female')], TEST_CATALOG);

    expect(map.get('carol')?.voiceId).toBe('af_bella');
    expect(state.characters.carol?.gender).toBe('female');
  });

  it('never changes an existing binding', () => {
    const state = createBookState('book');
    assigner.assign(state, [detected('Alice'), detected('Bob')], TEST_CATALOG);

    const map = assigner.assign(state, [detected('Bob'), detected('Dave'), detected('alice', 'female')], TEST_CATALOG);

    expect(voiceIds(map)).toEqual({ narrator: 'af_sky', bob: 'af_bella', dave: 'am_echo', alice: 'am_adam' });
  });

  it('shares voices round-robin once the pool is exhausted, never the narrator voice', () => {
    const small: VoiceCatalog = {
      backend: 'kokoro',
      narratorVoiceId: 'af_sky',
      voices: TEST_CATALOG.voices.filter(voice => ['af_sky', 'am_adam', 'af_bella'].includes(voice.id))
    };
    const state = createBookState('book');

    const map = assigner.assign(state, ['Ann', 'Ben', 'Cat', 'Dan'].map(name => detected(name)), small);

    expect(voiceIds(map)).toEqual({
      narrator: 'af_sky',
      ann: 'am_adam',
      ben: 'af_bella',
      cat: 'am_adam',
      dan: 'af_bella'
    });
  });

  it('skips narrator spellings in the character list', () => {
    const state = createBookState('book');

    const map = assigner.assign(state, [detected('The Narrator'), detected('Alice')], TEST_CATALOG);

    expect([...map.keys()]).toEqual(['narrator', 'alice']);
  });

  it('lets a manual binding win over assignment', () => {
    const state = createBookState('book');
    assigner.assign(state, [detected('Alice')], TEST_CATALOG);

    const record = assigner.setCharacterVoice(state, 'alice', 'bf_emma', TEST_CATALOG);
    const map = assigner.assign(state, [detected('Alice')], TEST_CATALOG);

    expect(record).toMatchObject({ key: 'alice', displayName: 'Alice', voice: { voiceId: 'bf_emma', language: 'en-GB' } });
    expect(map.get('alice')?.voiceId).toBe('bf_emma');
  });

  it('rejects voices the catalog does not offer', () => {
    const state = createBookState('book');

    expect(() => assigner.setCharacterVoice(state, 'Alice', 'nope', TEST_CATALOG)).toThrow(
      new ConfigurationError('Unknown kokoro voice "nope"')
    );
  });

  it('forgets every binding on reset', () => {
    const state = createBookState('book');
    assigner.setCharacterVoice(state, 'Alice', 'bf_emma', TEST_CATALOG);

    assigner.resetVoices(state);
    const map = assigner.assign(state, [detected('Alice')], TEST_CATALOG);

    expect(map.get('alice')?.voiceId).toBe('am_adam');
  });

  it('rebinds voices made for another backend, keeping the known gender', () => {
    const state = createBookState('book');
    state.characters.alice = {
      key: 'alice',
      displayName: 'Alice',
      gender: 'male',
      voice: { voiceId: 'pNInz6obpgDQGcFmaJgB', backend: 'elevenlabs', backendVoiceName: 'Adam', language: 'en-US' }
    };

    const map = assigner.assign(state, [detected('Alice')], TEST_CATALOG);

    expect(voiceIds(map)).toEqual({ narrator: 'af_sky', alice: 'am_adam' });
    expect(state.characters.alice?.gender).toBe('male');
  });

  it('fails when the backend offers no voices', () => {
    const empty: VoiceCatalog = { backend: 'kokoro', narratorVoiceId: 'af_sky', voices: [] };

    expect(() => assigner.assign(createBookState('book'), [], empty)).toThrow('The kokoro backend offers no voices');
  });
});

describe('speakerKeyFor', () => {
  const base: Segment = { index: 0, start: 0, end: 1, text: 'x', kind: 'narration', speaker: null, attribution: null };

  it('reads the attribution and falls back to the narrator', () => {
    expect(speakerKeyFor(base)).toBe('narrator');
    expect(speakerKeyFor({ ...base, kind: 'dialogue', attribution: { name: 'Mary Jane', verb: 'said', via: 'name' } })).toBe(
      'mary jane'
    );
  });
});
