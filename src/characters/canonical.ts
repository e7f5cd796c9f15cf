import type { CharacterRef } from '../types';

export const NARRATOR_KEY = 'narrator';
export const NARRATOR_DISPLAY_NAME = 'Narrator';

const NARRATOR_ALIASES = new Set(['narrator', 'the narrator']);

/**
 * Identity used to deduplicate characters: case-insensitive, whitespace-collapsed,
 * without surrounding quotes or punctuation. Every spelling of the narrator
 * collapses to {@link NARRATOR_KEY}.
 */
export function canonicalKey(name: string): string {
  const key = cleanName(name).toLowerCase();
  return NARRATOR_ALIASES.has(key) ? NARRATOR_KEY : key;
}

/** Collapses whitespace and strips surrounding quotes and punctuation, keeping case. */
export function cleanName(name: string): string {
  return name
    .normalize('NFC')
    .replace(/\s+/g, ' ')
    .replace(/^[\s"'“”‘’.,:;!?()[\]-]+|[\s"'“”‘’.,:;!?()[\]-]+$/g, '');
}

export function isNarrator(name: string): boolean {
  return canonicalKey(name) === NARRATOR_KEY;
}

/** Presentation casing: each word capitalised, the narrator always "Narrator". */
export function displayNameFor(name: string): string {
  const key = canonicalKey(name);
  if (key === NARRATOR_KEY) return NARRATOR_DISPLAY_NAME;

  return cleanName(name)
    .split(' ')
    .map(word => (word === word.toLowerCase() ? word.charAt(0).toUpperCase() + word.slice(1) : word))
    .join(' ');
}

export function characterRef(name: string): CharacterRef {
  return { key: canonicalKey(name), displayName: displayNameFor(name) };
}

export const NARRATOR_REF: CharacterRef = { key: NARRATOR_KEY, displayName: NARRATOR_DISPLAY_NAME };
