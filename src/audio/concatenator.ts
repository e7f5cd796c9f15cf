import type { AudioClip, AudioFormat, ChapterAudio } from '../types';
import { FormatError } from '../errors';
import { convertClip, durationSeconds, silence, validateClip } from './pcm';
import { encodeWav } from './wav';

export const DEFAULT_PAUSE_MS = 300;

export interface ConcatenateOptions {
  /** Silence inserted between consecutive clips. */
  pauseMs?: number;
}

/** The widest format among the clips, so converting into it never loses samples. */
export function targetFormat(clips: readonly AudioClip[]): AudioFormat {
  const first = clips[0];
  if (!first) {
    throw new FormatError('no clips to concatenate');
  }

  return {
    sampleRate: first.sampleRate,
    channelCount: Math.max(...clips.map(clip => clip.channelCount)),
    bitDepth: Math.max(...clips.map(clip => clip.bitDepth))
  };
}

/**
 * Merges the clips of one chapter, in order, into a single track. Every clip is
 * validated first and converted to a shared channel count and bit depth; clips
 * must already agree on sample rate.
 */
export function concatenateClips(
  chapterKey: string,
  clips: readonly AudioClip[],
  options: ConcatenateOptions = {}
): ChapterAudio {
  clips.forEach((clip, index) => validateClip(clip, index));

  const format = targetFormat(clips);
  clips.forEach((clip, index) => {
    if (clip.sampleRate !== format.sampleRate) {
      throw new FormatError(
        `sample rate ${clip.sampleRate} Hz does not match the chapter's ${format.sampleRate} Hz`,
        index
      );
    }
  });

  const pause = silence(format, options.pauseMs ?? DEFAULT_PAUSE_MS);
  const parts: Uint8Array[] = [];

  clips.forEach((clip, index) => {
    if (index > 0 && pause.length > 0) parts.push(pause);
    parts.push(convertClip(clip, format).pcm);
  });

  const pcm = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    pcm.set(part, offset);
    offset += part.length;
  }

  const clip: AudioClip = { ...format, pcm };
  return {
    chapterKey,
    clip,
    durationSeconds: durationSeconds(clip),
    segmentCount: clips.length
  };
}

export function chapterAudioToWav(audio: ChapterAudio): Buffer {
  return encodeWav(audio.clip);
}
