import type { AudioClip, AudioFormat } from '../types';
import { FormatError } from '../errors';

export const SUPPORTED_BIT_DEPTHS: readonly number[] = [8, 16, 24, 32];

export function bytesPerFrame(format: AudioFormat): number {
  return format.channelCount * (format.bitDepth / 8);
}

export function frameCount(clip: AudioClip): number {
  return clip.pcm.length / bytesPerFrame(clip);
}

export function durationSeconds(clip: AudioClip): number {
  return frameCount(clip) / clip.sampleRate;
}

export function sameFormat(a: AudioFormat, b: AudioFormat): boolean {
  return a.sampleRate === b.sampleRate && a.channelCount === b.channelCount && a.bitDepth === b.bitDepth;
}

/** Checks the declared header fields against each other and against the payload length. */
export function validateClip(clip: AudioClip, segmentIndex?: number): void {
  if (!Number.isInteger(clip.sampleRate) || clip.sampleRate <= 0) {
    throw new FormatError(`invalid sample rate ${clip.sampleRate}`, segmentIndex);
  }
  if (!Number.isInteger(clip.channelCount) || clip.channelCount <= 0) {
    throw new FormatError(`invalid channel count ${clip.channelCount}`, segmentIndex);
  }
  if (!SUPPORTED_BIT_DEPTHS.includes(clip.bitDepth)) {
    throw new FormatError(`unsupported bit depth ${clip.bitDepth}`, segmentIndex);
  }

  const frame = bytesPerFrame(clip);
  if (clip.pcm.length % frame !== 0) {
    throw new FormatError(
      `payload of ${clip.pcm.length} bytes is not a whole number of ${frame}-byte frames`,
      segmentIndex
    );
  }
}

function readSample(view: DataView, offset: number, bitDepth: number): number {
  switch (bitDepth) {
    case 8:
      return view.getUint8(offset) - 128;
    case 16:
      return view.getInt16(offset, true);
    case 24: {
      const value = view.getUint8(offset) | (view.getUint8(offset + 1) << 8) | (view.getUint8(offset + 2) << 16);
      return value & 0x800000 ? value - 0x1000000 : value;
    }
    default:
      return view.getInt32(offset, true);
  }
}

function writeSample(view: DataView, offset: number, bitDepth: number, value: number): void {
  switch (bitDepth) {
    case 8:
      view.setUint8(offset, value + 128);
      return;
    case 16:
      view.setInt16(offset, value, true);
      return;
    case 24: {
      const unsigned = value < 0 ? value + 0x1000000 : value;
      view.setUint8(offset, unsigned & 0xff);
      view.setUint8(offset + 1, (unsigned >> 8) & 0xff);
      view.setUint8(offset + 2, (unsigned >> 16) & 0xff);
      return;
    }
    default:
      view.setInt32(offset, value, true);
  }
}

function scaleSample(value: number, from: number, to: number): number {
  if (from === to) return value;
  if (to > from) return value * 2 ** (to - from);
  return Math.floor(value / 2 ** (from - to));
}

/**
 * Re-encodes a clip in another channel count and/or bit depth at the same sample rate.
 * Mono sources are copied to every output channel; otherwise output channel `c` reads
 * source channel `c % sourceChannels`. Widening the bit depth is exact.
 */
export function convertClip(clip: AudioClip, target: AudioFormat): AudioClip {
  if (clip.sampleRate !== target.sampleRate) {
    throw new FormatError(`cannot convert ${clip.sampleRate} Hz audio to ${target.sampleRate} Hz`);
  }
  if (sameFormat(clip, target)) return clip;

  const frames = frameCount(clip);
  const sourceBytes = clip.bitDepth / 8;
  const targetBytes = target.bitDepth / 8;
  const out = new Uint8Array(frames * target.channelCount * targetBytes);

  const source = new DataView(clip.pcm.buffer, clip.pcm.byteOffset, clip.pcm.byteLength);
  const dest = new DataView(out.buffer);

  for (let frame = 0; frame < frames; frame++) {
    for (let channel = 0; channel < target.channelCount; channel++) {
      const sourceChannel = clip.channelCount === 1 ? 0 : channel % clip.channelCount;
      const sourceOffset = (frame * clip.channelCount + sourceChannel) * sourceBytes;
      const value = readSample(source, sourceOffset, clip.bitDepth);
      const destOffset = (frame * target.channelCount + channel) * targetBytes;
      writeSample(dest, destOffset, target.bitDepth, scaleSample(value, clip.bitDepth, target.bitDepth));
    }
  }

  return { pcm: out, sampleRate: target.sampleRate, channelCount: target.channelCount, bitDepth: target.bitDepth };
}

export function silence(format: AudioFormat, ms: number): Uint8Array {
  const frames = Math.round((format.sampleRate * ms) / 1000);
  const bytes = new Uint8Array(frames * bytesPerFrame(format));
  // 8-bit WAV is unsigned, so its zero level is 128.
  if (format.bitDepth === 8) bytes.fill(128);
  return bytes;
}
