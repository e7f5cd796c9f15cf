import type { AudioClip } from '../types';
import { FormatError } from '../errors';
import { validateClip } from './pcm';

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export function isWavFile(bytes: Uint8Array): boolean {
  if (bytes.length < 12) return false;
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return buf.toString('ascii', 0, 4) === 'RIFF' && buf.toString('ascii', 8, 12) === 'WAVE';
}

/**
 * Decodes a RIFF/WAVE file holding integer PCM. Chunks other than `fmt ` and `data`
 * (LIST, FLLR padding from afconvert, ...) are skipped. A data chunk that claims more
 * bytes than the file holds, or that is not a whole number of frames, is a FormatError.
 */
export function decodeWav(bytes: Uint8Array, segmentIndex?: number): AudioClip {
  const buf = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (!isWavFile(bytes)) {
    throw new FormatError('not a RIFF/WAVE file', segmentIndex);
  }

  let format: { tag: number; channels: number; sampleRate: number; bitsPerSample: number } | null = null;
  let data: { offset: number; length: number } | null = null;
  let pos = 12;

  while (pos + 8 <= buf.length) {
    const id = buf.toString('ascii', pos, pos + 4);
    const size = buf.readUInt32LE(pos + 4);
    const chunkStart = pos + 8;

    if (id === 'fmt ') {
      if (size < 16 || chunkStart + 16 > buf.length) {
        throw new FormatError('truncated fmt chunk', segmentIndex);
      }
      let tag = buf.readUInt16LE(chunkStart);
      if (tag === WAVE_FORMAT_EXTENSIBLE && size >= 26 && chunkStart + 26 <= buf.length) {
        tag = buf.readUInt16LE(chunkStart + 24);
      }
      format = {
        tag,
        channels: buf.readUInt16LE(chunkStart + 2),
        sampleRate: buf.readUInt32LE(chunkStart + 4),
        bitsPerSample: buf.readUInt16LE(chunkStart + 14)
      };
    } else if (id === 'data') {
      if (chunkStart + size > buf.length) {
        throw new FormatError(
          `data chunk declares ${size} bytes but only ${buf.length - chunkStart} are present`,
          segmentIndex
        );
      }
      data = { offset: chunkStart, length: size };
    }

    pos = chunkStart + size + (size % 2);
  }

  if (!format || !data) {
    throw new FormatError('missing fmt or data chunk', segmentIndex);
  }
  if (format.tag !== WAVE_FORMAT_PCM) {
    throw new FormatError(`unsupported WAV encoding ${format.tag} (integer PCM only)`, segmentIndex);
  }

  const clip: AudioClip = {
    pcm: new Uint8Array(buf.subarray(data.offset, data.offset + data.length)),
    sampleRate: format.sampleRate,
    channelCount: format.channels,
    bitDepth: format.bitsPerSample
  };
  validateClip(clip, segmentIndex);
  return clip;
}

export function encodeWav(clip: AudioClip): Buffer {
  validateClip(clip);

  const bytesPerSample = clip.bitDepth / 8;
  const blockAlign = clip.channelCount * bytesPerSample;
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 4, 'ascii');
  header.writeUInt32LE(36 + clip.pcm.length, 4);
  header.write('WAVE', 8, 4, 'ascii');
  header.write('fmt ', 12, 4, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(WAVE_FORMAT_PCM, 20);
  header.writeUInt16LE(clip.channelCount, 22);
  header.writeUInt32LE(clip.sampleRate, 24);
  header.writeUInt32LE(clip.sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(clip.bitDepth, 34);
  header.write('data', 36, 4, 'ascii');
  header.writeUInt32LE(clip.pcm.length, 40);

  return Buffer.concat([header, clip.pcm]);
}
