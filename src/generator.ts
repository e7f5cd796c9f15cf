import * as path from 'path';
import { mkdir, writeFile } from 'fs/promises';
import type { ChapterAudio } from './types';
import { chapterAudioToWav } from './audio/concatenator';
import { sanitizeOutputPath, validatePathWithinDirectory } from './validators/path-validator';

export async function saveWavFile(
  audio: ChapterAudio,
  chapterIndex: number,
  totalChapters: number,
  outputDir: string
): Promise<string> {
  const sanitizedDir = sanitizeOutputPath(outputDir);

  const fileName = generateFileName(chapterIndex, totalChapters);
  const filePath = path.join(sanitizedDir, fileName);

  validatePathWithinDirectory(filePath, sanitizedDir);

  await writeFile(filePath, chapterAudioToWav(audio));

  return filePath;
}

/** Zero-padded to at least two digits so files sort in chapter order. */
export function generateFileName(chapterIndex: number, totalChapters: number): string {
  const padding = Math.max(2, String(totalChapters).length);
  return `${String(chapterIndex + 1).padStart(padding, '0')}.wav`;
}

export async function ensureOutputDir(outputDir: string): Promise<string> {
  const sanitizedDir = sanitizeOutputPath(outputDir);
  await mkdir(sanitizedDir, { recursive: true });
  return sanitizedDir;
}

/** Directory inside the output folder that holds the book's voice table. */
export function stateDirFor(outputDir: string): string {
  return path.join(sanitizeOutputPath(outputDir), '.storyvoice');
}
