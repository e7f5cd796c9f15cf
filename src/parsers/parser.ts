import * as path from 'path';
import { stat } from 'fs/promises';
import type { ParserResult } from '../types';
import { HTML_EXTENSIONS, sanitizeInputPath } from '../validators/path-validator';
import { parseHTMLFile } from './html-parser';
import { parseTextFile } from './text-parser';

export async function parseInput(input: string, chunkChars?: number): Promise<ParserResult> {
  const filePath = sanitizeInputPath(input);

  if (!(await isFile(filePath))) {
    throw new Error(`Invalid input: ${input}. File not found.`);
  }

  if (HTML_EXTENSIONS.includes(path.extname(filePath).toLowerCase())) {
    return parseHTMLFile(filePath);
  }
  return parseTextFile(filePath, chunkChars);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}
