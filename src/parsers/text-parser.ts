import * as path from 'path';
import { readFile } from 'fs/promises';
import type { Chapter, ParserResult } from '../types';

export const DEFAULT_CHUNK_CHARS = 5000;

/** Text before the first heading is kept only when it is long enough to be a real section. */
const MIN_PREAMBLE_CHARS = 500;

const HEADING_PATTERNS = [
  /^[ \t]*(?:chapter|part|book)[ \t]+(?:\d+|one|two|three|four|five|six|seven|eight|nine|ten)\b[^\n]*$/gim,
  /^[ \t]*(?:Chapter|CHAPTER|Part|PART|Book|BOOK)[ \t]+[IVXLCDM]+\b[^\n]*$/gm,
  /^[ \t]*(?:prologue|epilogue)\b[^\n]*$/gim,
  /^#{1,2}[ \t]+\S[^\n]*$/gm
];

interface Heading {
  start: number;
  end: number;
  title: string;
}

export function chapterId(index: number): string {
  return `chapter-${String(index + 1).padStart(2, '0')}`;
}

function findHeadings(content: string): Heading[] {
  const headings: Heading[] = [];

  for (const pattern of HEADING_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const start = match.index ?? 0;
      if (headings.some(heading => heading.start === start)) continue;
      headings.push({
        start,
        end: start + match[0].length,
        title: match[0].replace(/^[ \t]*#*[ \t]*/, '').trim()
      });
    }
  }

  return headings.sort((a, b) => a.start - b.start);
}

/**
 * Splits plain or Markdown text into chapters at `Chapter N` / `Part N` / `#` headings.
 * Text without headings is cut into chunks of about `chunkChars` at sentence ends.
 */
export function splitIntoChapters(content: string, chunkChars = DEFAULT_CHUNK_CHARS): Chapter[] {
  const text = content.replace(/\r\n?/g, '\n');
  const headings = findHeadings(text);

  const sections: Array<{ title: string; content: string }> = [];

  const first = headings[0];
  if (first) {
    const preamble = text.slice(0, first.start).trim();
    if (preamble.length >= MIN_PREAMBLE_CHARS) {
      sections.push({ title: 'Opening', content: preamble });
    }
  }

  headings.forEach((heading, i) => {
    const next = headings[i + 1];
    const body = text.slice(heading.end, next ? next.start : text.length).trim();
    if (body.length > 0) {
      sections.push({ title: heading.title, content: body });
    }
  });

  if (sections.length === 0) {
    chunkBySize(text.trim(), chunkChars).forEach((chunk, i) => {
      sections.push({ title: `Part ${i + 1}`, content: chunk });
    });
  }

  return sections.map((section, i) => ({ id: chapterId(i), ...section }));
}

function chunkBySize(text: string, chunkChars: number): string[] {
  const chunks: string[] = [];
  let rest = text;

  while (rest.length > chunkChars) {
    let breakPoint = rest.lastIndexOf('. ', chunkChars);
    if (breakPoint <= 0) breakPoint = rest.lastIndexOf(' ', chunkChars);
    const end = breakPoint > 0 ? breakPoint + 1 : chunkChars;

    const chunk = rest.slice(0, end).trim();
    if (chunk) chunks.push(chunk);
    rest = rest.slice(end);
  }

  const tail = rest.trim();
  if (tail) chunks.push(tail);

  return chunks;
}

export async function parseTextFile(filePath: string, chunkChars?: number): Promise<ParserResult> {
  const content = await readFile(filePath, 'utf-8');

  return {
    chapters: splitIntoChapters(content, chunkChars),
    source: path.basename(filePath),
    type: 'text'
  };
}
