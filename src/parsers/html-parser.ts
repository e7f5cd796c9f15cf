import * as cheerio from 'cheerio';
import * as path from 'path';
import { readFile } from 'fs/promises';
import type { Chapter, ParserResult } from '../types';
import { chapterId } from './text-parser';

const CHAPTER_HEADING = /chapter|section|prologue|epilogue|part/i;

export async function parseHTMLFile(filePath: string): Promise<ParserResult> {
  const html = await readFile(filePath, 'utf-8');

  return {
    chapters: detectHTMLChapters(html),
    source: path.basename(filePath),
    type: 'html'
  };
}

export function detectHTMLChapters(html: string): Chapter[] {
  const $ = cheerio.load(html);

  $('script, style, nav, header, footer, .ad, [class*="ad-"]').remove();
  $('[class*="toc"], [class*="table-of-contents"], [id*="toc"]').remove();
  $('[class*="sidebar"], [class*="menu"]').remove();

  const chapters: Array<{ title: string; content: string }> = [];

  $('h1, h2').each((_, el) => {
    const $el = $(el);
    const text = $el.text();

    if (CHAPTER_HEADING.test(text) || $el.hasClass('chapter')) {
      const content = $el
        .nextUntil('h1, h2')
        .map((_, next) => $.html(next))
        .get()
        .join('');

      chapters.push({ title: text.replace(/\s+/g, ' ').trim(), content });
    }
  });

  const cleaned = chapters
    .map(ch => ({ ...ch, content: cleanHTMLContent(ch.content) }))
    .filter(ch => ch.content.length > 0);

  if (cleaned.length === 0) {
    const mainContent = $('main, article, .content').first();
    const content = mainContent.length ? mainContent.html() || '' : $('body').html() || '';
    const title = $('title').text().trim() || 'Full Book';

    return [{ id: chapterId(0), title, content: cleanHTMLContent(content) }];
  }

  return cleaned.map((ch, i) => ({ id: chapterId(i), ...ch }));
}

/** Visible text of an HTML fragment with block boundaries kept as spaces. */
export function cleanHTMLContent(html: string): string {
  const $content = cheerio.load(html);

  $content('a[href^="#"]').remove();

  $content('*').contents().filter((_, node) => node.type === 'comment').remove();

  $content('p, div, li, br, blockquote, h1, h2, h3, h4, h5, h6, tr').after(' ');

  return $content('body').text().replace(/\s+/g, ' ').trim();
}
