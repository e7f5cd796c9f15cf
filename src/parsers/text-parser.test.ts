import { describe, expect, it } from 'vitest';
import { chapterId, splitIntoChapters } from './text-parser';

describe('splitIntoChapters', () => {
  it('splits at chapter headings', () => {
    const chapters = splitIntoChapters('Chapter 1: Arrival\nAlice came home.\n\nChapter 2\nBob left.\n');

    expect(chapters).toEqual([
      { id: 'chapter-01', title: 'Chapter 1: Arrival', content: 'Alice came home.' },
      { id: 'chapter-02', title: 'Chapter 2', content: 'Bob left.' }
    ]);
  });

  it('understands Markdown and prologue headings', () => {
    const chapters = splitIntoChapters('# Prologue\nIt began.\n## Chapter One\nThen more.');

    expect(chapters.map(ch => [ch.title, ch.content])).toEqual([
      ['Prologue', 'It began.'],
      ['Chapter One', 'Then more.']
    ]);
  });

  it('accepts upper-case roman numerals without matching ordinary words', () => {
    const chapters = splitIntoChapters('CHAPTER IV\nI did it.\r\nCHAPTER V\r\nMore text.');

    expect(chapters.map(ch => [ch.title, ch.content])).toEqual([
      ['CHAPTER IV', 'I did it.'],
      ['CHAPTER V', 'More text.']
    ]);
  });

  it('drops a short preamble and empty chapters', () => {
    const chapters = splitIntoChapters('My Book\n\nChapter 1\n\nChapter 2\nHello.');

    expect(chapters).toEqual([{ id: 'chapter-01', title: 'Chapter 2', content: 'Hello.' }]);
  });

  it('keeps a long preamble as an opening chapter', () => {
    const preamble = 'Foreword text. '.repeat(40).trim();

    const chapters = splitIntoChapters(`${preamble}\n\nChapter 1\nHello.`);

    expect(chapters.map(ch => ch.title)).toEqual(['Opening', 'Chapter 1']);
    expect(chapters[0]?.content).toBe(preamble);
  });

  it('cuts text without headings at sentence ends', () => {
    const chapters = splitIntoChapters('First sentence here. Second sentence here. Third one.', 25);

    expect(chapters.map(ch => [ch.title, ch.content])).toEqual([
      ['Part 1', 'First sentence here.'],
      ['Part 2', 'Second sentence here.'],
      ['Part 3', 'Third one.']
    ]);
  });
});

describe('chapterId', () => {
  it('is zero-padded and one-based', () => {
    expect(chapterId(0)).toBe('chapter-01');
    expect(chapterId(11)).toBe('chapter-12');
  });
});
