import { TextChunkerService } from './text-chunker.service';

function nonWhitespace(value: string): string {
  return value.replace(/\s+/g, '');
}

/**
 * Deterministic pseudo-random document made of short paragraphs
 */
function buildDocument(paragraphCount: number, seed: number): string {
  let state = seed;
  const next = (): number => {
    state = (state * 16807) % 2147483647;
    return state;
  };
  const words = ['river', 'treaty', 'engine', 'colony', 'market', 'harbor'];

  const paragraphs: string[] = [];
  for (let p = 0; p < paragraphCount; p++) {
    const sentences: string[] = [];
    const sentenceCount = 1 + (next() % 6);
    for (let s = 0; s < sentenceCount; s++) {
      const wordCount = 3 + (next() % 9);
      const sentenceWords: string[] = [];
      for (let w = 0; w < wordCount; w++) {
        sentenceWords.push(words[next() % words.length]);
      }
      sentences.push(`P${p}S${s} ${sentenceWords.join(' ')}.`);
    }
    paragraphs.push(sentences.join(' '));
  }
  return paragraphs.join('\n\n');
}

describe('TextChunkerService', () => {
  let chunker: TextChunkerService;

  beforeEach(() => {
    chunker = new TextChunkerService();
  });

  it('returns a short text as a single chunk', () => {
    const chunks = chunker.split('  First paragraph.\n\nSecond one.  ', 1000);

    expect(chunks).toEqual([
      { index: 0, content: 'First paragraph.\n\nSecond one.' },
    ]);
  });

  it('returns no chunks for blank text', () => {
    expect(chunker.split(' \n\n \n', 100)).toEqual([]);
  });

  it('packs whole paragraphs until the limit is reached', () => {
    const a = 'A'.repeat(40);
    const b = 'B'.repeat(40);
    const c = 'C'.repeat(40);

    const chunks = chunker.split([a, b, c].join('\n\n'), 100);

    expect(chunks.map((chunk) => chunk.content)).toEqual([`${a}\n\n${b}`, c]);
    expect(chunks.map((chunk) => chunk.index)).toEqual([0, 1]);
  });

  it('normalizes CRLF line endings before splitting paragraphs', () => {
    const a = 'A'.repeat(40);
    const b = 'B'.repeat(70);

    const chunks = chunker.split(`${a}\r\n\r\n${b}`, 100);

    expect(chunks.map((chunk) => chunk.content)).toEqual([a, b]);
  });

  it('emits an irreducible oversized sentence whole', () => {
    const sentence = 'x'.repeat(500);

    const chunks = chunker.split(sentence, 100);

    expect(chunks).toEqual([{ index: 0, content: sentence }]);
  });

  it('keeps appending below the minimum fill even past the limit', () => {
    const long = 'L'.repeat(120);

    const chunks = chunker.split(`Hi. ${long}. End`, 100);

    expect(chunks.map((chunk) => chunk.content)).toEqual([
      `Hi. ${long}.`,
      'End',
    ]);
  });

  it('closes sentence-dense sub-chunks early', () => {
    const sentences: string[] = [];
    for (let i = 1; i <= 30; i++) {
      sentences.push(`S${String(i).padStart(2, '0')} ${'w'.repeat(56)}`);
    }
    const paragraph = sentences.join('. ') + '.';

    const chunks = chunker.split(paragraph, 1000);

    expect(chunks).toHaveLength(5);
    expect(chunks[0].content.startsWith('S01 ')).toBe(true);
    expect(chunks[0].content.endsWith(`S06 ${'w'.repeat(56)}.`)).toBe(true);
    expect(chunks[1].content.startsWith('S07 ')).toBe(true);
    expect(chunks[4].content.endsWith(`S30 ${'w'.repeat(56)}.`)).toBe(true);
  });

  it.each([120, 300, 1000])(
    'preserves all content in order and respects the bound (max %i)',
    (maxChunkSize) => {
      const text = buildDocument(40, 7 + maxChunkSize);

      const chunks = chunker.split(text, maxChunkSize);

      expect(nonWhitespace(chunks.map((chunk) => chunk.content).join(''))).toBe(
        nonWhitespace(text),
      );
      for (const chunk of chunks) {
        expect(chunk.content.trim().length).toBeGreaterThan(0);
        expect(chunk.content.length).toBeLessThanOrEqual(maxChunkSize);
      }
      chunks.forEach((chunk, i) => expect(chunk.index).toBe(i));
    },
  );
});
