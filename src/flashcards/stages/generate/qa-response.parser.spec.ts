import { readFileSync } from 'fs';
import { join } from 'path';
import { parseQaResponse } from './qa-response.parser';

function fixture(name: string): string {
  return readFileSync(join(__dirname, '__fixtures__', name), 'utf8');
}

describe('parseQaResponse', () => {
  it('parses a well-formed reply and ignores the preamble', () => {
    const pairs = parseQaResponse(fixture('well-formed.txt'));

    expect(pairs).toHaveLength(6);
    expect(pairs[0]).toEqual({
      question: 'In which year did the Pilgrims found Plymouth Colony?',
      answer: '1620',
    });
    expect(pairs[5]).toEqual({
      question: 'Who served as governor of Plymouth Colony for most of the 1620s?',
      answer: 'William Bradford',
    });
  });

  it('accepts Lithuanian labels, list markers and bold labels', () => {
    const pairs = parseQaResponse(fixture('lithuanian-markdown.txt'));

    expect(pairs).toEqual([
      {
        question: 'Kuriais metais buvo įkurta Vilniaus universitetas?',
        answer: '1579 metais',
      },
      {
        question: 'Kas įkūrė Vilniaus universitetą?',
        answer: 'Karalius Steponas Batoras',
      },
      {
        question: 'Which river flows through Vilnius?',
        answer: 'The Neris',
      },
    ]);
  });

  it('takes an unlabeled line after a question as its answer', () => {
    const pairs = parseQaResponse(fixture('implicit-answer.txt'));

    expect(pairs).toEqual([
      {
        question: 'What is the boiling point of water at sea level in Celsius?',
        answer: '100 degrees Celsius',
      },
      {
        question: 'Which gas do plants absorb during photosynthesis?',
        answer: 'Carbon dioxide',
      },
      {
        question: 'What is the chemical symbol for sodium?',
        answer: 'Na',
      },
    ]);
  });

  it('recovers pairs written on a single line', () => {
    const pairs = parseQaResponse(fixture('inline-pairs.txt'));

    expect(pairs).toEqual([
      { question: 'Who painted the Mona Lisa?', answer: 'Leonardo da Vinci' },
      { question: 'In which city is the Louvre museum?', answer: 'Paris' },
      {
        question: 'What is the largest planet in the solar system?',
        answer: 'Jupiter',
      },
    ]);
  });

  it('returns no pairs for a reply without any', () => {
    expect(parseQaResponse(fixture('malformed.txt'))).toEqual([]);
    expect(parseQaResponse('')).toEqual([]);
  });

  it('matches labels case-insensitively', () => {
    expect(parseQaResponse('question: What is H2O?\nanswer: Water')).toEqual([
      { question: 'What is H2O?', answer: 'Water' },
    ]);
  });
});
