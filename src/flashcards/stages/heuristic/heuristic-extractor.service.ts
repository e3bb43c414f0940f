/**
 * Heuristic Extractor Service
 * Picks fact-bearing sentences and rewrites them as questions.
 * Needs no external capability, so it backs every other generation path.
 */

import { Injectable } from '@nestjs/common';
import type { CandidatePair } from '../../types';

const SENTENCE_BOUNDARY = /[.!?]+/;

const DATE_PATTERNS: readonly RegExp[] = [
  /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/,
  /\b\d{4}[/-]\d{1,2}[/-]\d{1,2}\b/,
  /\b(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]* \d{1,2},? \d{2,4}\b/,
];

const IMPORTANCE_PATTERNS: readonly RegExp[] = [
  /\d/,
  // Acronyms are matched case-sensitively
  /\b[A-Z]{2,}\b/,
  /\b(?:important|significant|key|main|primary|crucial|essential|vital)\b/i,
  /\b(?:according to|research|study|findings|results)\b/i,
];

const MIN_SENTENCE_LENGTH = 20;
const MAX_DATE_POINTS = 10;
const MAX_KEY_POINTS = 15;

const LEADING_AUXILIARIES = new Set([
  'is',
  'are',
  'was',
  'were',
  'has',
  'have',
  'had',
  'do',
  'does',
  'did',
  'can',
  'could',
  'will',
  'would',
  'should',
  'may',
  'might',
]);

const COPULA = /\b(?:is|are|was|were)\b/i;

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

@Injectable()
export class HeuristicExtractorService {
  /**
   * Select key sentences
   * @param instruction - Mentioning "date" switches to date-bearing sentences only
   */
  extractKeyPoints(text: string, instruction?: string): string[] {
    const sentences = splitSentences(text);

    if (instruction && instruction.toLowerCase().includes('date')) {
      return sentences
        .filter((sentence) =>
          DATE_PATTERNS.some((pattern) => pattern.test(sentence)),
        )
        .slice(0, MAX_DATE_POINTS);
    }

    const seen = new Set<string>();
    const points: string[] = [];
    for (const sentence of sentences) {
      if (sentence.length < MIN_SENTENCE_LENGTH || seen.has(sentence)) {
        continue;
      }
      if (IMPORTANCE_PATTERNS.some((pattern) => pattern.test(sentence))) {
        seen.add(sentence);
        points.push(sentence);
        if (points.length === MAX_KEY_POINTS) {
          break;
        }
      }
    }
    return points;
  }

  /**
   * Rewrite a statement as a question
   */
  statementToQuestion(statement: string): string {
    const body = statement.trim().replace(/\.+$/, '');
    const firstWord = body.split(/\s+/)[0]?.toLowerCase() ?? '';

    if (LEADING_AUXILIARIES.has(firstWord) || COPULA.test(body)) {
      return `${body}?`;
    }
    return `What is ${body}?`;
  }

  /**
   * Key points turned into question/answer pairs
   */
  buildPairs(
    text: string,
    instruction: string | undefined,
    chunkIndex: number,
  ): CandidatePair[] {
    return this.extractKeyPoints(text, instruction).map((point) => ({
      question: this.statementToQuestion(point),
      answer: point,
      chunkIndex,
    }));
  }
}
