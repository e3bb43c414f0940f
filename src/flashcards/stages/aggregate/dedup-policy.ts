/**
 * Deduplication Policies
 * Strict for minimal/medium coverage, lenient token-overlap for maximum.
 */

import { CoverageTier, type FlashcardPair } from '../../types';
import type { AggregationSettings } from '../../../config/generation-settings';

export interface DedupPolicy {
  readonly name: 'strict' | 'lenient';
  readonly minQuestionLength: number;
  readonly minAnswerLength: number;

  /**
   * Whether a question duplicates one of the kept questions
   */
  isDuplicate(question: string, kept: readonly KeptQuestion[]): boolean;
}

/**
 * Kept question with its token set cached
 */
export interface KeptQuestion {
  text: string;
  tokens: ReadonlySet<string>;
}

export function tokenize(question: string): Set<string> {
  return new Set(
    question
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token.length > 0),
  );
}

/**
 * Exact question match; q > 10 and a > 5 characters
 */
export class StrictDedupPolicy implements DedupPolicy {
  readonly name = 'strict';
  readonly minQuestionLength = 10;
  readonly minAnswerLength = 5;

  isDuplicate(question: string, kept: readonly KeptQuestion[]): boolean {
    return kept.some((candidate) => candidate.text === question);
  }
}

/**
 * Token overlap above max(minOverlap, ratio x |tokens(new)|); q > 3 and a > 2
 */
export class LenientDedupPolicy implements DedupPolicy {
  readonly name = 'lenient';
  readonly minQuestionLength = 3;
  readonly minAnswerLength = 2;

  constructor(
    private readonly overlapRatio: number,
    private readonly minOverlap: number,
  ) {}

  isDuplicate(question: string, kept: readonly KeptQuestion[]): boolean {
    const tokens = tokenize(question);
    const threshold = Math.max(this.minOverlap, tokens.size * this.overlapRatio);

    return kept.some((candidate) => {
      let shared = 0;
      for (const token of tokens) {
        if (candidate.tokens.has(token)) {
          shared++;
        }
      }
      return shared > threshold;
    });
  }
}

export function createDedupPolicy(
  tier: CoverageTier,
  settings: AggregationSettings,
): DedupPolicy {
  return tier === CoverageTier.Maximum
    ? new LenientDedupPolicy(
        settings.lenientOverlapRatio,
        settings.lenientMinOverlap,
      )
    : new StrictDedupPolicy();
}

/**
 * Trim both sides and make the question end with "?".
 * Applying it twice changes nothing.
 */
export function polishPair(pair: FlashcardPair): FlashcardPair {
  const answer = pair.answer.trim();
  let question = pair.question.trim();
  if (question.length > 0 && !question.endsWith('?')) {
    question = question.replace(/\.+$/, '').trimEnd() + '?';
  }
  return { question, answer };
}
