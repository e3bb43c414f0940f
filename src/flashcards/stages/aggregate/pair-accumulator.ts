/**
 * Pair Accumulator
 * Order-preserving, first-seen-wins collection bound to one dedup policy.
 */

import type { FlashcardPair } from '../../types';
import { polishPair, tokenize, type DedupPolicy, type KeptQuestion } from './dedup-policy';

export class PairAccumulator {
  private readonly kept: KeptQuestion[] = [];
  private readonly accepted: FlashcardPair[] = [];

  constructor(readonly policy: DedupPolicy) {}

  /**
   * Offer a pair
   * @returns true when the pair was kept
   */
  add(pair: FlashcardPair): boolean {
    const polished = polishPair(pair);

    if (
      polished.question.length <= this.policy.minQuestionLength ||
      polished.answer.length <= this.policy.minAnswerLength
    ) {
      return false;
    }

    if (this.policy.isDuplicate(polished.question, this.kept)) {
      return false;
    }

    this.kept.push({
      text: polished.question,
      tokens: tokenize(polished.question),
    });
    this.accepted.push(polished);
    return true;
  }

  /**
   * Offer pairs in order
   * @returns number of pairs kept
   */
  addAll(pairs: Iterable<FlashcardPair>): number {
    let added = 0;
    for (const pair of pairs) {
      if (this.add(pair)) {
        added++;
      }
    }
    return added;
  }

  get size(): number {
    return this.accepted.length;
  }

  toArray(limit?: number): FlashcardPair[] {
    return limit === undefined
      ? [...this.accepted]
      : this.accepted.slice(0, Math.max(0, limit));
  }
}
