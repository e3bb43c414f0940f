/**
 * Pair Aggregator Service
 * Merges candidates across chunks, deduplicates, filters and plans
 * the optional supplementation pass.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  GENERATION_SETTINGS,
  type GenerationSettings,
} from '../../../config/generation-settings';
import {
  CoverageTier,
  type CandidatePair,
  type FlashcardPair,
} from '../../types';
import { createDedupPolicy } from './dedup-policy';
import { PairAccumulator } from './pair-accumulator';

export const MAX_FACT_SUPPLEMENT = 50;
export const MISSED_CONTENT_INSTRUCTION =
  'Extract important content that may have been missed';

export type SupplementFocus = 'facts' | 'missed';

export interface SupplementPlan {
  focus: SupplementFocus;
  requestCount: number;
  instruction?: string;
}

/**
 * Chunk order first, then order within the chunk
 */
export function orderCandidates(candidates: CandidatePair[]): CandidatePair[] {
  return candidates
    .map((candidate, position) => ({ candidate, position }))
    .sort(
      (a, b) =>
        a.candidate.chunkIndex - b.candidate.chunkIndex ||
        a.position - b.position,
    )
    .map(({ candidate }) => candidate);
}

@Injectable()
export class PairAggregatorService {
  private readonly logger = new Logger(PairAggregatorService.name);

  constructor(
    @Inject(GENERATION_SETTINGS)
    private readonly settings: GenerationSettings,
  ) {}

  createAccumulator(tier: CoverageTier): PairAccumulator {
    return new PairAccumulator(
      createDedupPolicy(tier, this.settings.aggregation),
    );
  }

  /**
   * Deduplicate and filter candidates, truncated to the target
   */
  aggregate(
    candidates: CandidatePair[],
    target: number,
    tier: CoverageTier,
  ): FlashcardPair[] {
    const accumulator = this.createAccumulator(tier);
    const kept = accumulator.addAll(orderCandidates(candidates));

    this.logger.log(
      `Aggregated ${candidates.length} candidates into ${kept} pairs (policy=${accumulator.policy.name}, target=${target})`,
    );

    return accumulator.toArray(target);
  }

  /**
   * Add supplementary candidates behind already kept pairs
   */
  merge(
    kept: FlashcardPair[],
    additional: CandidatePair[],
    target: number,
    tier: CoverageTier,
  ): FlashcardPair[] {
    const accumulator = this.createAccumulator(tier);
    accumulator.addAll(kept);
    const before = accumulator.size;
    accumulator.addAll(orderCandidates(additional));

    this.logger.log(
      `Supplement added ${accumulator.size - before} of ${additional.length} candidates`,
    );

    return accumulator.toArray(target);
  }

  /**
   * Decide whether a shortfall warrants one more request
   * @returns null when the count is close enough to the target
   */
  planSupplement(
    count: number,
    target: number,
    tier: CoverageTier,
    userInstruction?: string,
  ): SupplementPlan | null {
    const remaining = target - count;
    if (remaining <= 0) {
      return null;
    }

    const { supplementThreshold, maximumSupplementThreshold } =
      this.settings.aggregation;

    if (tier === CoverageTier.Maximum) {
      if (count >= target * maximumSupplementThreshold) {
        return null;
      }
      return {
        focus: 'facts',
        requestCount: Math.min(remaining, MAX_FACT_SUPPLEMENT),
        instruction: userInstruction,
      };
    }

    if (count >= target * supplementThreshold) {
      return null;
    }
    return {
      focus: 'missed',
      requestCount: remaining,
      instruction: [userInstruction?.trim(), MISSED_CONTENT_INSTRUCTION]
        .filter((part): part is string => Boolean(part))
        .join(' '),
    };
  }
}
