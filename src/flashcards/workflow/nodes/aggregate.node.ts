/**
 * Aggregate Node
 * Deduplicates candidates and decides whether to supplement
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { FlashcardStateType } from '../flashcard-state';
import { completeStage } from '../flashcard-state';
import type { GenerationBackendKind } from '../../types';
import { PairAggregatorService } from '../../stages/aggregate/pair-aggregator.service';
import { throwIfAborted } from './abort';

const logger = new Logger('AggregateNode');

export function createAggregateNode(
  aggregator: PairAggregatorService,
  backendKind: GenerationBackendKind,
) {
  return (
    state: FlashcardStateType,
    config?: RunnableConfig,
  ): Partial<FlashcardStateType> => {
    throwIfAborted(config?.signal);

    const pairs = aggregator.aggregate(
      state.candidates,
      state.targetCount,
      state.coverage,
    );

    // Another heuristic pass over the same text only repeats itself
    const canSupplement = backendKind !== 'heuristic' && !state.usedFallback;
    const supplementPlan = canSupplement
      ? aggregator.planSupplement(
          pairs.length,
          state.targetCount,
          state.coverage,
          state.instruction ?? undefined,
        )
      : null;

    logger.log(
      `[Aggregate] pairs=${pairs.length} target=${state.targetCount} supplement=${supplementPlan ? `${supplementPlan.focus}:${supplementPlan.requestCount}` : 'none'}`,
    );

    return {
      pairs,
      supplementPlan,
      currentStage: 'aggregate',
      metrics: completeStage(state.metrics, 'aggregate'),
    };
  };
}
