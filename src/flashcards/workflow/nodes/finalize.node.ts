/**
 * Finalize Node
 * Truncates to the target and closes the metrics
 */

import { Logger } from '@nestjs/common';
import type { FlashcardStateType } from '../flashcard-state';
import { completeStage } from '../flashcard-state';

const logger = new Logger('FinalizeNode');

export function createFinalizeNode() {
  return (state: FlashcardStateType): Partial<FlashcardStateType> => {
    const finalPairs = state.pairs.slice(0, state.targetCount);
    const endTime = Date.now();
    const totalDuration = endTime - state.metrics.startTime;

    logger.log(
      `[Finalize] pairs=${finalPairs.length} target=${state.targetCount} supplemented=${state.supplemented} duration=${totalDuration}ms`,
    );

    return {
      finalPairs,
      currentStage: 'finalize',
      metrics: {
        ...completeStage(state.metrics, 'finalize'),
        endTime,
        totalDuration,
      },
    };
  };
}
