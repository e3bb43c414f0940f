/**
 * Supplement Node
 * One extra request over the start of the document; failures are logged only
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { FlashcardStateType } from '../flashcard-state';
import { completeStage } from '../flashcard-state';
import type { ChunkingSettings } from '../../../config/generation-settings';
import { GenerationAbortedError, describeError } from '../../errors';
import { PairAggregatorService } from '../../stages/aggregate/pair-aggregator.service';
import { PairGeneratorService } from '../../stages/generate/pair-generator.service';
import { isAbort, throwIfAborted } from './abort';

const logger = new Logger('SupplementNode');

export function createSupplementNode(
  pairGenerator: PairGeneratorService,
  aggregator: PairAggregatorService,
  settings: ChunkingSettings,
) {
  return async (
    state: FlashcardStateType,
    config?: RunnableConfig,
  ): Promise<Partial<FlashcardStateType>> => {
    const signal = config?.signal;
    throwIfAborted(signal);

    const plan = state.supplementPlan;
    if (!plan) {
      return { currentStage: 'supplement' };
    }

    const startTime = Date.now();
    // Indexed after every real chunk so merge order stays stable
    const source = {
      index: state.chunks.length,
      content: state.text.slice(0, settings.maxInputChars),
    };

    try {
      const additional = await pairGenerator.generate(
        source,
        state.language.name,
        plan.requestCount,
        state.coverage,
        {
          instruction: plan.instruction,
          focus: plan.focus === 'facts' ? 'facts' : 'standard',
          signal,
        },
      );
      const pairs = aggregator.merge(
        state.pairs,
        additional,
        state.targetCount,
        state.coverage,
      );

      logger.log(
        `[Supplement] focus=${plan.focus} requested=${plan.requestCount} received=${additional.length} pairs=${state.pairs.length}->${pairs.length}`,
      );

      return {
        pairs,
        supplemented: true,
        currentStage: 'supplement',
        metrics: {
          ...completeStage(state.metrics, 'supplement'),
          supplementDuration: Date.now() - startTime,
          supplementCandidates: additional.length,
        },
      };
    } catch (error) {
      if (isAbort(error, signal)) {
        throw new GenerationAbortedError();
      }
      logger.warn(
        `[Supplement] status=failed focus=${plan.focus} error=${describeError(error)}`,
      );
      return {
        currentStage: 'supplement_failed',
        errors: [...state.errors, `Supplement failed: ${describeError(error)}`],
        metrics: {
          ...completeStage(state.metrics, 'supplement'),
          supplementDuration: Date.now() - startTime,
        },
      };
    }
  };
}
