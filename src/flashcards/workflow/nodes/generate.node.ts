/**
 * Generate Node
 * Single chunk: one request, heuristic fallback over the whole document
 * on failure. Several chunks: batched dispatch, failed chunks yield nothing.
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { FlashcardStateType } from '../flashcard-state';
import { completeStage } from '../flashcard-state';
import type { CandidatePair, Chunk } from '../../types';
import type { ChunkingSettings } from '../../../config/generation-settings';
import {
  GenerationAbortedError,
  MalformedResponseError,
  describeError,
} from '../../errors';
import { PairGeneratorService } from '../../stages/generate/pair-generator.service';
import { DensityPlannerService } from '../../stages/plan/density-planner.service';
import { isAbort, throwIfAborted } from './abort';

const logger = new Logger('GenerateNode');

interface ChunkOutcome {
  pairs: CandidatePair[];
  failed: boolean;
  error?: string;
}

export function createGenerateNode(
  pairGenerator: PairGeneratorService,
  planner: DensityPlannerService,
  settings: ChunkingSettings,
) {
  return async (
    state: FlashcardStateType,
    config?: RunnableConfig,
  ): Promise<Partial<FlashcardStateType>> => {
    const signal = config?.signal;
    throwIfAborted(signal);
    const startTime = Date.now();
    const instruction = state.instruction ?? undefined;

    if (state.chunks.length === 1) {
      const chunk = state.chunks[0];
      let candidates: CandidatePair[];
      let usedFallback = false;
      let failedChunks = 0;
      const errors = [...state.errors];

      try {
        candidates = await pairGenerator.generate(
          chunk,
          state.language.name,
          state.targetCount,
          state.coverage,
          { instruction, signal },
        );
      } catch (error) {
        if (isAbort(error, signal)) {
          throw new GenerationAbortedError();
        }
        failedChunks = 1;
        errors.push(`Generation failed: ${describeError(error)}`);

        if (error instanceof MalformedResponseError) {
          logger.warn(`[Generate] chunk=0 status=malformed error=${error.message}`);
          candidates = [];
        } else {
          logger.warn(
            `[Generate] chunk=0 status=failed fallback=heuristic error=${describeError(error)}`,
          );
          candidates = pairGenerator.fallback(state.text, instruction);
          usedFallback = true;
        }
      }

      return buildUpdate(state, candidates, failedChunks, usedFallback, errors, startTime);
    }

    const perChunk = planner.perChunkTarget(
      state.targetCount,
      state.chunks.length,
      state.coverage,
    );
    const concurrency = Math.max(1, settings.concurrency);

    const generateChunk = async (chunk: Chunk): Promise<ChunkOutcome> => {
      try {
        const pairs = await pairGenerator.generate(
          chunk,
          state.language.name,
          perChunk,
          state.coverage,
          { instruction, signal },
        );
        return { pairs, failed: false };
      } catch (error) {
        if (isAbort(error, signal)) {
          throw new GenerationAbortedError();
        }
        logger.warn(
          `[Generate] chunk=${chunk.index + 1}/${state.chunks.length} status=failed error=${describeError(error)}`,
        );
        return {
          pairs: [],
          failed: true,
          error: `Chunk ${chunk.index} failed: ${describeError(error)}`,
        };
      }
    };

    logger.log(
      `[Generate] chunks=${state.chunks.length} per_chunk=${perChunk} concurrency=${concurrency}`,
    );

    // Batches keep chunk order regardless of completion order
    const outcomes: ChunkOutcome[] = [];
    for (let i = 0; i < state.chunks.length; i += concurrency) {
      throwIfAborted(signal);
      const batch = state.chunks.slice(i, i + concurrency);
      outcomes.push(...(await Promise.all(batch.map(generateChunk))));
    }

    const candidates = outcomes.flatMap((outcome) => outcome.pairs);
    const failed = outcomes.filter((outcome) => outcome.failed);
    const errors = [
      ...state.errors,
      ...failed.flatMap((outcome) => (outcome.error ? [outcome.error] : [])),
    ];

    return buildUpdate(state, candidates, failed.length, false, errors, startTime);
  };
}

function buildUpdate(
  state: FlashcardStateType,
  candidates: CandidatePair[],
  failedChunks: number,
  usedFallback: boolean,
  errors: string[],
  startTime: number,
): Partial<FlashcardStateType> {
  const generationDuration = Date.now() - startTime;
  logger.log(
    `[Generate] status=completed candidates=${candidates.length} failed_chunks=${failedChunks} fallback=${usedFallback} duration=${generationDuration}ms`,
  );

  return {
    candidates,
    usedFallback,
    errors,
    currentStage: 'generate',
    metrics: {
      ...completeStage(state.metrics, 'generate'),
      generationDuration,
      candidatesGenerated: candidates.length,
      failedChunks,
    },
  };
}
