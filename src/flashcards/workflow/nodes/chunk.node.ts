/**
 * Chunk Node
 * Short documents go through as a single chunk
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { FlashcardStateType } from '../flashcard-state';
import { completeStage } from '../flashcard-state';
import type { ChunkingSettings } from '../../../config/generation-settings';
import { TextChunkerService } from '../../stages/chunk/text-chunker.service';
import { throwIfAborted } from './abort';

const logger = new Logger('ChunkNode');

export function createChunkNode(
  chunker: TextChunkerService,
  settings: ChunkingSettings,
) {
  return (
    state: FlashcardStateType,
    config?: RunnableConfig,
  ): Partial<FlashcardStateType> => {
    throwIfAborted(config?.signal);

    const chunks =
      state.text.length <= settings.maxChunkSize
        ? [{ index: 0, content: state.text }]
        : chunker.split(state.text, settings.maxChunkSize);

    logger.log(
      `[Chunk] chunks=${chunks.length} max_chunk_size=${settings.maxChunkSize}`,
    );

    return {
      chunks,
      currentStage: 'chunk',
      metrics: completeStage(state.metrics, 'chunk'),
    };
  };
}
