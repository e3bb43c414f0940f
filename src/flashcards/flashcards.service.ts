/**
 * Flashcards Service
 * Pipeline boundary: document text in, ordered question/answer pairs out.
 */

import { Injectable, Logger } from '@nestjs/common';
import { FlashcardWorkflowService } from './workflow/flashcard-workflow.service';
import { toWorkflowInput } from './workflow/flashcard-state';
import { EmptyDocumentError } from './errors';
import type {
  FlashcardGenerationRequest,
  FlashcardGenerationResult,
} from './types';

@Injectable()
export class FlashcardsService {
  private readonly logger = new Logger(FlashcardsService.name);

  constructor(private readonly workflowService: FlashcardWorkflowService) {}

  /**
   * Generate flashcards for a document
   * @throws EmptyDocumentError when the text is blank
   * @throws GenerationAbortedError when the signal fires
   */
  async generateFlashcards(
    request: FlashcardGenerationRequest,
    signal?: AbortSignal,
  ): Promise<FlashcardGenerationResult> {
    if (!request.text || request.text.trim().length === 0) {
      throw new EmptyDocumentError();
    }

    const result = await this.workflowService.executeWorkflow(
      toWorkflowInput(request),
      signal,
    );

    if (result.pairs.length === 0) {
      this.logger.warn(
        `No flashcards produced for a ${result.stats.charCount} char document`,
      );
    }

    return result;
  }

  getHealth(): { workflowReady: boolean; backend: string; capability: string } {
    return this.workflowService.healthCheck();
  }
}
