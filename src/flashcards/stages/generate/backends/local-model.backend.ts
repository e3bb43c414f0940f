/**
 * Local Model Backend
 * Summarizes the chunk window by window, then turns summary sentences
 * into questions.
 */

import { Logger } from '@nestjs/common';
import type { CandidatePair } from '../../../types';
import {
  GenerationAbortedError,
  GenerationCallError,
  describeError,
} from '../../../errors';
import type { LocalModelSettings } from '../../../../config/generation-settings';
import {
  HeuristicExtractorService,
  splitSentences,
} from '../../heuristic/heuristic-extractor.service';
import type { SummarizationCapability } from '../providers/types';
import type { GenerationBackend, GenerationRequest } from './generation-backend';

const MAX_SUMMARY_POINTS = 15;

export class LocalModelBackend implements GenerationBackend {
  readonly kind = 'local';
  private readonly logger = new Logger(LocalModelBackend.name);

  constructor(
    private readonly summarizer: SummarizationCapability,
    private readonly heuristic: HeuristicExtractorService,
    private readonly settings: LocalModelSettings,
  ) {}

  get capability(): string {
    return this.summarizer.name;
  }

  async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<CandidatePair[]> {
    const text = request.chunk.content;
    const windows: string[] = [];
    for (let start = 0; start < text.length; start += this.settings.windowSize) {
      windows.push(text.slice(start, start + this.settings.windowSize));
    }

    const summaries: string[] = [];
    for (const [i, window] of windows.entries()) {
      try {
        summaries.push(
          await this.summarizer.summarize(
            window,
            this.settings.summaryMaxLength,
            this.settings.summaryMinLength,
            signal,
          ),
        );
      } catch (error) {
        if (error instanceof GenerationAbortedError) {
          throw error;
        }
        this.logger.warn(
          `Chunk ${request.chunk.index}: skipping window ${i + 1}/${windows.length}: ${describeError(error)}`,
        );
      }
    }

    if (windows.length > 0 && summaries.length === 0) {
      throw new GenerationCallError(
        `All ${windows.length} summarization windows failed for chunk ${request.chunk.index}`,
      );
    }

    return splitSentences(summaries.join(' '))
      .slice(0, MAX_SUMMARY_POINTS)
      .map((point) => ({
        question: this.heuristic.statementToQuestion(point),
        answer: point,
        chunkIndex: request.chunk.index,
      }));
  }
}
