/**
 * Pair Generator Service
 * Runs one generation request against the configured backend.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  CandidatePair,
  Chunk,
  CoverageTier,
  GenerationBackendKind,
} from '../../types';
import { HeuristicExtractorService } from '../heuristic/heuristic-extractor.service';
import {
  GENERATION_BACKEND,
  type GenerationBackend,
} from './backends/generation-backend';
import type { PromptFocus } from './prompt-builder';

export interface PairGenerationOptions {
  instruction?: string;
  focus?: PromptFocus;
  signal?: AbortSignal;
}

@Injectable()
export class PairGeneratorService {
  private readonly logger = new Logger(PairGeneratorService.name);

  constructor(
    @Inject(GENERATION_BACKEND)
    private readonly backend: GenerationBackend,
    private readonly heuristic: HeuristicExtractorService,
  ) {}

  get backendKind(): GenerationBackendKind {
    return this.backend.kind;
  }

  get capability(): string {
    return this.backend.capability;
  }

  /**
   * Generate candidate pairs for one chunk
   * @throws capability errors from the backend; callers decide how to recover
   */
  async generate(
    chunk: Chunk,
    languageName: string,
    targetCount: number,
    tier: CoverageTier,
    options: PairGenerationOptions = {},
  ): Promise<CandidatePair[]> {
    const startTime = Date.now();

    const pairs = await this.backend.generate(
      {
        chunk,
        languageName,
        targetCount,
        tier,
        instruction: options.instruction,
        focus: options.focus,
      },
      options.signal,
    );

    this.logger.log(
      `[PairGenerator] chunk=${chunk.index} backend=${this.backend.kind} target=${targetCount} pairs=${pairs.length} duration=${Date.now() - startTime}ms`,
    );

    return pairs;
  }

  /**
   * Heuristic extraction over the whole document
   */
  fallback(text: string, instruction?: string): CandidatePair[] {
    const pairs = this.heuristic.buildPairs(text, instruction, 0);
    this.logger.warn(
      `[PairGenerator] heuristic fallback produced ${pairs.length} pairs`,
    );
    return pairs;
  }
}
