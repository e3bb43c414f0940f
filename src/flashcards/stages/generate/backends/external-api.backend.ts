/**
 * External API Backend
 * Prompts a text generation capability and parses the reply.
 */

import { Logger } from '@nestjs/common';
import type { CandidatePair } from '../../../types';
import { MalformedResponseError } from '../../../errors';
import type { ChunkingSettings, LlmSettings } from '../../../../config/generation-settings';
import { buildGenerationPrompt } from '../prompt-builder';
import { parseQaResponse } from '../qa-response.parser';
import type { TextGenerationCapability } from '../providers/types';
import type { GenerationBackend, GenerationRequest } from './generation-backend';

export class ExternalApiBackend implements GenerationBackend {
  readonly kind = 'external';
  private readonly logger = new Logger(ExternalApiBackend.name);

  constructor(
    private readonly textGeneration: TextGenerationCapability,
    private readonly llm: Pick<LlmSettings, 'temperature'>,
    private readonly chunking: Pick<ChunkingSettings, 'maxInputChars'>,
  ) {}

  get capability(): string {
    return this.textGeneration.name;
  }

  /**
   * @throws MalformedResponseError when the reply holds no pairs
   */
  async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<CandidatePair[]> {
    const prompt = buildGenerationPrompt({
      content: request.chunk.content,
      languageName: request.languageName,
      targetCount: request.targetCount,
      tier: request.tier,
      instruction: request.instruction,
      focus: request.focus,
      maxInputChars: this.chunking.maxInputChars,
    });

    const reply = await this.textGeneration.complete(
      {
        systemPrompt: prompt.systemPrompt,
        userPrompt: prompt.userPrompt,
        temperature: this.llm.temperature,
        maxOutputTokens: prompt.maxOutputTokens,
      },
      signal,
    );

    const pairs = parseQaResponse(reply);
    if (pairs.length === 0) {
      throw new MalformedResponseError(
        `No Q/A pairs found in ${reply.length} chars of reply`,
        request.chunk.index,
      );
    }

    this.logger.debug(
      `Chunk ${request.chunk.index}: parsed ${pairs.length} pairs (requested ${request.targetCount})`,
    );

    return pairs.map((pair) => ({ ...pair, chunkIndex: request.chunk.index }));
  }
}
