/**
 * Generation Backend Factory
 * Selects the backend once from configuration. A missing credential
 * for the external backend degrades to the heuristic backend.
 */

import { Logger } from '@nestjs/common';
import {
  GENERATION_SETTINGS,
  type GenerationSettings,
} from '../../../../config/generation-settings';
import { CapabilityUnavailableError } from '../../../errors';
import { HeuristicExtractorService } from '../../heuristic/heuristic-extractor.service';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { LangChainTextGeneration } from '../providers/langchain-text-generation';
import { OllamaSummarization } from '../providers/ollama-summarization';
import { ExternalApiBackend } from './external-api.backend';
import { HeuristicBackend } from './heuristic.backend';
import { LocalModelBackend } from './local-model.backend';
import { GENERATION_BACKEND, type GenerationBackend } from './generation-backend';

const logger = new Logger('GenerationBackendFactory');

export function createGenerationBackend(
  settings: GenerationSettings,
  llmFactory: LLMProviderFactory,
  heuristic: HeuristicExtractorService,
): GenerationBackend {
  switch (settings.backend) {
    case 'external': {
      try {
        // Probe once so missing credentials surface at startup
        llmFactory.createChatModel();
      } catch (error) {
        if (error instanceof CapabilityUnavailableError) {
          logger.warn(
            `External generation unavailable (${error.message}); using heuristic extraction`,
          );
          return new HeuristicBackend(heuristic);
        }
        throw error;
      }

      logger.log(
        `Using external generation backend (provider=${settings.llm.provider})`,
      );
      return new ExternalApiBackend(
        new LangChainTextGeneration(
          settings.llm.provider,
          (options) => llmFactory.createChatModel(undefined, options),
          settings.llm.timeoutMs,
        ),
        settings.llm,
        settings.chunking,
      );
    }

    case 'local':
      logger.log(
        `Using local summarization backend (model=${settings.local.model})`,
      );
      return new LocalModelBackend(
        new OllamaSummarization(
          (options) =>
            llmFactory.createChatModel('ollama', {
              ...options,
              model: settings.local.model,
            }),
          settings.llm.timeoutMs,
        ),
        heuristic,
        settings.local,
      );

    case 'heuristic':
    default:
      logger.log('Using heuristic generation backend');
      return new HeuristicBackend(heuristic);
  }
}

export const generationBackendProvider = {
  provide: GENERATION_BACKEND,
  useFactory: (
    settings: GenerationSettings,
    llmFactory: LLMProviderFactory,
    heuristic: HeuristicExtractorService,
  ): GenerationBackend =>
    createGenerationBackend(settings, llmFactory, heuristic),
  inject: [GENERATION_SETTINGS, LLMProviderFactory, HeuristicExtractorService],
};
