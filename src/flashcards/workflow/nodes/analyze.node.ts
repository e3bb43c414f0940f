/**
 * Analyze Node
 * Document statistics, language, coverage tier and target count
 */

import { Logger } from '@nestjs/common';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { FlashcardStateType } from '../flashcard-state';
import { completeStage } from '../flashcard-state';
import type { DocumentStats } from '../../types';
import type { GenerationSettings } from '../../../config/generation-settings';
import {
  LanguageIdentifierService,
  getLanguageName,
} from '../../stages/language/language-identifier.service';
import { DensityPlannerService } from '../../stages/plan/density-planner.service';
import { throwIfAborted } from './abort';

const logger = new Logger('AnalyzeNode');

export function computeStats(text: string): DocumentStats {
  return {
    charCount: text.length,
    wordCount: text.split(/\s+/).filter((word) => word.length > 0).length,
    sentenceCount: text
      .split('.')
      .filter((sentence) => sentence.trim().length > 0).length,
  };
}

export function createAnalyzeNode(
  languageIdentifier: LanguageIdentifierService,
  planner: DensityPlannerService,
  settings: GenerationSettings,
) {
  return (
    state: FlashcardStateType,
    config?: RunnableConfig,
  ): Partial<FlashcardStateType> => {
    throwIfAborted(config?.signal);
    const startTime = Date.now();

    const stats = computeStats(state.text);
    const code =
      state.languageOverride ?? languageIdentifier.identify(state.text);
    const coverage = planner.resolveTier(
      state.requestedCoverage ?? undefined,
      settings.defaultCoverage,
    );
    const targetCount = planner.plan(
      stats.charCount,
      coverage,
      state.explicitTarget ?? undefined,
    );

    const analysisDuration = Date.now() - startTime;
    logger.log(
      `[Analyze] chars=${stats.charCount} words=${stats.wordCount} sentences=${stats.sentenceCount} language=${code} coverage=${coverage} target=${targetCount} duration=${analysisDuration}ms`,
    );

    return {
      stats,
      language: { code, name: getLanguageName(code) },
      coverage,
      targetCount,
      currentStage: 'analyze',
      metrics: {
        ...completeStage(state.metrics, 'analyze'),
        analysisDuration,
      },
    };
  };
}
