/**
 * Flashcards Module
 * Generation pipeline stages, LangGraph workflow and TCP surface
 */

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { generationSettingsProvider } from '../config/generation-settings';
import {
  LanguageIdentifierService,
  STATISTICAL_LANGUAGE_DETECTOR,
  TinyLdLanguageDetector,
} from './stages/language/language-identifier.service';
import { TextChunkerService } from './stages/chunk/text-chunker.service';
import { DensityPlannerService } from './stages/plan/density-planner.service';
import { HeuristicExtractorService } from './stages/heuristic/heuristic-extractor.service';
import { PairAggregatorService } from './stages/aggregate/pair-aggregator.service';
import { PairGeneratorService } from './stages/generate/pair-generator.service';
import { LLMProviderFactory } from './stages/generate/providers/llm-provider.factory';
import { generationBackendProvider } from './stages/generate/backends/generation-backend.factory';
import { FlashcardWorkflowService } from './workflow/flashcard-workflow.service';
import { FlashcardsService } from './flashcards.service';
import { FlashcardsTcpController } from './flashcards-tcp.controller';

@Module({
  imports: [ConfigModule],
  providers: [
    // Configuration
    generationSettingsProvider,
    // Provider factories
    LLMProviderFactory,
    generationBackendProvider,
    {
      provide: STATISTICAL_LANGUAGE_DETECTOR,
      useClass: TinyLdLanguageDetector,
    },
    // Pipeline stages
    LanguageIdentifierService,
    TextChunkerService,
    DensityPlannerService,
    HeuristicExtractorService,
    PairGeneratorService,
    PairAggregatorService,
    // Workflow
    FlashcardWorkflowService,
    FlashcardsService,
  ],
  controllers: [FlashcardsTcpController],
  exports: [FlashcardsService],
})
export class FlashcardsModule {}
