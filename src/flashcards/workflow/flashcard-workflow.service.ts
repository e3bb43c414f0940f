/**
 * Flashcard Workflow Service
 * Builds the LangGraph StateGraph for the generation pipeline:
 * analyze -> chunk -> generate -> aggregate -> [supplement] -> finalize
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { StateGraph, START, END } from '@langchain/langgraph';
import {
  FlashcardState,
  type FlashcardStateType,
  type WorkflowInput,
  createInitialState,
} from './flashcard-state';
import {
  createAggregateNode,
  createAnalyzeNode,
  createChunkNode,
  createFinalizeNode,
  createGenerateNode,
  createSupplementNode,
} from './nodes';
import {
  GENERATION_SETTINGS,
  type GenerationSettings,
} from '../../config/generation-settings';
import { GenerationAbortedError } from '../errors';
import { LanguageIdentifierService } from '../stages/language/language-identifier.service';
import { DensityPlannerService } from '../stages/plan/density-planner.service';
import { TextChunkerService } from '../stages/chunk/text-chunker.service';
import { PairGeneratorService } from '../stages/generate/pair-generator.service';
import { PairAggregatorService } from '../stages/aggregate/pair-aggregator.service';
import type { FlashcardGenerationResult } from '../types';

/**
 * Type guard to validate workflow result matches expected state type
 */
function isFlashcardStateType(value: unknown): value is FlashcardStateType {
  if (!value || typeof value !== 'object') {
    return false;
  }

  const state = value as Record<string, unknown>;

  return (
    typeof state.text === 'string' &&
    typeof state.coverage === 'string' &&
    typeof state.targetCount === 'number' &&
    typeof state.currentStage === 'string' &&
    typeof state.language === 'object' &&
    state.language !== null &&
    Array.isArray(state.chunks) &&
    Array.isArray(state.finalPairs) &&
    Array.isArray(state.errors) &&
    typeof state.metrics === 'object' &&
    state.metrics !== null
  );
}

export interface FlashcardGraphDeps {
  settings: GenerationSettings;
  languageIdentifier: LanguageIdentifierService;
  planner: DensityPlannerService;
  chunker: TextChunkerService;
  pairGenerator: PairGeneratorService;
  aggregator: PairAggregatorService;
}

/**
 * Graph: analyze -> chunk -> generate -> aggregate -> [supplement] -> finalize
 */
export function buildFlashcardGraph(deps: FlashcardGraphDeps) {
  return new StateGraph(FlashcardState)
    .addNode(
      'analyze',
      createAnalyzeNode(deps.languageIdentifier, deps.planner, deps.settings),
    )
    .addNode('chunk', createChunkNode(deps.chunker, deps.settings.chunking))
    .addNode(
      'generate',
      createGenerateNode(
        deps.pairGenerator,
        deps.planner,
        deps.settings.chunking,
      ),
    )
    .addNode(
      'aggregate',
      createAggregateNode(deps.aggregator, deps.pairGenerator.backendKind),
    )
    .addNode(
      'supplement',
      createSupplementNode(
        deps.pairGenerator,
        deps.aggregator,
        deps.settings.chunking,
      ),
    )
    .addNode('finalize', createFinalizeNode())
    .addEdge(START, 'analyze')
    .addEdge('analyze', 'chunk')
    .addEdge('chunk', 'generate')
    .addEdge('generate', 'aggregate')
    // Conditional edge: at most one supplementation round
    .addConditionalEdges(
      'aggregate',
      (state: FlashcardStateType) =>
        state.supplementPlan ? 'shortfall' : 'sufficient',
      {
        shortfall: 'supplement',
        sufficient: 'finalize',
      },
    )
    .addEdge('supplement', 'finalize')
    .addEdge('finalize', END);
}

export type CompiledFlashcardWorkflow = ReturnType<
  ReturnType<typeof buildFlashcardGraph>['compile']
>;

@Injectable()
export class FlashcardWorkflowService {
  private readonly logger = new Logger(FlashcardWorkflowService.name);
  private workflow: CompiledFlashcardWorkflow | null = null;

  constructor(
    @Inject(GENERATION_SETTINGS)
    private readonly settings: GenerationSettings,
    private readonly languageIdentifier: LanguageIdentifierService,
    private readonly planner: DensityPlannerService,
    private readonly chunker: TextChunkerService,
    private readonly pairGenerator: PairGeneratorService,
    private readonly aggregator: PairAggregatorService,
  ) {
    this.initializeWorkflow();
  }

  private initializeWorkflow(): void {
    this.logger.log('Initializing LangGraph flashcard workflow...');

    try {
      const graph = buildFlashcardGraph({
        settings: this.settings,
        languageIdentifier: this.languageIdentifier,
        planner: this.planner,
        chunker: this.chunker,
        pairGenerator: this.pairGenerator,
        aggregator: this.aggregator,
      });

      this.workflow = graph.compile();

      this.logger.log('✓ LangGraph flashcard workflow initialized');
    } catch (error) {
      this.logger.error(
        'Failed to initialize LangGraph workflow',
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  /**
   * Execute the flashcard workflow
   * @param input - Normalized request
   * @param signal - Aborts the run, including in-flight provider calls
   * @throws GenerationAbortedError when the signal fires
   */
  async executeWorkflow(
    input: WorkflowInput,
    signal?: AbortSignal,
  ): Promise<FlashcardGenerationResult> {
    this.logger.log(
      `Starting flashcard workflow (chars=${input.text.length}, coverage=${input.coverage ?? this.settings.defaultCoverage}, target=${input.targetCount ?? 'auto'})`,
    );

    if (!this.workflow) {
      throw new Error('Workflow not initialized');
    }

    try {
      const initialState = createInitialState(
        input,
        this.settings.defaultCoverage,
      );
      const result = await this.workflow.invoke(initialState, { signal });

      if (!isFlashcardStateType(result)) {
        throw new Error('Invalid workflow result - type guard failed');
      }

      const formatted = this.formatResult(result);
      this.logger.log(
        `Flashcard workflow completed: ${formatted.pairs.length}/${formatted.targetCount} pairs, ${formatted.metrics.durationMs}ms`,
      );
      return formatted;
    } catch (error) {
      if (signal?.aborted || error instanceof GenerationAbortedError) {
        this.logger.warn('Flashcard workflow aborted by caller');
        throw error instanceof GenerationAbortedError
          ? error
          : new GenerationAbortedError();
      }
      this.logger.error(
        'Flashcard workflow execution failed',
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  /**
   * Format workflow state into the pipeline result
   */
  private formatResult(state: FlashcardStateType): FlashcardGenerationResult {
    return {
      pairs: state.finalPairs,
      targetCount: state.targetCount,
      coverage: state.coverage,
      language: state.language,
      backend: state.usedFallback ? 'heuristic' : this.pairGenerator.backendKind,
      chunkCount: state.chunks.length,
      supplemented: state.supplemented,
      stats: state.stats,
      metrics: {
        durationMs:
          state.metrics.totalDuration ?? Date.now() - state.metrics.startTime,
        stagesCompleted: state.metrics.stagesCompleted,
        candidatesGenerated: state.metrics.candidatesGenerated,
        failedChunks: state.metrics.failedChunks,
        supplementCandidates: state.metrics.supplementCandidates,
      },
    };
  }

  /**
   * Health check for workflow readiness
   */
  healthCheck(): { workflowReady: boolean; backend: string; capability: string } {
    return {
      workflowReady: this.workflow !== null,
      backend: this.pairGenerator.backendKind,
      capability: this.pairGenerator.capability,
    };
  }
}
