/**
 * Flashcard Workflow State Definition
 * Following the LangGraph.js Annotation.Root pattern
 */

import { Annotation } from '@langchain/langgraph';
import type {
  CandidatePair,
  Chunk,
  CoverageTier,
  DetectedLanguage,
  DocumentStats,
  FlashcardGenerationRequest,
  FlashcardPair,
} from '../types';
import type { SupplementPlan } from '../stages/aggregate/pair-aggregator.service';

/**
 * Workflow Metrics
 */
export interface WorkflowMetrics {
  startTime: number;
  endTime?: number;
  totalDuration?: number;
  stagesCompleted: string[];
  analysisDuration?: number;
  generationDuration?: number;
  supplementDuration?: number;
  candidatesGenerated: number;
  failedChunks: number;
  supplementCandidates: number;
}

export const FlashcardState = Annotation.Root({
  // ============================================
  // Input
  // ============================================
  text: Annotation<string>,
  requestedCoverage: Annotation<string | null>,
  explicitTarget: Annotation<number | null>,
  instruction: Annotation<string | null>,
  languageOverride: Annotation<string | null>,

  // ============================================
  // Analysis
  // ============================================
  stats: Annotation<DocumentStats>,
  language: Annotation<DetectedLanguage>,
  coverage: Annotation<CoverageTier>,
  targetCount: Annotation<number>,

  // ============================================
  // Chunking & generation
  // ============================================
  chunks: Annotation<Chunk[]>,
  candidates: Annotation<CandidatePair[]>,
  usedFallback: Annotation<boolean>,

  // ============================================
  // Aggregation & supplementation
  // ============================================
  pairs: Annotation<FlashcardPair[]>,
  supplementPlan: Annotation<SupplementPlan | null>,
  supplemented: Annotation<boolean>,

  // ============================================
  // Output
  // ============================================
  finalPairs: Annotation<FlashcardPair[]>,

  // ============================================
  // Workflow metadata
  // ============================================
  currentStage: Annotation<string>,
  errors: Annotation<string[]>,
  metrics: Annotation<WorkflowMetrics>,
});

export type FlashcardStateType = typeof FlashcardState.State;

/**
 * Request after service-level defaults are applied
 */
export interface WorkflowInput {
  text: string;
  coverage: string | null;
  targetCount: number | null;
  instruction: string | null;
  language: string | null;
}

export function toWorkflowInput(
  request: FlashcardGenerationRequest,
): WorkflowInput {
  const instruction = request.instruction?.trim();
  const language = request.language?.trim();
  return {
    text: request.text,
    coverage: request.coverage ?? null,
    targetCount: request.targetCount ?? null,
    instruction: instruction ? instruction : null,
    language: language ? language.toLowerCase() : null,
  };
}

/**
 * Initial state factory
 */
export function createInitialState(
  input: WorkflowInput,
  defaultCoverage: CoverageTier,
): FlashcardStateType {
  return {
    // Input
    text: input.text,
    requestedCoverage: input.coverage,
    explicitTarget: input.targetCount,
    instruction: input.instruction,
    languageOverride: input.language,

    // Analysis (filled by analyze)
    stats: { charCount: 0, wordCount: 0, sentenceCount: 0 },
    language: { code: 'en', name: 'English' },
    coverage: defaultCoverage,
    targetCount: 0,

    // Chunking & generation
    chunks: [],
    candidates: [],
    usedFallback: false,

    // Aggregation & supplementation
    pairs: [],
    supplementPlan: null,
    supplemented: false,

    // Output
    finalPairs: [],

    // Workflow metadata
    currentStage: 'init',
    errors: [],
    metrics: {
      startTime: Date.now(),
      stagesCompleted: [],
      candidatesGenerated: 0,
      failedChunks: 0,
      supplementCandidates: 0,
    },
  };
}

export function completeStage(
  metrics: WorkflowMetrics,
  stage: string,
): WorkflowMetrics {
  return {
    ...metrics,
    stagesCompleted: [...metrics.stagesCompleted, stage],
  };
}
