/**
 * Flashcard Pipeline Types
 * Shared shapes passed between the generation stages
 */

/**
 * Caller-selected density setting
 */
export enum CoverageTier {
  Minimal = 'minimal',
  Medium = 'medium',
  Maximum = 'maximum',
}

export const COVERAGE_TIERS: readonly CoverageTier[] = [
  CoverageTier.Minimal,
  CoverageTier.Medium,
  CoverageTier.Maximum,
];

/**
 * Derived scalar attributes of the input document
 */
export interface DocumentStats {
  charCount: number;
  wordCount: number;
  sentenceCount: number;
}

/**
 * Contiguous slice of the document submitted as one generation request
 */
export interface Chunk {
  index: number;
  content: string;
}

/**
 * Unfiltered pair produced by one generation request
 */
export interface CandidatePair {
  question: string;
  answer: string;
  chunkIndex: number;
}

/**
 * Deduplicated, quality-filtered output unit
 */
export interface FlashcardPair {
  question: string;
  answer: string;
}

export interface DetectedLanguage {
  code: string;
  name: string;
}

export type GenerationBackendKind = 'external' | 'local' | 'heuristic';

/**
 * Input of the pipeline boundary call
 */
export interface FlashcardGenerationRequest {
  text: string;
  coverage?: CoverageTier | string;
  targetCount?: number;
  instruction?: string;
  language?: string;
}

export interface GenerationMetrics {
  durationMs: number;
  stagesCompleted: string[];
  candidatesGenerated: number;
  failedChunks: number;
  supplementCandidates: number;
}

/**
 * Output of the pipeline boundary call
 */
export interface FlashcardGenerationResult {
  pairs: FlashcardPair[];
  targetCount: number;
  coverage: CoverageTier;
  language: DetectedLanguage;
  backend: GenerationBackendKind;
  chunkCount: number;
  supplemented: boolean;
  stats: DocumentStats;
  metrics: GenerationMetrics;
}
