/**
 * Generation Backend
 * One variant is selected at startup; the pipeline only sees this contract.
 */

import type {
  CandidatePair,
  Chunk,
  CoverageTier,
  GenerationBackendKind,
} from '../../../types';
import type { PromptFocus } from '../prompt-builder';

export const GENERATION_BACKEND = 'GENERATION_BACKEND';

export interface GenerationRequest {
  chunk: Chunk;
  languageName: string;
  targetCount: number;
  tier: CoverageTier;
  instruction?: string;
  focus?: PromptFocus;
}

export interface GenerationBackend {
  readonly kind: GenerationBackendKind;
  /** Capability behind the backend, for health reporting */
  readonly capability: string;

  generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<CandidatePair[]>;
}
