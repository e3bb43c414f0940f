import type { CandidatePair } from '../../../types';
import { HeuristicExtractorService } from '../../heuristic/heuristic-extractor.service';
import type { GenerationBackend, GenerationRequest } from './generation-backend';

/**
 * Heuristic Backend
 * Key sentence extraction, no external calls
 */
export class HeuristicBackend implements GenerationBackend {
  readonly kind = 'heuristic';
  readonly capability = 'heuristic-extractor';

  constructor(private readonly heuristic: HeuristicExtractorService) {}

  generate(request: GenerationRequest): Promise<CandidatePair[]> {
    return Promise.resolve(
      this.heuristic.buildPairs(
        request.chunk.content,
        request.instruction,
        request.chunk.index,
      ),
    );
  }
}
