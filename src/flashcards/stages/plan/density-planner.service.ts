/**
 * Density Planner Service
 * Maps document length and coverage tier to a target number of pairs.
 * One "page" is 2500 characters.
 */

import { Injectable, Logger } from '@nestjs/common';
import { COVERAGE_TIERS, CoverageTier } from '../../types';

export const CHARS_PER_PAGE = 2500;

interface TierDensity {
  pairsFor: (pages: number) => number;
  floor: number;
  ceiling: number;
}

const TIER_DENSITY: Record<CoverageTier, TierDensity> = {
  [CoverageTier.Minimal]: {
    pairsFor: (pages) => Math.floor(pages / 20),
    floor: 10,
    ceiling: 200,
  },
  [CoverageTier.Medium]: {
    pairsFor: (pages) => Math.floor(pages / 5),
    floor: 20,
    ceiling: 800,
  },
  [CoverageTier.Maximum]: {
    pairsFor: (pages) => Math.floor(pages * 2),
    floor: 50,
    ceiling: 5000,
  },
};

const MIN_PER_CHUNK = 10;
const MIN_PER_CHUNK_MAXIMUM = 30;

@Injectable()
export class DensityPlannerService {
  private readonly logger = new Logger(DensityPlannerService.name);

  /**
   * Compute the target pair count
   * @param charCount - Document length in characters
   * @param explicitTarget - Returned unchanged when provided
   */
  plan(
    charCount: number,
    tier: CoverageTier,
    explicitTarget?: number,
  ): number {
    if (explicitTarget !== undefined && explicitTarget !== null) {
      return explicitTarget;
    }

    const density = TIER_DENSITY[tier];
    const pages = Math.max(0, charCount) / CHARS_PER_PAGE;
    const raw = density.pairsFor(pages);

    return Math.min(density.ceiling, Math.max(density.floor, raw));
  }

  /**
   * Resolve a caller-supplied tier name, falling back to medium
   */
  resolveTier(
    value: string | undefined,
    fallback: CoverageTier = CoverageTier.Medium,
  ): CoverageTier {
    if (value === undefined || value.trim() === '') {
      return fallback;
    }

    const normalized = value.trim().toLowerCase();
    const tier = COVERAGE_TIERS.find((candidate) => candidate === normalized);
    if (!tier) {
      this.logger.warn(
        `Unknown coverage tier "${value}", using ${CoverageTier.Medium}`,
      );
      return CoverageTier.Medium;
    }
    return tier;
  }

  /**
   * Share of the target requested from each chunk
   */
  perChunkTarget(
    target: number,
    chunkCount: number,
    tier: CoverageTier,
  ): number {
    if (chunkCount <= 1) {
      return target;
    }

    const share = Math.max(MIN_PER_CHUNK, Math.floor(target / chunkCount));
    return tier === CoverageTier.Maximum
      ? Math.max(MIN_PER_CHUNK_MAXIMUM, share)
      : share;
  }
}
