import {
  DEFAULT_GENERATION_SETTINGS,
  type GenerationSettings,
} from '../config/generation-settings';

export interface TestSettingsOverrides {
  backend?: GenerationSettings['backend'];
  defaultCoverage?: GenerationSettings['defaultCoverage'];
  llm?: Partial<GenerationSettings['llm']>;
  local?: Partial<GenerationSettings['local']>;
  chunking?: Partial<GenerationSettings['chunking']>;
  aggregation?: Partial<GenerationSettings['aggregation']>;
}

/**
 * Default settings with per-section overrides
 */
export function createTestSettings(
  overrides: TestSettingsOverrides = {},
): GenerationSettings {
  const defaults = DEFAULT_GENERATION_SETTINGS;
  return {
    backend: overrides.backend ?? defaults.backend,
    defaultCoverage: overrides.defaultCoverage ?? defaults.defaultCoverage,
    llm: { ...defaults.llm, ...overrides.llm },
    local: { ...defaults.local, ...overrides.local },
    chunking: { ...defaults.chunking, ...overrides.chunking },
    aggregation: { ...defaults.aggregation, ...overrides.aggregation },
  };
}
