import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_GENERATION_SETTINGS,
  buildGenerationSettings,
} from './generation-settings';
import { CoverageTier } from '../flashcards/types';

describe('buildGenerationSettings', () => {
  it('uses defaults when nothing is configured', () => {
    const settings = buildGenerationSettings(new ConfigService({}));

    expect(settings).toEqual(DEFAULT_GENERATION_SETTINGS);
    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.llm)).toBe(true);
    expect(Object.isFrozen(settings.llm.credentials)).toBe(true);
    expect(Object.isFrozen(settings.local)).toBe(true);
    expect(Object.isFrozen(settings.chunking)).toBe(true);
    expect(Object.isFrozen(settings.aggregation)).toBe(true);
  });

  it('falls back to defaults for non-positive chunk limits', () => {
    const settings = buildGenerationSettings(
      new ConfigService({
        GENERATION_MAX_CHUNK_SIZE: '0',
        GENERATION_MAX_INPUT_CHARS: '-500',
      }),
    );

    expect(settings.chunking.maxChunkSize).toBe(70_000);
    expect(settings.chunking.maxInputChars).toBe(70_000);
  });

  it('keeps positive chunk limits', () => {
    const settings = buildGenerationSettings(
      new ConfigService({
        GENERATION_MAX_CHUNK_SIZE: '12000',
        GENERATION_MAX_INPUT_CHARS: '9000',
      }),
    );

    expect(settings.chunking.maxChunkSize).toBe(12_000);
    expect(settings.chunking.maxInputChars).toBe(9_000);
  });

  it('reads and normalizes environment values', () => {
    const settings = buildGenerationSettings(
      new ConfigService({
        GENERATION_BACKEND: 'Local',
        DEFAULT_COVERAGE: 'maximum',
        LLM_PROVIDER: 'anthropic',
        LLM_TIMEOUT_SECONDS: '30',
        LLM_MAX_RETRIES: '-3',
        ANTHROPIC_API_KEY: ' test-secret ',
        GENERATION_CONCURRENCY: '4.7',
        SUPPLEMENT_THRESHOLD: '0.5',
      }),
    );

    expect(settings.backend).toBe('local');
    expect(settings.defaultCoverage).toBe(CoverageTier.Maximum);
    expect(settings.llm.provider).toBe('anthropic');
    expect(settings.llm.timeoutMs).toBe(30_000);
    expect(settings.llm.maxRetries).toBe(0);
    expect(settings.llm.credentials.anthropicApiKey).toBe('test-secret');
    expect(settings.chunking.concurrency).toBe(4);
    expect(settings.aggregation.supplementThreshold).toBe(0.5);
  });

  it('falls back on unknown names and unparsable numbers', () => {
    const settings = buildGenerationSettings(
      new ConfigService({
        GENERATION_BACKEND: 'quantum',
        LLM_PROVIDER: 'mystery',
        LLM_TEMPERATURE: 'warm',
      }),
    );

    expect(settings.backend).toBe('external');
    expect(settings.llm.provider).toBe('openai');
    expect(settings.llm.temperature).toBe(0.4);
  });
});
