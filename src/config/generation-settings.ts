import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  COVERAGE_TIERS,
  CoverageTier,
  type GenerationBackendKind,
} from '../flashcards/types';

export const GENERATION_SETTINGS = 'GENERATION_SETTINGS';

export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

const LLM_PROVIDERS: readonly LLMProvider[] = [
  'openai',
  'google',
  'anthropic',
  'ollama',
];

const BACKEND_KINDS: readonly GenerationBackendKind[] = [
  'external',
  'local',
  'heuristic',
];

export interface ProviderCredentials {
  openaiApiKey?: string;
  openaiChatModel: string;
  openaiBaseUrl: string;
  googleApiKey?: string;
  googleChatModel: string;
  anthropicApiKey?: string;
  anthropicChatModel: string;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
}

export interface LlmSettings {
  provider: LLMProvider;
  model?: string;
  temperature: number;
  timeoutMs: number;
  maxRetries: number;
  credentials: ProviderCredentials;
}

export interface LocalModelSettings {
  model: string;
  summaryMaxLength: number;
  summaryMinLength: number;
  windowSize: number;
}

export interface ChunkingSettings {
  maxChunkSize: number;
  maxInputChars: number;
  concurrency: number;
}

export interface AggregationSettings {
  supplementThreshold: number;
  maximumSupplementThreshold: number;
  lenientOverlapRatio: number;
  lenientMinOverlap: number;
}

/**
 * Immutable generation configuration, built once per process
 * and injected into every pipeline stage
 */
export interface GenerationSettings {
  backend: GenerationBackendKind;
  defaultCoverage: CoverageTier;
  llm: LlmSettings;
  local: LocalModelSettings;
  chunking: ChunkingSettings;
  aggregation: AggregationSettings;
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  backend: 'external',
  defaultCoverage: CoverageTier.Medium,
  llm: {
    provider: 'openai',
    temperature: 0.4,
    timeoutMs: 120_000,
    maxRetries: 2,
    credentials: {
      openaiChatModel: 'gpt-4o-mini',
      openaiBaseUrl: 'https://api.openai.com/v1',
      googleChatModel: 'gemini-2.5-flash-lite',
      anthropicChatModel: 'claude-sonnet-4-5-20250929',
      ollamaBaseUrl: 'http://localhost:11434',
      ollamaChatModel: 'llama3',
    },
  },
  local: {
    model: 'llama3',
    summaryMaxLength: 150,
    summaryMinLength: 30,
    windowSize: 1024,
  },
  chunking: {
    maxChunkSize: 70_000,
    maxInputChars: 70_000,
    concurrency: 1,
  },
  aggregation: {
    supplementThreshold: 0.7,
    maximumSupplementThreshold: 0.8,
    lenientOverlapRatio: 0.5,
    lenientMinOverlap: 2,
  },
};

function pickOne<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
  name: string,
  logger: Logger,
): T {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) {
    logger.warn(
      `Unknown ${name} "${value}". Falling back to "${fallback}" (allowed: ${allowed.join(', ')})`,
    );
    return fallback;
  }
  return match;
}

function readNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  // Env vars are always strings
  const raw = configService.get<string>(key);
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const parsed = parseFloat(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Positive number or the default, with a warning for rejected values
 */
function readPositive(
  configService: ConfigService,
  key: string,
  fallback: number,
  logger: Logger,
): number {
  const value = readNumber(configService, key, fallback);
  if (value <= 0) {
    logger.warn(`${key} must be positive, got ${value}. Using ${fallback}`);
    return fallback;
  }
  return value;
}

function readString(
  configService: ConfigService,
  key: string,
): string | undefined {
  const raw = configService.get<string>(key);
  return raw && raw.trim().length > 0 ? raw.trim() : undefined;
}

/**
 * Freeze every section, not just the top level
 */
function freezeSettings(settings: GenerationSettings): GenerationSettings {
  return Object.freeze({
    ...settings,
    llm: Object.freeze({
      ...settings.llm,
      credentials: Object.freeze({ ...settings.llm.credentials }),
    }),
    local: Object.freeze({ ...settings.local }),
    chunking: Object.freeze({ ...settings.chunking }),
    aggregation: Object.freeze({ ...settings.aggregation }),
  });
}

/**
 * Build generation settings from the environment
 */
export function buildGenerationSettings(
  configService: ConfigService,
): GenerationSettings {
  const logger = new Logger('GenerationSettings');
  const defaults = DEFAULT_GENERATION_SETTINGS;
  const credentials = defaults.llm.credentials;

  const settings: GenerationSettings = {
    backend: pickOne(
      configService.get<string>('GENERATION_BACKEND'),
      BACKEND_KINDS,
      defaults.backend,
      'GENERATION_BACKEND',
      logger,
    ),
    defaultCoverage: pickOne(
      configService.get<string>('DEFAULT_COVERAGE'),
      COVERAGE_TIERS,
      defaults.defaultCoverage,
      'DEFAULT_COVERAGE',
      logger,
    ),
    llm: {
      provider: pickOne(
        configService.get<string>('LLM_PROVIDER'),
        LLM_PROVIDERS,
        defaults.llm.provider,
        'LLM_PROVIDER',
        logger,
      ),
      model: readString(configService, 'LLM_MODEL'),
      temperature: readNumber(
        configService,
        'LLM_TEMPERATURE',
        defaults.llm.temperature,
      ),
      timeoutMs:
        readNumber(
          configService,
          'LLM_TIMEOUT_SECONDS',
          defaults.llm.timeoutMs / 1000,
        ) * 1000,
      maxRetries: Math.max(
        0,
        Math.floor(
          readNumber(configService, 'LLM_MAX_RETRIES', defaults.llm.maxRetries),
        ),
      ),
      credentials: {
        openaiApiKey: readString(configService, 'OPENAI_API_KEY'),
        openaiChatModel:
          readString(configService, 'OPENAI_CHAT_MODEL') ??
          credentials.openaiChatModel,
        openaiBaseUrl:
          readString(configService, 'OPENAI_BASE_URL') ??
          credentials.openaiBaseUrl,
        googleApiKey: readString(configService, 'GOOGLE_API_KEY'),
        googleChatModel:
          readString(configService, 'GOOGLE_CHAT_MODEL') ??
          credentials.googleChatModel,
        anthropicApiKey: readString(configService, 'ANTHROPIC_API_KEY'),
        anthropicChatModel:
          readString(configService, 'ANTHROPIC_CHAT_MODEL') ??
          credentials.anthropicChatModel,
        ollamaBaseUrl:
          readString(configService, 'OLLAMA_BASE_URL') ??
          credentials.ollamaBaseUrl,
        ollamaChatModel:
          readString(configService, 'OLLAMA_CHAT_MODEL') ??
          credentials.ollamaChatModel,
      },
    },
    local: {
      model:
        readString(configService, 'LOCAL_SUMMARY_MODEL') ??
        defaults.local.model,
      summaryMaxLength: readNumber(
        configService,
        'SUMMARY_MAX_LENGTH',
        defaults.local.summaryMaxLength,
      ),
      summaryMinLength: readNumber(
        configService,
        'SUMMARY_MIN_LENGTH',
        defaults.local.summaryMinLength,
      ),
      windowSize: defaults.local.windowSize,
    },
    chunking: {
      maxChunkSize: readPositive(
        configService,
        'GENERATION_MAX_CHUNK_SIZE',
        defaults.chunking.maxChunkSize,
        logger,
      ),
      maxInputChars: readPositive(
        configService,
        'GENERATION_MAX_INPUT_CHARS',
        defaults.chunking.maxInputChars,
        logger,
      ),
      concurrency: Math.max(
        1,
        Math.floor(
          readNumber(
            configService,
            'GENERATION_CONCURRENCY',
            defaults.chunking.concurrency,
          ),
        ),
      ),
    },
    aggregation: {
      supplementThreshold: readNumber(
        configService,
        'SUPPLEMENT_THRESHOLD',
        defaults.aggregation.supplementThreshold,
      ),
      maximumSupplementThreshold: readNumber(
        configService,
        'MAXIMUM_SUPPLEMENT_THRESHOLD',
        defaults.aggregation.maximumSupplementThreshold,
      ),
      lenientOverlapRatio: readNumber(
        configService,
        'LENIENT_OVERLAP_RATIO',
        defaults.aggregation.lenientOverlapRatio,
      ),
      lenientMinOverlap: readNumber(
        configService,
        'LENIENT_MIN_OVERLAP',
        defaults.aggregation.lenientMinOverlap,
      ),
    },
  };

  logger.log(
    `Generation settings loaded: backend=${settings.backend}, provider=${settings.llm.provider}, ` +
      `maxChunkSize=${settings.chunking.maxChunkSize}, concurrency=${settings.chunking.concurrency}`,
  );

  return freezeSettings(settings);
}

export const generationSettingsProvider = {
  provide: GENERATION_SETTINGS,
  useFactory: (configService: ConfigService): GenerationSettings =>
    buildGenerationSettings(configService),
  inject: [ConfigService],
};
