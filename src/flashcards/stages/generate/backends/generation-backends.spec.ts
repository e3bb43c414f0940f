import { ExternalApiBackend } from './external-api.backend';
import { LocalModelBackend } from './local-model.backend';
import { HeuristicBackend } from './heuristic.backend';
import { createGenerationBackend } from './generation-backend.factory';
import type { GenerationRequest } from './generation-backend';
import { HeuristicExtractorService } from '../../heuristic/heuristic-extractor.service';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type {
  CompletionRequest,
  SummarizationCapability,
  TextGenerationCapability,
} from '../providers/types';
import {
  GenerationAbortedError,
  GenerationCallError,
  MalformedResponseError,
} from '../../../errors';
import { CoverageTier } from '../../../types';
import { createTestSettings } from '../../../../testing/test-settings';

class ScriptedTextGeneration implements TextGenerationCapability {
  readonly name = 'scripted';
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: string) {}

  complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    return Promise.resolve(this.reply);
  }
}

class ScriptedSummarizer implements SummarizationCapability {
  readonly name = 'scripted-summarizer';
  readonly windows: string[] = [];

  constructor(private readonly outcomes: Array<string | Error>) {}

  summarize(text: string): Promise<string> {
    this.windows.push(text);
    const outcome = this.outcomes[this.windows.length - 1] ?? '';
    return outcome instanceof Error
      ? Promise.reject(outcome)
      : Promise.resolve(outcome);
  }
}

function request(content: string, overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    chunk: { index: 2, content },
    languageName: 'English',
    targetCount: 10,
    tier: CoverageTier.Medium,
    ...overrides,
  };
}

describe('ExternalApiBackend', () => {
  it('prompts the capability and tags parsed pairs with the chunk index', async () => {
    const capability = new ScriptedTextGeneration(
      'Q: Who founded Plymouth Colony?\nA: The Pilgrims',
    );
    const backend = new ExternalApiBackend(
      capability,
      { temperature: 0.4 },
      { maxInputChars: 70_000 },
    );

    const pairs = await backend.generate(request('The Pilgrims founded Plymouth Colony.'));

    expect(pairs).toEqual([
      {
        question: 'Who founded Plymouth Colony?',
        answer: 'The Pilgrims',
        chunkIndex: 2,
      },
    ]);
    expect(capability.requests).toHaveLength(1);
    expect(capability.requests[0].temperature).toBe(0.4);
    expect(capability.requests[0].maxOutputTokens).toBe(1300);
    expect(capability.requests[0].userPrompt.startsWith('Create 8-12 Q&A')).toBe(true);
  });

  it('rejects a reply without pairs as malformed', async () => {
    const backend = new ExternalApiBackend(
      new ScriptedTextGeneration('I cannot help with that.'),
      { temperature: 0.4 },
      { maxInputChars: 70_000 },
    );

    await expect(backend.generate(request('Some text.'))).rejects.toBeInstanceOf(
      MalformedResponseError,
    );
  });
});

describe('LocalModelBackend', () => {
  const heuristic = new HeuristicExtractorService();
  const localSettings = {
    model: 'llama3',
    summaryMaxLength: 150,
    summaryMinLength: 30,
    windowSize: 10,
  };

  it('summarizes each window and converts summary sentences', async () => {
    const summarizer = new ScriptedSummarizer([
      'Paris is the capital of France.',
      'The Seine crosses the city!',
    ]);
    const backend = new LocalModelBackend(summarizer, heuristic, localSettings);

    const pairs = await backend.generate(request('0123456789abcdefghij'));

    expect(summarizer.windows).toEqual(['0123456789', 'abcdefghij']);
    expect(pairs).toEqual([
      {
        question: 'Paris is the capital of France?',
        answer: 'Paris is the capital of France',
        chunkIndex: 2,
      },
      {
        question: 'What is The Seine crosses the city?',
        answer: 'The Seine crosses the city',
        chunkIndex: 2,
      },
    ]);
  });

  it('skips failed windows', async () => {
    const summarizer = new ScriptedSummarizer([
      new Error('model overloaded'),
      'Rome was founded in 753 BC.',
    ]);
    const backend = new LocalModelBackend(summarizer, heuristic, localSettings);

    const pairs = await backend.generate(request('0123456789abcdefghij'));

    expect(pairs.map((pair) => pair.answer)).toEqual([
      'Rome was founded in 753 BC',
    ]);
  });

  it('fails when every window fails', async () => {
    const backend = new LocalModelBackend(
      new ScriptedSummarizer([new Error('down'), new Error('down')]),
      heuristic,
      localSettings,
    );

    await expect(
      backend.generate(request('0123456789abcdefghij')),
    ).rejects.toBeInstanceOf(GenerationCallError);
  });

  it('stops on abort', async () => {
    const backend = new LocalModelBackend(
      new ScriptedSummarizer([new GenerationAbortedError(), 'Never reached.']),
      heuristic,
      localSettings,
    );

    await expect(
      backend.generate(request('0123456789abcdefghij')),
    ).rejects.toBeInstanceOf(GenerationAbortedError);
  });
});

describe('HeuristicBackend', () => {
  it('extracts pairs from the chunk text', async () => {
    const backend = new HeuristicBackend(new HeuristicExtractorService());

    await expect(
      backend.generate(request('The Pilgrims founded Plymouth Colony in 1620.')),
    ).resolves.toEqual([
      {
        question: 'What is The Pilgrims founded Plymouth Colony in 1620?',
        answer: 'The Pilgrims founded Plymouth Colony in 1620',
        chunkIndex: 2,
      },
    ]);
  });
});

describe('createGenerationBackend', () => {
  const heuristic = new HeuristicExtractorService();

  function select(settings: ReturnType<typeof createTestSettings>) {
    return createGenerationBackend(
      settings,
      new LLMProviderFactory(settings),
      heuristic,
    );
  }

  it('falls back to heuristics when the provider key is missing', () => {
    const backend = select(createTestSettings({ backend: 'external' }));

    expect(backend.kind).toBe('heuristic');
  });

  it('uses the external backend when the provider is configured', () => {
    const defaults = createTestSettings();
    const backend = select(
      createTestSettings({
        backend: 'external',
        llm: {
          credentials: { ...defaults.llm.credentials, openaiApiKey: 'test-secret' },
        },
      }),
    );

    expect(backend.kind).toBe('external');
    expect(backend.capability).toBe('openai');
  });

  it('needs no key for a local Ollama provider', () => {
    const backend = select(
      createTestSettings({ backend: 'external', llm: { provider: 'ollama' } }),
    );

    expect(backend.kind).toBe('external');
  });

  it('selects the local and heuristic backends by name', () => {
    expect(select(createTestSettings({ backend: 'local' })).kind).toBe('local');
    expect(select(createTestSettings({ backend: 'heuristic' })).kind).toBe(
      'heuristic',
    );
  });
});
