/**
 * Ollama Summarization
 * Local summarizer backed by an Ollama-hosted chat model.
 */

import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { GenerationAbortedError } from '../../../errors';
import { createCallSignals, toCapabilityError } from './capability-errors';
import type { ChatModelBuilder } from './langchain-text-generation';
import type { SummarizationCapability } from './types';

const SUMMARY_PROMPT = ChatPromptTemplate.fromMessages([
  [
    'system',
    'You summarize text. Reply with the summary only, as plain sentences, in the language of the text.',
  ],
  [
    'human',
    'Summarize the following text in {minLength} to {maxLength} words.\n\nText:\n{text}',
  ],
]);

// Rough words-to-tokens ratio for the output budget
const TOKENS_PER_WORD = 2;

export class OllamaSummarization implements SummarizationCapability {
  readonly name = 'ollama-summarizer';

  constructor(
    private readonly buildModel: ChatModelBuilder,
    private readonly timeoutMs: number,
  ) {}

  async summarize(
    text: string,
    maxLength: number,
    minLength: number,
    signal?: AbortSignal,
  ): Promise<string> {
    if (signal?.aborted) {
      throw new GenerationAbortedError();
    }

    const call = createCallSignals(this.timeoutMs, signal);

    try {
      const model = this.buildModel({
        temperature: 0,
        maxTokens: maxLength * TOKENS_PER_WORD,
      });
      const chain = SUMMARY_PROMPT.pipe(model).pipe(new StringOutputParser());

      const summary = await chain.invoke(
        { text, maxLength: String(maxLength), minLength: String(minLength) },
        { signal: call.signal },
      );
      return summary.trim();
    } catch (error) {
      throw toCapabilityError(
        error,
        this.name,
        this.timeoutMs,
        signal,
        call.timeoutSignal,
      );
    }
  }
}
