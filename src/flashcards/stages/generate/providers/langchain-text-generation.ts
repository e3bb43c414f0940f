/**
 * LangChain Text Generation
 * Runs one system/user prompt pair through a chat model chain.
 */

import { ChatPromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { GenerationAbortedError } from '../../../errors';
import { createCallSignals, toCapabilityError } from './capability-errors';
import type {
  ChatModelOptions,
  CompletionRequest,
  TextGenerationCapability,
} from './types';

export type ChatModelBuilder = (options: ChatModelOptions) => BaseChatModel;

// Prompt text goes in as variables so braces in documents are not parsed
const COMPLETION_PROMPT = ChatPromptTemplate.fromMessages([
  ['system', '{systemPrompt}'],
  ['human', '{userPrompt}'],
]);

export class LangChainTextGeneration implements TextGenerationCapability {
  constructor(
    readonly name: string,
    private readonly buildModel: ChatModelBuilder,
    private readonly timeoutMs: number,
  ) {}

  async complete(
    request: CompletionRequest,
    signal?: AbortSignal,
  ): Promise<string> {
    if (signal?.aborted) {
      throw new GenerationAbortedError();
    }

    const call = createCallSignals(this.timeoutMs, signal);

    try {
      const model = this.buildModel({
        temperature: request.temperature,
        maxTokens: request.maxOutputTokens,
      });
      const chain = COMPLETION_PROMPT.pipe(model).pipe(
        new StringOutputParser(),
      );

      return await chain.invoke(
        {
          systemPrompt: request.systemPrompt,
          userPrompt: request.userPrompt,
        },
        { signal: call.signal },
      );
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
