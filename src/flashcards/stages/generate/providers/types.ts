/**
 * Capability Types
 * Contracts of the external collaborators used by the generation backends
 */

/**
 * Single completion request
 */
export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxOutputTokens: number;
}

/**
 * Text generation capability (hosted or local chat model)
 */
export interface TextGenerationCapability {
  readonly name: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

/**
 * Summarization capability
 * maxLength and minLength are in words
 */
export interface SummarizationCapability {
  readonly name: string;
  summarize(
    text: string,
    maxLength: number,
    minLength: number,
    signal?: AbortSignal,
  ): Promise<string>;
}

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
}
