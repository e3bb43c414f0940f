/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  GENERATION_SETTINGS,
  type GenerationSettings,
  type LLMProvider,
} from '../../../../config/generation-settings';
import { CapabilityUnavailableError } from '../../../errors';
import type { ChatModelOptions } from './types';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(
    @Inject(GENERATION_SETTINGS)
    private readonly settings: GenerationSettings,
  ) {}

  /**
   * Create chat model based on provider
   * @param provider - Defaults to the configured LLM_PROVIDER
   * @param options - Optional overrides (model, temperature, maxTokens, maxRetries)
   * @throws CapabilityUnavailableError when the provider's API key is missing
   */
  createChatModel(
    provider?: LLMProvider,
    options?: ChatModelOptions,
  ): BaseChatModel {
    const selectedProvider = provider ?? this.settings.llm.provider;
    const merged: ChatModelOptions = {
      model: this.settings.llm.model,
      temperature: this.settings.llm.temperature,
      maxRetries: this.settings.llm.maxRetries,
      ...options,
    };

    this.logger.log(`Creating chat model for provider: ${selectedProvider}`);

    switch (selectedProvider) {
      case 'openai':
        return this.createOpenAIModel(merged);

      case 'google':
        return this.createGoogleModel(merged);

      case 'anthropic':
        return this.createAnthropicModel(merged) as unknown as BaseChatModel;

      case 'ollama':
      default:
        return this.createOllamaModel(merged);
    }
  }

  /**
   * Create OpenAI chat model
   */
  private createOpenAIModel(options: ChatModelOptions): ChatOpenAI {
    const { openaiApiKey, openaiChatModel, openaiBaseUrl } =
      this.settings.llm.credentials;
    if (!openaiApiKey) {
      throw new CapabilityUnavailableError(
        'OPENAI_API_KEY is required for OpenAI provider',
        'openai',
      );
    }

    return new ChatOpenAI({
      model: options.model ?? openaiChatModel,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: options.maxRetries,
      configuration: {
        baseURL: openaiBaseUrl,
        apiKey: openaiApiKey,
      },
    });
  }

  /**
   * Create Google Gemini chat model
   */
  private createGoogleModel(options: ChatModelOptions): ChatGoogleGenerativeAI {
    const { googleApiKey, googleChatModel } = this.settings.llm.credentials;
    if (!googleApiKey) {
      throw new CapabilityUnavailableError(
        'GOOGLE_API_KEY is required for Google provider',
        'google',
      );
    }

    return new ChatGoogleGenerativeAI({
      model: options.model ?? googleChatModel,
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      maxRetries: options.maxRetries,
      apiKey: googleApiKey,
    });
  }

  /**
   * Create Anthropic Claude chat model
   */
  private createAnthropicModel(options: ChatModelOptions): ChatAnthropic {
    const { anthropicApiKey, anthropicChatModel } =
      this.settings.llm.credentials;
    if (!anthropicApiKey) {
      throw new CapabilityUnavailableError(
        'ANTHROPIC_API_KEY is required for Anthropic provider',
        'anthropic',
      );
    }

    return new ChatAnthropic({
      model: options.model ?? anthropicChatModel,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: options.maxRetries,
      apiKey: anthropicApiKey,
    });
  }

  /**
   * Create Ollama chat model (local)
   */
  private createOllamaModel(options: ChatModelOptions): ChatOllama {
    const { ollamaChatModel, ollamaBaseUrl } = this.settings.llm.credentials;

    return new ChatOllama({
      model: options.model ?? ollamaChatModel,
      temperature: options.temperature,
      numPredict: options.maxTokens,
      baseUrl: ollamaBaseUrl,
    });
  }
}
