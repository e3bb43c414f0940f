export * from './types';
export * from './capability-errors';
export * from './llm-provider.factory';
export * from './langchain-text-generation';
export * from './ollama-summarization';
