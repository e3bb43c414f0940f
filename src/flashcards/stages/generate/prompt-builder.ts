/**
 * Generation Prompt Builder
 * Builds the system/user prompt pair sent for one chunk.
 */

import { CoverageTier } from '../../types';

export const DEFAULT_INSTRUCTION =
  'Create meaningful questions that cover important concepts in the text.';

export type PromptFocus = 'standard' | 'facts';

export interface PromptInput {
  content: string;
  languageName: string;
  targetCount: number;
  tier: CoverageTier;
  instruction?: string;
  focus?: PromptFocus;
  maxInputChars: number;
}

export interface GenerationPrompt {
  systemPrompt: string;
  userPrompt: string;
  maxOutputTokens: number;
}

/**
 * Requested band around the per-chunk target
 */
export function requestBand(
  targetCount: number,
  tier: CoverageTier,
): { low: number; high: number } {
  const spread = tier === CoverageTier.Maximum ? 5 : 2;
  return {
    low: Math.max(1, targetCount - spread),
    high: targetCount + spread,
  };
}

export function maxOutputTokensFor(
  targetCount: number,
  focus: PromptFocus = 'standard',
): number {
  return focus === 'facts'
    ? Math.min(3000, 300 + targetCount * 80)
    : Math.min(4000, 300 + targetCount * 100);
}

function formatSection(languageName: string): string {
  return `Format each flashcard as:
Q: [question in ${languageName} with sufficient context]
A: [answer in ${languageName}]`;
}

export function buildGenerationPrompt(input: PromptInput): GenerationPrompt {
  const { languageName, targetCount, tier } = input;
  const focus = input.focus ?? 'standard';
  const instruction = input.instruction?.trim() || DEFAULT_INSTRUCTION;
  const text = input.content.slice(0, input.maxInputChars);

  const systemPrompt = `You are an expert at creating educational flashcards in ${languageName}. ${instruction}`;

  if (focus === 'facts') {
    return {
      systemPrompt,
      userPrompt: `Generate ${targetCount} additional Q&A flashcards focusing on specific historical events, dates, people, and statistics from the text in ${languageName}. Be as specific as possible.

${formatSection(languageName)}

Text:
${text}`,
      maxOutputTokens: maxOutputTokensFor(targetCount, focus),
    };
  }

  const { low, high } = requestBand(targetCount, tier);
  const userPrompt = `Create ${low}-${high} Q&A flashcards from the following text in ${languageName}.
Cover important facts, dates, people, events, and concepts in the text.
Each question should:
1. Ask exactly one specific thing
2. Not give away the answer in the question
3. Be clear and unambiguous
4. Test important concepts from the text
5. Focus on key facts that students should remember
6. Ensure comprehensive coverage - include ALL important content from the text
7. Include sufficient context in questions - for historical content, include the time period or relevant background
8. Make questions self-contained so they can be understood without referring to the original text

${formatSection(languageName)}

Text:
${text}`;

  return {
    systemPrompt,
    userPrompt,
    maxOutputTokens: maxOutputTokensFor(targetCount, focus),
  };
}
