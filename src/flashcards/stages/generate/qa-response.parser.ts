/**
 * Q/A Response Parser
 * Recovers question/answer pairs from a free-text model reply.
 */

import type { FlashcardPair } from '../../types';

const QUESTION_LABELS = new Set(['q', 'question', 'k', 'klausimas']);
const ANSWER_LABELS = new Set(['a', 'answer', 'atsakymas']);

/**
 * Optional list marker, optional bold, a label, a colon, then the text
 * e.g. "1. **Q:** text", "- Question: text", "**Atsakymas**: text"
 */
const LABELED_LINE =
  /^(?:(?:[-*•]|\d+[.)])\s+)?(?:\*\*)?(q|question|k|klausimas|a|answer|atsakymas)(?:\*\*)?\s*:\s*(?:\*\*)?\s*(.*)$/i;

/**
 * "Q: ... A: ..." on a single line, possibly several per line
 */
const INLINE_PAIR =
  /\b(?:Q|Question|K|Klausimas)\s*:\s*(.*?)\s*\b(?:A|Answer|Atsakymas)\s*:\s*(.*?)(?=\s*\b(?:Q|Question|K|Klausimas)\s*:|$)/gim;

/** Below this many line-parsed pairs the inline pass runs too */
export const INLINE_PASS_THRESHOLD = 5;

type LineKind = 'question' | 'answer';

interface LabeledLine {
  kind: LineKind;
  text: string;
}

function stripBold(value: string): string {
  return value.replace(/^\*\*|\*\*$/g, '').trim();
}

function classifyLine(line: string): LabeledLine | null {
  const match = LABELED_LINE.exec(line);
  if (!match) {
    return null;
  }

  const label = match[1].toLowerCase();
  const text = stripBold(match[2] ?? '');
  if (QUESTION_LABELS.has(label)) {
    return { kind: 'question', text };
  }
  if (ANSWER_LABELS.has(label)) {
    return { kind: 'answer', text };
  }
  return null;
}

function normalizeQuestion(question: string): string {
  return question.trim().toLowerCase();
}

/**
 * Parse labeled Q/A lines.
 * A plain line right after an unanswered question is taken as its answer.
 */
function parseLines(content: string): FlashcardPair[] {
  const pairs: FlashcardPair[] = [];
  let question: string | null = null;
  let answer: string | null = null;

  const flush = (): void => {
    if (question && answer) {
      pairs.push({ question, answer });
    }
  };

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const labeled = classifyLine(line);
    if (labeled?.kind === 'question') {
      flush();
      question = labeled.text || null;
      answer = null;
    } else if (labeled?.kind === 'answer') {
      answer = labeled.text || null;
    } else if (question && !answer) {
      answer = stripBold(line) || null;
    }
  }

  flush();
  return pairs;
}

/**
 * Parse a model reply into pairs
 * @param content - Raw reply text
 * @returns Pairs in reply order; empty when nothing could be recovered
 */
export function parseQaResponse(content: string): FlashcardPair[] {
  if (!content || content.trim().length === 0) {
    return [];
  }

  const pairs = parseLines(content);
  if (pairs.length >= INLINE_PASS_THRESHOLD) {
    return pairs;
  }

  const seen = new Set(pairs.map((pair) => normalizeQuestion(pair.question)));
  for (const match of content.matchAll(INLINE_PAIR)) {
    const question = (match[1] ?? '').trim();
    const answer = (match[2] ?? '').trim();
    if (!question || !answer) {
      continue;
    }

    const key = normalizeQuestion(question);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    pairs.push({ question, answer });
  }

  return pairs;
}
