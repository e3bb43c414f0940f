/**
 * Language Identifier Service
 * Guesses the dominant language of a document sample.
 * Statistical detection first, weighted indicator scoring as fallback.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { detect } from 'tinyld';
import indicators from './language-indicators.json';
import { describeError } from '../../errors';

export const STATISTICAL_LANGUAGE_DETECTOR = 'STATISTICAL_LANGUAGE_DETECTOR';

export const DEFAULT_LANGUAGE = 'en';

/**
 * Statistical detection capability
 * Returns an ISO 639-1 code, or an empty string when undetermined
 */
export interface StatisticalLanguageDetector {
  detect(sample: string): string;
}

/**
 * Detector backed by tinyld's n-gram profiles
 */
export class TinyLdLanguageDetector implements StatisticalLanguageDetector {
  detect(sample: string): string {
    return detect(sample);
  }
}

interface LanguageIndicator {
  code: string;
  characters: Set<string>;
  wordPatterns: RegExp[];
}

const SAMPLE_MAX_CHARS = 2000;
const SAMPLE_MAX_SENTENCES = 5;
const CHARACTER_WEIGHT = 10;

const LANGUAGE_NAMES: Readonly<Record<string, string>> = indicators.names;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word pattern where letters of any script count as word characters
 */
function wholeWordPattern(word: string): RegExp {
  return new RegExp(
    `(?<![\\p{L}\\p{N}_])${escapeRegExp(word)}(?![\\p{L}\\p{N}_])`,
    'gu',
  );
}

/**
 * Get the English name of a language from its code
 * Unknown codes are returned capitalized
 */
export function getLanguageName(code: string): string {
  const normalized = code.trim().toLowerCase();
  const name = LANGUAGE_NAMES[normalized];
  if (name) {
    return name;
  }
  return normalized.charAt(0).toUpperCase() + normalized.slice(1);
}

@Injectable()
export class LanguageIdentifierService {
  private readonly logger = new Logger(LanguageIdentifierService.name);
  private readonly indicators: LanguageIndicator[];

  constructor(
    @Inject(STATISTICAL_LANGUAGE_DETECTOR)
    private readonly detector: StatisticalLanguageDetector,
  ) {
    // Declaration order is the tie-break order
    this.indicators = indicators.candidates.map((candidate) => ({
      code: candidate.code,
      characters: new Set(Array.from(candidate.characters)),
      wordPatterns: candidate.words.map(wholeWordPattern),
    }));
  }

  /**
   * Identify the dominant language of a text
   * @param text - Document text (only a short sample is inspected)
   * @returns ISO 639-1 language code, "en" when undetermined
   */
  identify(text: string): string {
    if (!text || text.trim().length === 0) {
      return DEFAULT_LANGUAGE;
    }

    const sample = this.buildSample(text);

    try {
      const detected = this.detector.detect(sample).trim().toLowerCase();
      if (detected) {
        return detected;
      }
      this.logger.warn(
        'Statistical language detection was inconclusive, using indicator scoring',
      );
    } catch (error) {
      this.logger.warn(
        `Statistical language detection failed: ${describeError(error)}. Using indicator scoring`,
      );
    }

    return this.scoreIndicators(sample);
  }

  /**
   * First 2000 characters, cut down to the first 5 sentences
   */
  buildSample(text: string): string {
    const sample = text.slice(0, SAMPLE_MAX_CHARS);
    const sentences = sample.split('.');
    if (sentences.length > SAMPLE_MAX_SENTENCES) {
      return sentences.slice(0, SAMPLE_MAX_SENTENCES).join('.') + '.';
    }
    return sample;
  }

  /**
   * Score = 10 x distinctive characters + whole-word function word matches.
   * Highest score wins, earlier candidates win ties, zero means English.
   */
  scoreIndicators(sample: string): string {
    const lowered = sample.toLowerCase();
    const letters = Array.from(lowered);

    let bestCode = DEFAULT_LANGUAGE;
    let bestScore = 0;

    for (const indicator of this.indicators) {
      let characterScore = 0;
      if (indicator.characters.size > 0) {
        for (const letter of letters) {
          if (indicator.characters.has(letter)) {
            characterScore++;
          }
        }
      }

      let wordScore = 0;
      for (const pattern of indicator.wordPatterns) {
        wordScore += lowered.match(pattern)?.length ?? 0;
      }

      const score = characterScore * CHARACTER_WEIGHT + wordScore;
      if (score > bestScore) {
        bestScore = score;
        bestCode = indicator.code;
      }
    }

    return bestScore > 0 ? bestCode : DEFAULT_LANGUAGE;
  }
}
