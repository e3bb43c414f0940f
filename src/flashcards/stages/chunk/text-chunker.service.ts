/**
 * Text Chunker Service
 * Splits long documents into bounded chunks along paragraph boundaries,
 * then along sentence boundaries for paragraphs that are still too large.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { Chunk } from '../../types';

const PARAGRAPH_SEPARATOR = '\n\n';
const SENTENCE_SEPARATOR = '. ';

@Injectable()
export class TextChunkerService {
  private readonly logger = new Logger(TextChunkerService.name);

  /**
   * Split text into ordered chunks
   * @param text - Full document text
   * @param maxChunkSize - Soft upper bound on chunk length in characters
   * @returns Chunks indexed from 0, none empty
   */
  split(text: string, maxChunkSize: number): Chunk[] {
    if (maxChunkSize <= 0) {
      throw new RangeError(`maxChunkSize must be positive, got ${maxChunkSize}`);
    }

    const normalized = text.replace(/\r\n/g, '\n');
    const pieces: string[] = [];

    for (const paragraphChunk of this.splitParagraphs(normalized, maxChunkSize)) {
      if (paragraphChunk.length <= maxChunkSize) {
        pieces.push(paragraphChunk);
      } else {
        pieces.push(...this.splitSentences(paragraphChunk, maxChunkSize));
      }
    }

    const chunks = pieces.map((content, index) => ({ index, content }));

    this.logger.debug(
      `Split ${normalized.length} chars into ${chunks.length} chunks (max ${maxChunkSize})`,
    );

    return chunks;
  }

  /**
   * Greedy paragraph packing
   */
  private splitParagraphs(text: string, maxChunkSize: number): string[] {
    const chunks: string[] = [];
    let current = '';

    for (const paragraph of text.split(PARAGRAPH_SEPARATOR)) {
      if (
        current.length + paragraph.length > maxChunkSize &&
        current.trim().length > 0
      ) {
        chunks.push(current.trim());
        current = paragraph + PARAGRAPH_SEPARATOR;
      } else {
        current += paragraph + PARAGRAPH_SEPARATOR;
      }
    }

    if (current.trim().length > 0) {
      chunks.push(current.trim());
    }

    return chunks;
  }

  /**
   * Sentence packing for an oversized chunk.
   * Sub-chunks below a quarter of the limit keep growing past it;
   * sentence-dense sub-chunks close early once past a third of the limit.
   */
  private splitSentences(chunk: string, maxChunkSize: number): string[] {
    const minimumFill = Math.floor(maxChunkSize / 4);
    const earlyCloseLength = Math.floor(maxChunkSize / 3);
    const earlyCloseSentences = Math.max(5, Math.floor(maxChunkSize / 500));

    const parts = chunk.split(SENTENCE_SEPARATOR);
    const sentences = parts.map((part, i) =>
      i < parts.length - 1 ? part.trim() + SENTENCE_SEPARATOR : part.trim() + ' ',
    );

    const subChunks: string[] = [];
    let current = '';
    let sentenceCount = 0;

    const close = (): void => {
      if (current.trim().length > 0) {
        subChunks.push(current.trim());
      }
      current = '';
      sentenceCount = 0;
    };

    for (const sentence of sentences) {
      if (
        current.length + sentence.length > maxChunkSize &&
        current.trim().length > 0 &&
        current.length >= minimumFill
      ) {
        close();
      }

      current += sentence;
      sentenceCount++;

      if (
        sentenceCount >= earlyCloseSentences &&
        current.length > earlyCloseLength
      ) {
        close();
      }
    }

    close();
    return subChunks;
  }
}
