/**
 * Flashcard Pipeline Error Classes
 * Only EmptyDocumentError and GenerationAbortedError reach the caller;
 * the rest are recovered inside the pipeline.
 */

/**
 * Base error for all flashcard pipeline errors
 */
export class FlashcardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false,
  ) {
    super(message);
    this.name = 'FlashcardError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Permanent Errors (surfaced to the caller)
 */

export class EmptyDocumentError extends FlashcardError {
  constructor(
    message: string = 'Document text is empty or could not be read',
  ) {
    super(message, 'DOCUMENT_EMPTY', false);
    this.name = 'EmptyDocumentError';
  }
}

export class GenerationAbortedError extends FlashcardError {
  constructor(message: string = 'Flashcard generation was aborted') {
    super(message, 'GENERATION_ABORTED', false);
    this.name = 'GenerationAbortedError';
  }
}

/**
 * Capability Errors (recovered locally)
 */

export class CapabilityUnavailableError extends FlashcardError {
  constructor(
    message: string,
    public readonly provider: string,
  ) {
    super(message, 'GENERATION_CAPABILITY_UNAVAILABLE', false);
    this.name = 'CapabilityUnavailableError';
  }
}

export class GenerationCallError extends FlashcardError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message, 'GENERATION_CALL_FAILED', true);
    this.name = 'GenerationCallError';
  }
}

export class GenerationTimeoutError extends FlashcardError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'GENERATION_TIMEOUT', true);
    this.name = 'GenerationTimeoutError';
  }
}

export class MalformedResponseError extends FlashcardError {
  constructor(
    message: string,
    public readonly chunkIndex: number,
  ) {
    super(message, 'GENERATION_MALFORMED_RESPONSE', false);
    this.name = 'MalformedResponseError';
  }
}

/**
 * Normalize an unknown thrown value into a message for logging
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
