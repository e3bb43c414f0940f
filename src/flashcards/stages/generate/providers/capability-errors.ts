/**
 * Maps raw provider failures onto pipeline error classes
 */

import {
  FlashcardError,
  GenerationAbortedError,
  GenerationCallError,
  GenerationTimeoutError,
  describeError,
} from '../../../errors';

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return (
    error.name === 'TimeoutError' || /time(d)?\s?out/i.test(error.message)
  );
}

/**
 * Per-call signal: the caller's signal combined with the call timeout
 */
export interface CallSignals {
  signal: AbortSignal;
  timeoutSignal: AbortSignal;
}

export function createCallSignals(
  timeoutMs: number,
  callerSignal?: AbortSignal,
): CallSignals {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  return {
    signal: callerSignal
      ? AbortSignal.any([callerSignal, timeoutSignal])
      : timeoutSignal,
    timeoutSignal,
  };
}

export function toCapabilityError(
  error: unknown,
  capability: string,
  timeoutMs: number,
  signal?: AbortSignal,
  timeoutSignal?: AbortSignal,
): FlashcardError {
  if (error instanceof FlashcardError) {
    return error;
  }
  if (signal?.aborted) {
    return new GenerationAbortedError();
  }
  if (timeoutSignal?.aborted || isTimeout(error)) {
    return new GenerationTimeoutError(
      `${capability} call timed out after ${timeoutMs}ms`,
      timeoutMs,
    );
  }
  return new GenerationCallError(
    `${capability} call failed: ${describeError(error)}`,
    error instanceof Error ? error : undefined,
  );
}
