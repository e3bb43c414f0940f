import { GenerationAbortedError } from '../../errors';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new GenerationAbortedError();
  }
}

/**
 * Whether a caught error must end the run instead of being recovered
 */
export function isAbort(error: unknown, signal?: AbortSignal): boolean {
  return error instanceof GenerationAbortedError || signal?.aborted === true;
}
