/**
 * Error kinds raised inside the relay
 *
 * None of these is fatal to the process: callers log them and carry on.
 */

import { APICallError, RetryError } from "ai";

export type RelayErrorKind =
  | "rate_limited"
  | "transient_model"
  | "storage_write"
  | "storage_read";

export abstract class RelayError extends Error {
  abstract readonly kind: RelayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Model provider signalled quota or throughput exhaustion
export class RateLimitedError extends RelayError {
  readonly kind = "rate_limited" as const;
}

// Any other failed model call
export class TransientModelError extends RelayError {
  readonly kind = "transient_model" as const;
}

export class StorageWriteError extends RelayError {
  readonly kind = "storage_write" as const;

  constructor(readonly key: string, cause: unknown) {
    super(`Failed to write "${key}": ${describeError(cause)}`, { cause });
  }
}

export class StorageReadError extends RelayError {
  readonly kind = "storage_read" as const;

  constructor(readonly key: string, cause: unknown) {
    super(`Failed to read "${key}": ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const RATE_LIMIT_PATTERN = /rate.?limit|quota|resource.?exhausted|too many requests/i;

function isRateLimitSignal(error: unknown): boolean {
  if (APICallError.isInstance(error)) {
    return error.statusCode === 429 || RATE_LIMIT_PATTERN.test(error.message);
  }
  if (RetryError.isInstance(error)) {
    return isRateLimitSignal(error.lastError);
  }
  return error instanceof Error && RATE_LIMIT_PATTERN.test(error.message);
}

/**
 * Map a failure from the model client onto a relay error kind
 */
export function classifyModelError(error: unknown): RateLimitedError | TransientModelError {
  if (error instanceof RateLimitedError || error instanceof TransientModelError) {
    return error;
  }
  if (isRateLimitSignal(error)) {
    return new RateLimitedError(`Model rate limited: ${describeError(error)}`, { cause: error });
  }
  return new TransientModelError(`Model call failed: ${describeError(error)}`, { cause: error });
}
