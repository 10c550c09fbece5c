/**
 * Retry Utilities
 *
 * Exponential backoff for transient failures in language-model calls and in
 * step invocations wrapped with withStepRetry. The orchestrator itself never retries.
 */

import { createPrefixedLogger } from '../../utils/logger';
import { RETRY_CONFIG } from './config';

const log = createPrefixedLogger('[Retry]');

export interface RetryOptions {
  /** Attempts after the first one (default: RETRY_CONFIG.MAX_RETRIES) */
  readonly maxRetries?: number;
  /** Delay before the first retry (default: RETRY_CONFIG.INITIAL_DELAY_MS) */
  readonly initialDelayMs?: number;
  /** Upper bound for a single delay, before jitter (default: RETRY_CONFIG.MAX_DELAY_MS) */
  readonly maxDelayMs?: number;
  /** Label used in log lines, e.g. "draft-writer generateText" */
  readonly context?: string;
  /** Overrides isRetryableError */
  readonly shouldRetry?: (error: unknown) => boolean;
  /** Invoked with the 1-based retry number before each wait */
  readonly onRetry?: (retry: number, delayMs: number, error: unknown) => void;
}

// ============================================================================
// Error Classification
// ============================================================================

type TransientKind = 'rate-limit' | 'network' | 'server' | 'overload';

const TRANSIENT_MESSAGE_PATTERNS: ReadonlyArray<readonly [TransientKind, RegExp]> = [
  ['rate-limit', /rate.?limit|too.?many.?requests|\b429\b/i],
  ['network', /network|fetch.*fail|ETIMEDOUT|ECONNRESET|ECONNREFUSED|socket.?hang.?up/i],
  ['server', /\b5\d{2}\b|internal.?server.?error|service.?unavailable|bad.?gateway/i],
  ['overload', /overloaded|capacity|temporarily/i],
];

/** Follows `cause` links, outermost first. */
function* causeChain(error: unknown): Generator<unknown> {
  let current: unknown = error;
  for (let depth = 0; current && depth < 5; depth++) {
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

function statusCodeOf(error: Error): number | undefined {
  const status: unknown = Reflect.get(error, 'status') ?? Reflect.get(error, 'statusCode');
  return typeof status === 'number' ? status : undefined;
}

function transientKindOf(error: unknown): TransientKind | null {
  const message = error instanceof Error ? error.message : String(error);
  const match = TRANSIENT_MESSAGE_PATTERNS.find(([, pattern]) => pattern.test(message));
  if (match) {
    return match[0];
  }

  if (error instanceof Error) {
    const status = statusCodeOf(error);
    if (status === 429) return 'rate-limit';
    if (status !== undefined && status >= 500 && status < 600) return 'server';
    // ai SDK call errors say whether the provider considers them retryable
    if (Reflect.get(error, 'isRetryable') === true) return 'server';
  }

  return null;
}

/**
 * True when the error (or anything in its cause chain) looks transient: rate limits,
 * network failures, 5xx responses, provider overload.
 * Timeouts are never retryable: a step that ran out of time gets no second budget.
 */
export function isRetryableError(error: unknown): boolean {
  const chain = [...causeChain(error)];
  if (chain.length === 0) return false;

  if (chain.some((link) => link instanceof Error && link.name === 'TimeoutError')) {
    return false;
  }
  return chain.some((link) => transientKindOf(link) !== null);
}

// ============================================================================
// Backoff
// ============================================================================

/** initialDelayMs × multiplier^retryIndex, capped, with ±25% jitter. */
function backoffDelay(retryIndex: number, initialDelayMs: number, maxDelayMs: number): number {
  const capped = Math.min(initialDelayMs * RETRY_CONFIG.BACKOFF_MULTIPLIER ** retryIndex, maxDelayMs);
  const jitter = capped * 0.25 * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs `fn`, retrying transient failures with exponential backoff.
 * Anything `shouldRetry` rejects propagates at once; after the last attempt the last
 * error propagates.
 *
 * @example
 * const { text } = await withRetry(() => generateText({ model, prompt }), {
 *   context: 'keyword-mining generateText',
 * });
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxRetries = options.maxRetries ?? RETRY_CONFIG.MAX_RETRIES;
  const initialDelayMs = options.initialDelayMs ?? RETRY_CONFIG.INITIAL_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? RETRY_CONFIG.MAX_DELAY_MS;
  const context = options.context ?? 'operation';
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  let retryIndex = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }
      if (retryIndex >= maxRetries) {
        log.warn(`${context} gave up after ${maxRetries + 1} attempts: ${describeError(error)}`);
        throw error;
      }

      const delayMs = backoffDelay(retryIndex, initialDelayMs, maxDelayMs);
      retryIndex++;
      log.info(`${context} attempt ${retryIndex}/${maxRetries + 1} failed, retrying in ${delayMs}ms: ${describeError(error)}`);
      options.onRetry?.(retryIndex, delayMs, error);
      await sleep(delayMs);
    }
  }
}

/**
 * Wraps `fn` so every call goes through withRetry with the same options.
 *
 * @example
 * const generateWithRetry = createRetryWrapper(generator.generate, { context: 'outline' });
 */
export function createRetryWrapper<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  options: RetryOptions = {}
): (...args: TArgs) => Promise<TResult> {
  return (...args: TArgs) => withRetry(() => fn(...args), options);
}
