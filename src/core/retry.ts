/**
 * Exponential backoff retry for AWS calls.
 */

import type { ErrorKind, ScannerConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { sleep as defaultSleep, type Sleep } from '@shared/utils/sleep';
import {
  classifyError,
  isCancellation,
  isRetryable,
  type ErrorClassification,
} from './errors';

const logger = setupLogger('aws-inventory:retry');

export interface RetryPolicyOptions {
  /**
   * Total attempts, including the first one.
   */
  maxAttempts: number;

  /**
   * Delay before the second attempt.
   */
  initialDelayMs: number;

  /**
   * Multiplier applied to the delay after each retry.
   */
  backoffFactor: number;

  /**
   * Kinds that earn another attempt. Defaults to rate-limited and transient.
   */
  retryableKinds?: readonly ErrorKind[];

  classify?: (error: unknown) => ErrorClassification;
  sleep?: Sleep;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffFactor: number;
  readonly classify: (error: unknown) => ErrorClassification;
  readonly sleep: Sleep;
  private readonly retryableKinds?: ReadonlySet<ErrorKind>;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${options.maxAttempts}`);
    }
    if (!Number.isFinite(options.initialDelayMs) || options.initialDelayMs < 0) {
      throw new RangeError(`initialDelayMs must be >= 0, got ${options.initialDelayMs}`);
    }
    if (!Number.isFinite(options.backoffFactor) || options.backoffFactor < 1) {
      throw new RangeError(`backoffFactor must be >= 1, got ${options.backoffFactor}`);
    }

    this.maxAttempts = options.maxAttempts;
    this.initialDelayMs = options.initialDelayMs;
    this.backoffFactor = options.backoffFactor;
    this.classify = options.classify ?? classifyError;
    this.sleep = options.sleep ?? defaultSleep;
    this.retryableKinds = options.retryableKinds ? new Set(options.retryableKinds) : undefined;
  }

  /**
   * Build a policy from scanner configuration (delays there are in seconds).
   */
  static fromConfig(
    config: Pick<ScannerConfig, 'max_retries' | 'retry_delay' | 'retry_backoff'>,
    options: Pick<RetryPolicyOptions, 'retryableKinds' | 'classify' | 'sleep'> = {}
  ): RetryPolicy {
    return new RetryPolicy({
      ...options,
      maxAttempts: config.max_retries,
      initialDelayMs: config.retry_delay * 1000,
      backoffFactor: config.retry_backoff,
    });
  }

  /**
   * Delay slept before the given attempt (1-based). The first attempt never waits.
   */
  delayBefore(attempt: number): number {
    if (attempt <= 1) {
      return 0;
    }
    return this.initialDelayMs * this.backoffFactor ** (attempt - 2);
  }

  shouldRetry(kind: ErrorKind): boolean {
    return this.retryableKinds ? this.retryableKinds.has(kind) : isRetryable(kind);
  }
}

export interface RetryEvent {
  label: string;
  attempt: number;
  delayMs: number;
  failure: ErrorClassification;
}

export interface RetryOptions {
  /**
   * Shown in logs, e.g. "EC2 us-east-1".
   */
  label: string;
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Run an operation under a retry policy.
 *
 * Retryable failures sleep and try again until the attempt budget is spent,
 * then the last error is rethrown. Anything else is rethrown at once.
 *
 * @param operation - Receives the 1-based attempt number
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const { label, signal, onRetry } = options;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();

    try {
      return await operation(attempt);
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) {
        throw error;
      }

      const failure = policy.classify(error);
      if (!policy.shouldRetry(failure.kind)) {
        throw error;
      }

      if (attempt >= policy.maxAttempts) {
        logger.warn(
          { label, attempts: attempt, code: failure.code },
          'Retry attempts exhausted'
        );
        throw error;
      }

      const delayMs = policy.delayBefore(attempt + 1);
      logger.warn(
        {
          label,
          attempt,
          maxAttempts: policy.maxAttempts,
          delayMs,
          kind: failure.kind,
          code: failure.code,
        },
        `${label} failed, retrying in ${delayMs}ms`
      );
      onRetry?.({ label, attempt, delayMs, failure });

      await policy.sleep(delayMs, signal);
    }
  }
}
