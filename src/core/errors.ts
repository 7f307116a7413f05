/**
 * Error classification for AWS calls.
 *
 * Maps provider error codes onto the small ErrorKind taxonomy that the retry
 * policy and the scan conductors act on.
 */

import type { ErrorKind, ScanFailure } from '@shared/types';

/**
 * Classified error: a ScanFailure tagged with its kind.
 */
export type ErrorClassification = ScanFailure;

const ACCESS_DENIED_CODES: ReadonlySet<string> = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'AuthFailure',
  'AuthorizationError',
  'InvalidClientTokenId',
  'OptInRequired',
  'UnauthorizedAccess',
  'UnauthorizedOperation',
  'UnrecognizedClientException',
]);

const THROTTLING_CODES: ReadonlySet<string> = new Set([
  'BandwidthLimitExceeded',
  'EC2ThrottledException',
  'PriorRequestNotComplete',
  'ProvisionedThroughputExceededException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'RequestThrottledException',
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'TooManyRequestsException',
]);

const TRANSIENT_CODES: ReadonlySet<string> = new Set([
  'EAI_AGAIN',
  'ECONNABORTED',
  'ECONNREFUSED',
  'ECONNRESET',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EPIPE',
  'ETIMEDOUT',
  'InternalError',
  'InternalFailure',
  'NetworkingError',
  'RequestTimeout',
  'RequestTimeoutException',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'TimeoutError',
]);

/**
 * Raised when a scan is cancelled through its AbortSignal.
 */
export class ScanCancelledError extends Error {
  constructor(message: string = 'Scan cancelled', options?: ErrorOptions) {
    super(message, options);
    this.name = 'ScanCancelledError';
  }
}

/**
 * Raised when the set of regions cannot be listed. Aborts the whole run.
 */
export class RegionDiscoveryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RegionDiscoveryError';
  }
}

function readField(error: object, field: string): unknown {
  return field in error ? Reflect.get(error, field) : undefined;
}

function readStringField(error: object, field: string): string | undefined {
  const value = readField(error, field);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readHttpStatus(error: object): number | undefined {
  const metadata = readField(error, '$metadata');
  if (metadata && typeof metadata === 'object') {
    const status = readField(metadata, 'httpStatusCode');
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * Extract the machine-readable code from an error.
 *
 * Node system errors carry `code`, some AWS errors carry `Code`, and SDK v3
 * service exceptions use their `name`.
 *
 * @param error - Anything thrown
 * @returns Error code, or "Unknown"
 */
export function errorCode(error: unknown): string {
  if (!error || typeof error !== 'object') {
    return 'Unknown';
  }

  const code = readStringField(error, 'code') ?? readStringField(error, 'Code');
  if (code) {
    return code;
  }

  const name = readStringField(error, 'name');
  return name && name !== 'Error' ? name : 'Unknown';
}

/**
 * Extract a human-readable message from an error.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function kindFor(code: string, httpStatus: number | undefined): ErrorKind {
  if (ACCESS_DENIED_CODES.has(code)) {
    return 'access-denied';
  }
  if (THROTTLING_CODES.has(code) || httpStatus === 429) {
    return 'rate-limited';
  }
  if (TRANSIENT_CODES.has(code) || (httpStatus !== undefined && httpStatus >= 500)) {
    return 'transient';
  }
  return 'fatal';
}

/**
 * Classify an error into the scan error taxonomy.
 *
 * @param error - Anything thrown by an AWS call or a scanner
 * @returns Tagged classification carrying the code and message
 */
export function classifyError(error: unknown): ErrorClassification {
  const code = errorCode(error);
  const message = errorMessage(error);
  const httpStatus = error && typeof error === 'object' ? readHttpStatus(error) : undefined;

  return { kind: kindFor(code, httpStatus), code, message };
}

/**
 * Whether an error kind is worth another attempt.
 */
export function isRetryable(kind: ErrorKind): boolean {
  switch (kind) {
    case 'rate-limited':
    case 'transient':
      return true;
    case 'access-denied':
    case 'fatal':
      return false;
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled error kind: ${String(unreachable)}`);
    }
  }
}

/**
 * Whether an error means the surrounding scan was aborted.
 */
export function isCancellation(error: unknown): boolean {
  if (error instanceof ScanCancelledError) {
    return true;
  }
  return error instanceof Error && error.name === 'AbortError';
}
