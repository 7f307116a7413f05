/**
 * Core type definitions for the AWS resource inventory.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

/**
 * Region label used for services that are not tied to a single AWS region.
 */
export const GLOBAL_REGION = 'global';

/**
 * Value stored in a resource's detail bag.
 */
export type ResourceInfoValue =
  | string
  | number
  | boolean
  | null
  | ResourceInfoValue[]
  | { [key: string]: ResourceInfoValue };

/**
 * Normalized record for any discovered cloud object.
 *
 * Frozen by the scanner that creates it and never mutated afterwards.
 */
export interface Resource {
  /**
   * Provider-assigned identifier. Not necessarily unique across services.
   */
  readonly id: string;

  /**
   * Resource kind within its service (e.g. "Instance", "Bucket").
   */
  readonly type: string;

  /**
   * Owning service name, used for grouping (e.g. "EC2").
   */
  readonly service: string;

  /**
   * AWS region code, or "global" for region-independent services.
   */
  readonly region: string;

  /**
   * Human label. Reports fall back to `id` when absent.
   */
  readonly name?: string;

  readonly createdAt?: Date;

  /**
   * Provider-specific lifecycle state (e.g. "running", "available").
   */
  readonly state?: string;

  /**
   * Rough monthly cost estimate in USD. Never negative.
   */
  readonly estimatedMonthlyCost?: number;

  /**
   * Service-specific details.
   */
  readonly additionalInfo: Readonly<Record<string, ResourceInfoValue>>;
}

/**
 * Error taxonomy used to decide whether a failed call is retried.
 *
 * - access-denied: missing permission, terminal for the unit
 * - rate-limited: provider throttling, retried with backoff
 * - transient: network or server-side hiccup, retried with backoff
 * - fatal: anything else, terminal for the unit
 */
export type ErrorKind = 'access-denied' | 'rate-limited' | 'transient' | 'fatal';

/**
 * Serializable description of why a unit of work produced no resources.
 *
 * Tagged on `kind`; consume it with an exhaustive switch.
 */
export type ScanFailure = {
  [K in ErrorKind]: { kind: K; code: string; message: string };
}[ErrorKind];

/**
 * Outcome of scanning one (service, region) pair.
 *
 * When `error` is set, `resources` is empty.
 */
export interface RegionScanResult {
  region: string;
  resources: Resource[];
  error?: ScanFailure;
  durationMs: number;
}

/**
 * Resource-free summary of a region scan, kept for diagnostics.
 */
export interface RegionOutcome {
  region: string;
  resourceCount: number;
  durationMs: number;
  failure?: ScanFailure;
}

/**
 * Union of all region results for one service.
 */
export interface ServiceScanResult {
  service: string;
  resources: Resource[];
  regions: RegionOutcome[];
  durationMs: number;
}

/**
 * Resource-free summary of a service scan.
 *
 * `failure` is only set when the service-level scan itself blew up;
 * region-level failures stay on their `RegionOutcome`.
 */
export interface ServiceOutcome {
  service: string;
  resourceCount: number;
  regions: RegionOutcome[];
  durationMs: number;
  failure?: ScanFailure;
}

/**
 * Result of an eager scan across all services.
 */
export interface ScanRun {
  resources: Resource[];
  services: ServiceOutcome[];
  durationMs: number;
}

/**
 * Observational hooks for progress bars and logging.
 *
 * No scan logic depends on them. Exceptions thrown by a hook are logged and ignored.
 */
export interface ScanObserver {
  onRegionStart?(event: { service: string; region: string }): void;
  onRegionComplete?(event: { service: string; result: RegionScanResult }): void;
  onServiceComplete?(outcome: ServiceOutcome): void;
}

/**
 * Per-service summary used by reports.
 */
export interface ServiceSummary {
  service: string;
  totalResources: number;
  totalEstimatedMonthlyCost: number;
  resourcesByRegion: Record<string, number>;
}

/**
 * Supported report formats.
 */
export type ReportFormat = 'markdown' | 'json' | 'csv';

/**
 * Log levels accepted by configuration and the CLI.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Process-wide scanner configuration.
 *
 * Loaded once at startup and frozen; pass it explicitly to the components
 * that need it.
 */
export interface ScannerConfig {
  /**
   * Region workers per service. Peak outbound concurrency is
   * max_concurrent_services * max_concurrent_regions.
   */
  readonly max_concurrent_regions: number;

  /**
   * Services scanned at the same time.
   */
  readonly max_concurrent_services: number;

  /**
   * Attempts per region scan, including the first one.
   */
  readonly max_retries: number;

  /**
   * Seconds to wait before the first retry.
   */
  readonly retry_delay: number;

  /**
   * Multiplier applied to the delay after each retry.
   */
  readonly retry_backoff: number;

  /**
   * Token refill rate of each service's rate limiter.
   */
  readonly requests_per_second: number;

  /**
   * Per-request socket timeout in seconds handed to the AWS client.
   */
  readonly request_timeout: number;

  readonly skip_regions: readonly string[];
  readonly only_regions: readonly string[];
  readonly skip_services: readonly string[];
  readonly only_services: readonly string[];

  readonly report_format: ReportFormat;
  readonly report_path: string;

  readonly log_level: LogLevel;
}
