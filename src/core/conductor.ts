/**
 * Per-service scan conductor.
 *
 * Fans one scanner out over the selected regions in a bounded worker pool.
 * A failing region is logged and contributes zero resources; it never
 * aborts its siblings.
 */

import { PromisePool } from '@supercharge/promise-pool';
import type {
  RegionOutcome,
  RegionScanResult,
  Resource,
  ScanFailure,
  ScanObserver,
  ScannerConfig,
  ServiceScanResult,
} from '@shared/types';
import { GLOBAL_REGION } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import type { RegionScanner } from '@scanners/base';
import { ScanCancelledError, isCancellation } from './errors';
import { RateLimiter } from './rateLimiter';
import { RetryPolicy, withRetry } from './retry';

const logger = setupLogger('aws-inventory:conductor');

export interface ConductorOptions {
  config: ScannerConfig;

  /**
   * Shared by all regional workers of this service. Defaults to one built
   * from `requests_per_second`.
   */
  rateLimiter?: RateLimiter;
  retryPolicy?: RetryPolicy;
  observer?: ScanObserver;
  now?: () => number;
}

/**
 * Apply skip/only lists. A name in both lists is excluded.
 */
export function applyAllowDeny(
  names: readonly string[],
  skip: readonly string[],
  only: readonly string[],
  normalize: (name: string) => string = (name) => name
): string[] {
  const denied = new Set(skip.map(normalize));
  const allowed = new Set(only.map(normalize));

  return names.filter((name) => {
    const key = normalize(name);
    if (denied.has(key)) {
      return false;
    }
    return allowed.size === 0 || allowed.has(key);
  });
}

export function toRegionOutcome(result: RegionScanResult): RegionOutcome {
  return {
    region: result.region,
    resourceCount: result.resources.length,
    durationMs: result.durationMs,
    failure: result.error,
  };
}

export class ServiceScanConductor {
  readonly rateLimiter: RateLimiter;
  readonly retryPolicy: RetryPolicy;

  private readonly config: ScannerConfig;
  private readonly observer?: ScanObserver;
  private readonly now: () => number;

  constructor(
    readonly scanner: RegionScanner,
    options: ConductorOptions
  ) {
    this.config = options.config;
    this.rateLimiter =
      options.rateLimiter ?? new RateLimiter({ rate: options.config.requests_per_second });
    this.retryPolicy = options.retryPolicy ?? RetryPolicy.fromConfig(options.config);
    this.observer = options.observer;
    this.now = options.now ?? (() => performance.now());
  }

  get serviceName(): string {
    return this.scanner.serviceName;
  }

  /**
   * Regions this service will visit.
   *
   * Global services run once under the "global" label and ignore region lists.
   */
  filterRegions(regions: readonly string[]): string[] {
    if (this.scanner.scope === 'global') {
      return [GLOBAL_REGION];
    }
    return applyAllowDeny(regions, this.config.skip_regions, this.config.only_regions);
  }

  /**
   * Scan every selected region and merge the successful results.
   *
   * @throws {ScanCancelledError} If the signal aborts before all regions finish
   */
  async scan(regions: readonly string[], signal?: AbortSignal): Promise<ServiceScanResult> {
    const started = this.now();
    const service = this.serviceName;
    const selected = this.filterRegions(regions);

    if (selected.length === 0) {
      logger.info({ service }, 'No regions left after filtering');
      return { service, resources: [], regions: [], durationMs: this.now() - started };
    }

    logger.info(
      { service, regionCount: selected.length, concurrency: this.config.max_concurrent_regions },
      'Starting service scan'
    );

    const { results, errors } = await PromisePool.for(selected)
      .withConcurrency(this.config.max_concurrent_regions)
      .process(async (region, _index, pool) => {
        if (signal?.aborted) {
          pool.stop();
          return undefined;
        }
        return this.scanRegion(region, signal);
      });

    if (signal?.aborted || errors.some((error) => isCancellation(error.raw))) {
      throw new ScanCancelledError(`Scan of ${service} cancelled`, { cause: signal?.reason });
    }
    if (errors.length > 0) {
      throw errors[0].raw;
    }

    const resources: Resource[] = [];
    const outcomes: RegionOutcome[] = [];
    for (const result of results) {
      if (result) {
        resources.push(...result.resources);
        outcomes.push(toRegionOutcome(result));
      }
    }

    const durationMs = this.now() - started;
    logger.info(
      {
        service,
        resourceCount: resources.length,
        failedRegions: outcomes.filter((outcome) => outcome.failure).length,
        durationMs: Math.round(durationMs),
      },
      'Service scan completed'
    );

    return { service, resources, regions: outcomes, durationMs };
  }

  /**
   * Scan every selected region and return only the resources.
   */
  async scanAllRegions(regions: readonly string[], signal?: AbortSignal): Promise<Resource[]> {
    const result = await this.scan(regions, signal);
    return result.resources;
  }

  /**
   * Scan one region under the rate limiter and retry policy.
   * Only cancellation escapes; every other failure becomes a result.
   */
  private async scanRegion(region: string, signal?: AbortSignal): Promise<RegionScanResult> {
    const service = this.serviceName;
    const started = this.now();
    this.notify(() => this.observer?.onRegionStart?.({ service, region }));

    let result: RegionScanResult;
    try {
      const resources = await withRetry(
        async () => {
          await this.rateLimiter.acquire(1, signal);
          return this.scanner.scanRegion(region, signal);
        },
        this.retryPolicy,
        { label: `${service} ${region}`, signal }
      );
      result = { region, resources, durationMs: this.now() - started };
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) {
        throw error;
      }

      const failure = this.retryPolicy.classify(error);
      this.logFailure(region, failure);
      result = { region, resources: [], error: failure, durationMs: this.now() - started };
    }

    logger.debug(
      { service, region, resourceCount: result.resources.length },
      'Region scan finished'
    );
    this.notify(() => this.observer?.onRegionComplete?.({ service, result }));
    return result;
  }

  private logFailure(region: string, failure: ScanFailure): void {
    const context = {
      service: this.serviceName,
      region,
      code: failure.code,
      error: failure.message,
    };

    switch (failure.kind) {
      case 'access-denied':
        logger.warn(context, `No access to ${this.serviceName} in ${region}`);
        break;
      case 'rate-limited':
      case 'transient':
        logger.warn(context, `Gave up on ${this.serviceName} in ${region} after retries`);
        break;
      case 'fatal':
        logger.error(context, `Failed to scan ${this.serviceName} in ${region}`);
        break;
      default: {
        const unreachable: never = failure;
        logger.error({ failure: unreachable }, 'Unknown failure kind');
      }
    }
  }

  private notify(hook: () => void): void {
    try {
      hook();
    } catch (error) {
      logger.warn({ service: this.serviceName, error: String(error) }, 'Scan observer failed');
    }
  }
}
