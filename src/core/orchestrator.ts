/**
 * Scan orchestrator.
 *
 * Runs one conductor per service under a bounded service pool.
 * A service that blows up is logged and counted as zero resources;
 * it never interrupts the other services.
 */

import { PromisePool } from '@supercharge/promise-pool';
import type {
  Resource,
  ScanObserver,
  ScanRun,
  ScannerConfig,
  ServiceOutcome,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import type { RegionScanner } from '@scanners/base';
import { ServiceScanConductor, applyAllowDeny } from './conductor';
import { ScanCancelledError, classifyError, isCancellation } from './errors';

const logger = setupLogger('aws-inventory:orchestrator');

export type ConductorFactory = (scanner: RegionScanner) => ServiceScanConductor;

export interface OrchestratorOptions {
  observer?: ScanObserver;

  /**
   * Builds the conductor for each service. Defaults to one with its own
   * rate limiter and a retry policy from the config.
   */
  conductorFactory?: ConductorFactory;
  now?: () => number;
}

/**
 * Apply skip/only service lists (case-insensitive). A service in both lists is excluded.
 */
export function selectServices(
  scanners: readonly RegionScanner[],
  config: Pick<ScannerConfig, 'skip_services' | 'only_services'>
): RegionScanner[] {
  const kept = new Set(
    applyAllowDeny(
      scanners.map((scanner) => scanner.serviceName),
      config.skip_services,
      config.only_services,
      (name) => name.toLowerCase()
    )
  );
  return scanners.filter((scanner) => kept.has(scanner.serviceName));
}

interface ServiceRun {
  resources: Resource[];
  outcome: ServiceOutcome;
}

export class ScanOrchestrator {
  private readonly config: ScannerConfig;
  private readonly observer?: ScanObserver;
  private readonly conductorFactory: ConductorFactory;
  private readonly now: () => number;

  constructor(config: ScannerConfig, options: OrchestratorOptions = {}) {
    this.config = config;
    this.observer = options.observer;
    this.now = options.now ?? (() => performance.now());
    this.conductorFactory =
      options.conductorFactory ??
      ((scanner) =>
        new ServiceScanConductor(scanner, { config, observer: options.observer, now: this.now }));
  }

  filterServices(scanners: readonly RegionScanner[]): RegionScanner[] {
    return selectServices(scanners, this.config);
  }

  /**
   * Scan all services and hold every resource in memory.
   *
   * @throws {ScanCancelledError} If the signal aborts the scan
   */
  async scanServices(
    scanners: readonly RegionScanner[],
    regions: readonly string[],
    signal?: AbortSignal
  ): Promise<ScanRun> {
    const started = this.now();
    const selected = this.filterServices(scanners);
    this.logPlan(selected, regions);

    const { results, errors } = await PromisePool.for(selected)
      .withConcurrency(this.config.max_concurrent_services)
      .process(async (scanner, _index, pool) => {
        if (signal?.aborted) {
          pool.stop();
          return undefined;
        }
        return this.runService(scanner, regions, signal);
      });

    if (signal?.aborted || errors.some((error) => isCancellation(error.raw))) {
      throw new ScanCancelledError('Scan cancelled', { cause: signal?.reason });
    }
    if (errors.length > 0) {
      throw errors[0].raw;
    }

    const resources: Resource[] = [];
    const services: ServiceOutcome[] = [];
    for (const run of results) {
      if (run) {
        resources.push(...run.resources);
        services.push(run.outcome);
      }
    }

    const durationMs = this.now() - started;
    logger.info(
      {
        services: services.length,
        resourceCount: resources.length,
        durationMs: Math.round(durationMs),
      },
      'Scan completed'
    );

    return { resources, services, durationMs };
  }

  /**
   * Scan all services and yield resources as each service completes.
   *
   * Single pass. The next service is launched only after the consumer has
   * drained a finished one, so at most `max_concurrent_services` results are
   * held at a time. Breaking out of the loop aborts in-flight services.
   *
   * @throws {ScanCancelledError} If the signal aborts the scan
   */
  async *streamServices(
    scanners: readonly RegionScanner[],
    regions: readonly string[],
    signal?: AbortSignal
  ): AsyncGenerator<Resource, void, undefined> {
    if (signal?.aborted) {
      throw new ScanCancelledError('Scan cancelled', { cause: signal.reason });
    }

    const selected = this.filterServices(scanners);
    this.logPlan(selected, regions);

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const inFlight = new Map<number, Promise<{ key: number; run: ServiceRun }>>();
    let next = 0;

    const launch = (): void => {
      const key = next;
      const scanner = selected[next];
      next += 1;
      inFlight.set(
        key,
        this.runService(scanner, regions, controller.signal).then((run) => ({ key, run }))
      );
    };

    try {
      while (next < selected.length && inFlight.size < this.config.max_concurrent_services) {
        launch();
      }

      while (inFlight.size > 0) {
        let finished: { key: number; run: ServiceRun };
        try {
          finished = await Promise.race(inFlight.values());
        } catch (error) {
          if (isCancellation(error)) {
            throw new ScanCancelledError('Scan cancelled', { cause: error });
          }
          throw error;
        }
        inFlight.delete(finished.key);

        for (const resource of finished.run.resources) {
          yield resource;
        }

        if (controller.signal.aborted) {
          throw new ScanCancelledError('Scan cancelled', { cause: controller.signal.reason });
        }
        if (next < selected.length) {
          launch();
        }
      }
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      if (inFlight.size > 0) {
        controller.abort();
        await Promise.allSettled(inFlight.values());
      }
    }
  }

  /**
   * Run one service. Only cancellation escapes; other errors become a failed outcome.
   */
  private async runService(
    scanner: RegionScanner,
    regions: readonly string[],
    signal?: AbortSignal
  ): Promise<ServiceRun> {
    const started = this.now();
    let run: ServiceRun;

    try {
      const result = await this.conductorFactory(scanner).scan(regions, signal);
      run = {
        resources: result.resources,
        outcome: {
          service: result.service,
          resourceCount: result.resources.length,
          regions: result.regions,
          durationMs: result.durationMs,
        },
      };
    } catch (error) {
      if (isCancellation(error) || signal?.aborted) {
        throw error;
      }

      const failure = classifyError(error);
      logger.error(
        { service: scanner.serviceName, code: failure.code, error: failure.message },
        `Failed to scan ${scanner.serviceName}`
      );
      run = {
        resources: [],
        outcome: {
          service: scanner.serviceName,
          resourceCount: 0,
          regions: [],
          durationMs: this.now() - started,
          failure,
        },
      };
    }

    try {
      this.observer?.onServiceComplete?.(run.outcome);
    } catch (error) {
      logger.warn({ service: scanner.serviceName, error: String(error) }, 'Scan observer failed');
    }
    return run;
  }

  private logPlan(selected: readonly RegionScanner[], regions: readonly string[]): void {
    const { max_concurrent_services, max_concurrent_regions } = this.config;
    logger.info(
      {
        services: selected.map((scanner) => scanner.serviceName),
        regionCount: regions.length,
        maxConcurrentServices: max_concurrent_services,
        maxConcurrentRegions: max_concurrent_regions,
        peakConcurrency: max_concurrent_services * max_concurrent_regions,
      },
      'Starting scan'
    );
  }
}
