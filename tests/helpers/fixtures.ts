/**
 * Shared test data builders.
 */

import { DEFAULT_CONFIG } from '@core/config';
import type { RegionScanner, ScannerScope } from '@scanners/base';
import type { Resource, ScannerConfig } from '@shared/types';

export function makeResource(overrides: Partial<Resource> = {}): Resource {
  return {
    id: 'res-1',
    type: 'Instance',
    service: 'EC2',
    region: 'us-east-1',
    additionalInfo: {},
    ...overrides,
  };
}

/**
 * Defaults with fast retries, overridable per test.
 */
export function testConfig(overrides: Partial<ScannerConfig> = {}): ScannerConfig {
  return {
    ...DEFAULT_CONFIG,
    retry_delay: 0.001,
    requests_per_second: 1000,
    ...overrides,
  };
}

export type RegionBehaviour = (region: string, attempt: number, signal?: AbortSignal) => Promise<Resource[]>;

/**
 * Scanner driven by a callback. Records every call it receives.
 */
export class FakeScanner implements RegionScanner {
  readonly calls: string[] = [];
  private readonly attempts = new Map<string, number>();

  constructor(
    readonly serviceName: string,
    private readonly behaviour: RegionBehaviour,
    readonly scope: ScannerScope = 'regional'
  ) {}

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    this.calls.push(region);
    const attempt = (this.attempts.get(region) ?? 0) + 1;
    this.attempts.set(region, attempt);
    return this.behaviour(region, attempt, signal);
  }

  attemptsFor(region: string): number {
    return this.attempts.get(region) ?? 0;
  }
}

/**
 * Scanner returning `count` resources per region, each costing `cost`.
 */
export function fixedScanner(serviceName: string, cost: number, count: number = 1): FakeScanner {
  return new FakeScanner(serviceName, async (region) =>
    Array.from({ length: count }, (_, index) =>
      makeResource({
        id: `${serviceName.toLowerCase()}-${region}-${index}`,
        service: serviceName,
        region,
        estimatedMonthlyCost: cost,
      })
    )
  );
}

/**
 * Error shaped like an AWS SDK v3 service exception.
 */
export function awsError(name: string, message: string = name, httpStatusCode?: number): Error {
  const error = new Error(message);
  error.name = name;
  if (httpStatusCode !== undefined) {
    Object.assign(error, { $metadata: { httpStatusCode } });
  }
  return error;
}

/**
 * Node system error with a `code`.
 */
export function systemError(code: string): Error {
  return Object.assign(new Error(`${code} error`), { code });
}
