/**
 * Base scanner interface and shared helpers.
 *
 * A scanner enumerates one AWS service in one region and turns each raw
 * provider record into a frozen Resource.
 */

import type { Logger } from 'pino';
import type { CloudProvider } from '@core/provider';
import { estimateMonthlyCost, type CostEstimator } from '@/pricing/estimator';
import type { Resource, ResourceInfoValue } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

export type ScannerScope = 'regional' | 'global';

/**
 * Contract every service enumerator implements.
 */
export interface RegionScanner {
  /** Service name used for grouping and filtering (e.g. "EC2") */
  readonly serviceName: string;

  /** Global scanners run once per scan against the home region */
  readonly scope: ScannerScope;

  /**
   * Enumerate the service in one region.
   *
   * Expected empty or not-found conditions yield `[]`; genuine failures reject.
   */
  scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]>;
}

/**
 * Tag shapes used across services: EC2-style `Key/Value` and ECS-style `key/value`.
 */
export type AwsTag = {
  Key?: string;
  Value?: string;
  key?: string;
  value?: string;
};

export type InfoInput = Record<string, ResourceInfoValue | undefined>;

export interface ResourceParams {
  id: string;
  type: string;
  region: string;
  name?: string;
  createdAt?: Date;
  state?: string;
  estimatedMonthlyCost?: number;
  additionalInfo?: InfoInput;
}

/**
 * Convert AWS tags to a plain record.
 */
export function tagsToRecord(tags?: readonly AwsTag[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    const key = tag.Key ?? tag.key;
    if (key) {
      record[key] = tag.Value ?? tag.value ?? '';
    }
  }
  return record;
}

/**
 * Drop undefined entries so reports never show empty keys.
 */
export function compactInfo(info: InfoInput): Record<string, ResourceInfoValue> {
  const compacted: Record<string, ResourceInfoValue> = {};
  for (const [key, value] of Object.entries(info)) {
    if (value !== undefined) {
      compacted[key] = value;
    }
  }
  return compacted;
}

/**
 * Parse a provider timestamp, which the SDK hands back as a Date or an ISO string.
 */
export function toDate(value: Date | string | undefined): Date | undefined {
  if (value === undefined) {
    return undefined;
  }
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Split a list into fixed-size batches (for Describe* calls with an ID cap).
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

export abstract class BaseScanner implements RegionScanner {
  abstract readonly serviceName: string;
  readonly scope: ScannerScope = 'regional';

  protected readonly logger: Logger;

  constructor(
    protected readonly provider: CloudProvider,
    protected readonly estimate: CostEstimator = estimateMonthlyCost
  ) {
    this.logger = setupLogger(`aws-inventory:scanner.${new.target.name}`);
  }

  abstract scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]>;

  /**
   * Create a frozen resource owned by this scanner's service.
   */
  protected createResource(params: ResourceParams): Resource {
    const resource: Resource = {
      id: params.id,
      type: params.type,
      service: this.serviceName,
      region: params.region,
      name: params.name,
      createdAt: params.createdAt,
      state: params.state,
      estimatedMonthlyCost: params.estimatedMonthlyCost,
      additionalInfo: Object.freeze(compactInfo(params.additionalInfo ?? {})),
    };
    return Object.freeze(resource);
  }
}
