/**
 * Aggregation and formatting helpers shared by all report formats.
 */

import type {
  ErrorKind,
  Resource,
  ServiceOutcome,
  ServiceSummary,
} from '@shared/types';

/**
 * Everything an eager report needs.
 */
export interface ReportInput {
  resources: readonly Resource[];

  /**
   * Outcomes of the scan. When present, a diagnostics section is added.
   */
  services?: readonly ServiceOutcome[];
  generatedAt?: Date;
}

const currency = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format a USD amount as "$1,234.56".
 */
export function formatCost(amount: number): string {
  return `$${currency.format(amount)}`;
}

/**
 * Ordinal string comparison, independent of the host locale.
 */
export function compareText(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function resourceCost(resource: Resource): number {
  return resource.estimatedMonthlyCost ?? 0;
}

/**
 * Running per-service totals. Holds counts only, never resources.
 */
export class SummaryAccumulator {
  private readonly byService = new Map<string, ServiceSummary>();
  private count = 0;
  private cost = 0;

  add(resource: Resource): void {
    let summary = this.byService.get(resource.service);
    if (!summary) {
      summary = {
        service: resource.service,
        totalResources: 0,
        totalEstimatedMonthlyCost: 0,
        resourcesByRegion: {},
      };
      this.byService.set(resource.service, summary);
    }

    summary.totalResources += 1;
    summary.totalEstimatedMonthlyCost += resourceCost(resource);
    summary.resourcesByRegion[resource.region] = (summary.resourcesByRegion[resource.region] ?? 0) + 1;

    this.count += 1;
    this.cost += resourceCost(resource);
  }

  get totalResources(): number {
    return this.count;
  }

  get totalCost(): number {
    return this.cost;
  }

  /**
   * Summaries sorted by service name.
   */
  summaries(): ServiceSummary[] {
    return [...this.byService.values()].sort((a, b) => compareText(a.service, b.service));
  }
}

/**
 * Per-service count, cost and region breakdown, sorted by service.
 */
export function summarizeByService(resources: Iterable<Resource>): ServiceSummary[] {
  const accumulator = new SummaryAccumulator();
  for (const resource of resources) {
    accumulator.add(resource);
  }
  return accumulator.summaries();
}

export function totalCost(resources: Iterable<Resource>): number {
  let total = 0;
  for (const resource of resources) {
    total += resourceCost(resource);
  }
  return total;
}

/**
 * Costliest resources first, skipping the ones that cost nothing.
 */
export function topExpensive(resources: readonly Resource[], limit: number = 10): Resource[] {
  return resources
    .filter((resource) => resourceCost(resource) > 0)
    .sort((a, b) => resourceCost(b) - resourceCost(a))
    .slice(0, limit);
}

/**
 * One failed unit of work, flattened for reports.
 */
export interface ScanDiagnostic {
  service: string;
  region?: string;
  kind: ErrorKind;
  code: string;
  message: string;
}

/**
 * Flatten service- and region-level failures out of the outcomes.
 */
export function collectDiagnostics(outcomes: readonly ServiceOutcome[]): ScanDiagnostic[] {
  const diagnostics: ScanDiagnostic[] = [];

  for (const outcome of outcomes) {
    if (outcome.failure) {
      diagnostics.push({ service: outcome.service, ...outcome.failure });
    }
    for (const region of outcome.regions) {
      if (region.failure) {
        diagnostics.push({ service: outcome.service, region: region.region, ...region.failure });
      }
    }
  }

  return diagnostics.sort(
    (a, b) => compareText(a.service, b.service) || compareText(a.region ?? '', b.region ?? '')
  );
}

/**
 * Group resources by a key, preserving input order inside each group.
 */
export function groupBy<K>(resources: readonly Resource[], key: (resource: Resource) => K): Map<K, Resource[]> {
  const groups = new Map<K, Resource[]>();
  for (const resource of resources) {
    const groupKey = key(resource);
    const group = groups.get(groupKey);
    if (group) {
      group.push(resource);
    } else {
      groups.set(groupKey, [resource]);
    }
  }
  return groups;
}
