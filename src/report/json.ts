/**
 * JSON report (snake_case keys).
 */

import type { Resource, ServiceSummary } from '@shared/types';
import {
  collectDiagnostics,
  summarizeByService,
  totalCost,
  type ReportInput,
  type ScanDiagnostic,
} from './summary';

export interface JsonResource {
  id: string;
  type: string;
  service: string;
  region: string;
  name: string | null;
  created_at: string | null;
  state: string | null;
  estimated_monthly_cost: number;
  additional_info: Resource['additionalInfo'];
}

export interface JsonServiceSummary {
  service: string;
  total_resources: number;
  total_estimated_monthly_cost: number;
  resources_by_region: Record<string, number>;
}

export interface JsonDiagnostic {
  service: string;
  region: string | null;
  kind: ScanDiagnostic['kind'];
  code: string;
  message: string;
}

export interface JsonReport {
  generated_at: string;
  total_resources: number;
  total_estimated_monthly_cost: number;
  summary: JsonServiceSummary[];
  resources: JsonResource[];
  diagnostics?: JsonDiagnostic[];
}

export function toJsonResource(resource: Resource): JsonResource {
  return {
    id: resource.id,
    type: resource.type,
    service: resource.service,
    region: resource.region,
    name: resource.name ?? null,
    created_at: resource.createdAt ? resource.createdAt.toISOString() : null,
    state: resource.state ?? null,
    estimated_monthly_cost: resource.estimatedMonthlyCost ?? 0,
    additional_info: resource.additionalInfo,
  };
}

export function toJsonSummary(summary: ServiceSummary): JsonServiceSummary {
  return {
    service: summary.service,
    total_resources: summary.totalResources,
    total_estimated_monthly_cost: summary.totalEstimatedMonthlyCost,
    resources_by_region: summary.resourcesByRegion,
  };
}

export function toJsonDiagnostic(diagnostic: ScanDiagnostic): JsonDiagnostic {
  return {
    service: diagnostic.service,
    region: diagnostic.region ?? null,
    kind: diagnostic.kind,
    code: diagnostic.code,
    message: diagnostic.message,
  };
}

export function buildJsonReport(input: ReportInput): JsonReport {
  const report: JsonReport = {
    generated_at: (input.generatedAt ?? new Date()).toISOString(),
    total_resources: input.resources.length,
    total_estimated_monthly_cost: totalCost(input.resources),
    summary: summarizeByService(input.resources).map(toJsonSummary),
    resources: input.resources.map(toJsonResource),
  };

  if (input.services) {
    report.diagnostics = collectDiagnostics(input.services).map(toJsonDiagnostic);
  }
  return report;
}

export function renderJsonReport(input: ReportInput): string {
  return `${JSON.stringify(buildJsonReport(input), null, 2)}\n`;
}
