/**
 * CSV report, one row per resource (RFC 4180 quoting, CRLF line endings).
 */

import type { Resource } from '@shared/types';
import type { ReportInput } from './summary';

export const CSV_HEADERS = [
  'id',
  'type',
  'service',
  'region',
  'name',
  'state',
  'estimated_monthly_cost',
  'created_at',
  'additional_info',
] as const;

export const CSV_EOL = '\r\n';

/**
 * Quote a field when it holds a comma, quote or line break.
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function csvLine(fields: readonly string[]): string {
  return fields.map(csvField).join(',') + CSV_EOL;
}

export function csvHeader(): string {
  return csvLine(CSV_HEADERS);
}

export function csvRow(resource: Resource): string {
  return csvLine([
    resource.id,
    resource.type,
    resource.service,
    resource.region,
    resource.name ?? '',
    resource.state ?? '',
    (resource.estimatedMonthlyCost ?? 0).toFixed(2),
    resource.createdAt ? resource.createdAt.toISOString() : '',
    Object.keys(resource.additionalInfo).length > 0 ? JSON.stringify(resource.additionalInfo) : '',
  ]);
}

export function renderCsvReport(input: ReportInput): string {
  return csvHeader() + input.resources.map(csvRow).join('');
}
