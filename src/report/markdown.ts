/**
 * Markdown report.
 */

import type { Resource, ResourceInfoValue, ServiceOutcome } from '@shared/types';
import {
  collectDiagnostics,
  compareText,
  formatCost,
  groupBy,
  resourceCost,
  summarizeByService,
  topExpensive,
  totalCost,
  type ReportInput,
  type ScanDiagnostic,
} from './summary';

const GENERIC_DETAIL_LIMIT = 3;

/**
 * Escape a value for a Markdown table cell.
 */
export function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function row(cells: readonly string[]): string {
  return `| ${cells.map(escapeCell).join(' | ')} |`;
}

export function headerRows(headers: readonly string[]): string[] {
  return [row(headers), `|${headers.map(() => '---').join('|')}|`];
}

/**
 * GitHub-style heading anchor.
 */
export function anchorFor(heading: string): string {
  return heading
    .toLowerCase()
    .replace(/[^a-z0-9 -]/g, '')
    .replace(/ /g, '-');
}

function isScalar(value: ResourceInfoValue): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function ec2Details(resource: Resource): string {
  const info = resource.additionalInfo;
  const details: string[] = [];
  if (typeof info.instanceType === 'string' && info.instanceType) {
    details.push(info.instanceType);
  }
  if (typeof info.size === 'number' && info.size > 0) {
    details.push(`${info.size} GB`);
  }
  if (typeof info.publicIp === 'string' && info.publicIp) {
    details.push(`IP: ${info.publicIp}`);
  }
  return details.join(', ') || '-';
}

/**
 * First few truthy scalar details as "key: value".
 */
export function genericDetails(resource: Resource): string {
  return (
    Object.entries(resource.additionalInfo)
      .filter(([, value]) => isScalar(value) && Boolean(value))
      .slice(0, GENERIC_DETAIL_LIMIT)
      .map(([key, value]) => `${key}: ${String(value)}`)
      .join(', ') || '-'
  );
}

function serviceSection(service: string, resources: readonly Resource[]): string[] {
  const lines = [`## ${service}`, ''];
  const byRegion = groupBy(resources, (resource) => resource.region);

  for (const region of [...byRegion.keys()].sort(compareText)) {
    const regionResources = byRegion.get(region) ?? [];
    lines.push(`### ${region}`, '');

    if (service === 'EC2') {
      lines.push(...headerRows(['Type', 'ID', 'Name', 'State', 'Monthly Cost', 'Details']));
      for (const resource of regionResources) {
        lines.push(
          row([
            resource.type,
            resource.id,
            resource.name ?? '-',
            resource.state ?? '-',
            formatCost(resourceCost(resource)),
            ec2Details(resource),
          ])
        );
      }
    } else {
      lines.push(...headerRows(['Type', 'Name/ID', 'State', 'Monthly Cost', 'Details']));
      for (const resource of regionResources) {
        lines.push(
          row([
            resource.type,
            resource.name ?? resource.id,
            resource.state ?? 'active',
            formatCost(resourceCost(resource)),
            genericDetails(resource),
          ])
        );
      }
    }
    lines.push('');
  }

  return lines;
}

/**
 * Diagnostics section listing every failed service or region.
 */
export function diagnosticsSection(outcomes: readonly ServiceOutcome[]): string[] {
  const diagnostics: ScanDiagnostic[] = collectDiagnostics(outcomes);
  const lines = ['## Scan Diagnostics', ''];

  if (diagnostics.length === 0) {
    lines.push('All scans completed without errors.', '');
    return lines;
  }

  lines.push(...headerRows(['Service', 'Region', 'Error', 'Code', 'Message']));
  for (const diagnostic of diagnostics) {
    lines.push(
      row([
        diagnostic.service,
        diagnostic.region ?? '(all)',
        diagnostic.kind,
        diagnostic.code,
        diagnostic.message,
      ])
    );
  }
  lines.push('');
  return lines;
}

/**
 * Render the full report for a completed scan.
 */
export function renderMarkdownReport(input: ReportInput): string {
  const { resources, services } = input;
  const generatedAt = input.generatedAt ?? new Date();

  const lines = [
    '# AWS Resources Report',
    '',
    `**Generated:** ${generatedAt.toISOString()}`,
    `**Total Resources Found:** ${resources.length}`,
  ];

  if (resources.length === 0) {
    lines.push('', 'No resources found.', '');
    if (services) {
      lines.push(...diagnosticsSection(services));
    }
    return lines.join('\n');
  }

  lines.push(`**Total Estimated Monthly Cost:** ${formatCost(totalCost(resources))}`, '');

  const summaries = summarizeByService(resources);

  lines.push('## Table of Contents', '');
  for (const summary of summaries) {
    lines.push(`- [${summary.service}](#${anchorFor(summary.service)})`);
  }
  lines.push('');

  lines.push('## Summary by Service', '');
  lines.push(...headerRows(['Service', 'Resource Count', 'Estimated Monthly Cost']));
  for (const summary of summaries) {
    lines.push(
      row([
        summary.service,
        String(summary.totalResources),
        formatCost(summary.totalEstimatedMonthlyCost),
      ])
    );
  }
  lines.push('');

  const byService = groupBy(resources, (resource) => resource.service);
  for (const summary of summaries) {
    lines.push(...serviceSection(summary.service, byService.get(summary.service) ?? []));
  }

  lines.push('## Cost Breakdown', '', '### Top 10 Most Expensive Resources', '');
  lines.push(...headerRows(['Service', 'Type', 'Name/ID', 'Region', 'Monthly Cost']));
  for (const resource of topExpensive(resources)) {
    lines.push(
      row([
        resource.service,
        resource.type,
        resource.name ?? resource.id,
        resource.region,
        formatCost(resourceCost(resource)),
      ])
    );
  }
  lines.push('');

  if (services) {
    lines.push(...diagnosticsSection(services));
  }

  return lines.join('\n');
}
