/**
 * Single-pass report writers.
 *
 * Each writer consumes an AsyncIterable<Resource> once, writes every
 * resource as it arrives and waits for 'drain' when the destination is
 * full. Only running totals are kept in memory.
 */

import { once } from 'events';
import type { Writable } from 'stream';
import type { ReportFormat, Resource, ServiceOutcome, ServiceSummary } from '@shared/types';
import { csvHeader, csvRow } from './csv';
import { toJsonDiagnostic, toJsonResource, toJsonSummary } from './json';
import { diagnosticsSection, headerRows, row } from './markdown';
import { SummaryAccumulator, collectDiagnostics, formatCost, resourceCost } from './summary';

export interface StreamReportOptions {
  generatedAt?: Date;

  /**
   * Read once the stream is exhausted; adds a diagnostics section.
   */
  outcomes?: () => readonly ServiceOutcome[];
}

export interface StreamReportResult {
  totalResources: number;
  totalCost: number;
  summaries: ServiceSummary[];
}

/**
 * Write a chunk, waiting for 'drain' when the destination buffer is full.
 */
export async function writeChunk(out: Writable, chunk: string): Promise<void> {
  if (!out.write(chunk)) {
    await once(out, 'drain');
  }
}

function resultOf(accumulator: SummaryAccumulator): StreamReportResult {
  return {
    totalResources: accumulator.totalResources,
    totalCost: accumulator.totalCost,
    summaries: accumulator.summaries(),
  };
}

/**
 * Markdown: one flat resource table, then totals and the per-service summary.
 */
export async function writeMarkdownStream(
  resources: AsyncIterable<Resource>,
  out: Writable,
  options: StreamReportOptions = {}
): Promise<StreamReportResult> {
  const generatedAt = options.generatedAt ?? new Date();
  const accumulator = new SummaryAccumulator();

  await writeChunk(
    out,
    [
      '# AWS Resources Report',
      '',
      `**Generated:** ${generatedAt.toISOString()}`,
      '',
      '## Resources',
      '',
      ...headerRows(['Service', 'Type', 'Name/ID', 'Region', 'State', 'Monthly Cost']),
      '',
    ].join('\n')
  );

  for await (const resource of resources) {
    accumulator.add(resource);
    await writeChunk(
      out,
      `${row([
        resource.service,
        resource.type,
        resource.name ?? resource.id,
        resource.region,
        resource.state ?? 'active',
        formatCost(resourceCost(resource)),
      ])}\n`
    );
  }

  const lines = [''];
  if (accumulator.totalResources === 0) {
    lines.push('No resources found.', '');
  }
  lines.push(
    '## Totals',
    '',
    `**Total Resources Found:** ${accumulator.totalResources}`,
    `**Total Estimated Monthly Cost:** ${formatCost(accumulator.totalCost)}`,
    '',
    '## Summary by Service',
    '',
    ...headerRows(['Service', 'Resource Count', 'Estimated Monthly Cost'])
  );
  for (const summary of accumulator.summaries()) {
    lines.push(
      row([
        summary.service,
        String(summary.totalResources),
        formatCost(summary.totalEstimatedMonthlyCost),
      ])
    );
  }
  lines.push('');
  if (options.outcomes) {
    lines.push(...diagnosticsSection(options.outcomes()));
  }

  await writeChunk(out, lines.join('\n'));
  return resultOf(accumulator);
}

/**
 * JSON: resources are streamed inside the array; totals follow it.
 */
export async function writeJsonStream(
  resources: AsyncIterable<Resource>,
  out: Writable,
  options: StreamReportOptions = {}
): Promise<StreamReportResult> {
  const generatedAt = options.generatedAt ?? new Date();
  const accumulator = new SummaryAccumulator();

  await writeChunk(
    out,
    `{\n  "generated_at": ${JSON.stringify(generatedAt.toISOString())},\n  "resources": [`
  );

  for await (const resource of resources) {
    const separator = accumulator.totalResources === 0 ? '\n' : ',\n';
    accumulator.add(resource);
    await writeChunk(out, `${separator}    ${JSON.stringify(toJsonResource(resource))}`);
  }

  const tail = [
    accumulator.totalResources === 0 ? '],' : '\n  ],',
    `  "total_resources": ${accumulator.totalResources},`,
    `  "total_estimated_monthly_cost": ${JSON.stringify(accumulator.totalCost)},`,
    `  "summary": ${JSON.stringify(accumulator.summaries().map(toJsonSummary))}`,
  ];
  if (options.outcomes) {
    tail[tail.length - 1] += ',';
    tail.push(
      `  "diagnostics": ${JSON.stringify(collectDiagnostics(options.outcomes()).map(toJsonDiagnostic))}`
    );
  }
  tail.push('}', '');

  await writeChunk(out, tail.join('\n'));
  return resultOf(accumulator);
}

/**
 * CSV: header, then one row per resource.
 */
export async function writeCsvStream(
  resources: AsyncIterable<Resource>,
  out: Writable
): Promise<StreamReportResult> {
  const accumulator = new SummaryAccumulator();

  await writeChunk(out, csvHeader());
  for await (const resource of resources) {
    accumulator.add(resource);
    await writeChunk(out, csvRow(resource));
  }

  return resultOf(accumulator);
}

/**
 * Stream a report in the requested format.
 */
export function writeReportStream(
  format: ReportFormat,
  resources: AsyncIterable<Resource>,
  out: Writable,
  options: StreamReportOptions = {}
): Promise<StreamReportResult> {
  switch (format) {
    case 'markdown':
      return writeMarkdownStream(resources, out, options);
    case 'json':
      return writeJsonStream(resources, out, options);
    case 'csv':
      return writeCsvStream(resources, out);
    default: {
      const unreachable: never = format;
      return Promise.reject(new Error(`Unsupported report format: ${String(unreachable)}`));
    }
  }
}
