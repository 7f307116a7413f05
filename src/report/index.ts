/**
 * Report module - renders scan results as Markdown, JSON or CSV.
 */

import type { ReportFormat } from '@shared/types';
import { renderCsvReport } from './csv';
import { renderJsonReport } from './json';
import { renderMarkdownReport } from './markdown';
import type { ReportInput } from './summary';

/**
 * Render an eager report in the requested format.
 */
export function renderReport(format: ReportFormat, input: ReportInput): string {
  switch (format) {
    case 'markdown':
      return renderMarkdownReport(input);
    case 'json':
      return renderJsonReport(input);
    case 'csv':
      return renderCsvReport(input);
    default: {
      const unreachable: never = format;
      throw new Error(`Unsupported report format: ${String(unreachable)}`);
    }
  }
}

export { renderCsvReport, csvField, csvRow, CSV_HEADERS } from './csv';
export { renderJsonReport, buildJsonReport, type JsonReport } from './json';
export { renderMarkdownReport, anchorFor, escapeCell } from './markdown';
export {
  writeCsvStream,
  writeJsonStream,
  writeMarkdownStream,
  writeReportStream,
  type StreamReportOptions,
  type StreamReportResult,
} from './streaming';
export {
  SummaryAccumulator,
  collectDiagnostics,
  formatCost,
  summarizeByService,
  topExpensive,
  totalCost,
  type ReportInput,
  type ScanDiagnostic,
} from './summary';
