import chalk from 'chalk';
import Table from 'cli-table3';
import { formatCost } from '@/report/summary';
import type { ServiceSummary } from '@shared/types';

export function summaryRows(summaries: readonly ServiceSummary[]): string[][] {
  return summaries.map((summary) => [
    summary.service,
    String(summary.totalResources),
    formatCost(summary.totalEstimatedMonthlyCost),
  ]);
}

/**
 * Console table of per-service totals.
 */
export function renderSummaryTable(
  summaries: readonly ServiceSummary[],
  totalResources: number,
  totalCost: number
): string {
  const table = new Table({
    head: ['Service', 'Resources', 'Monthly Cost'],
    style: { head: ['cyan'] },
  });

  table.push(...summaryRows(summaries));
  table.push([chalk.bold('Total'), chalk.bold(String(totalResources)), chalk.bold(formatCost(totalCost))]);

  return table.toString();
}
