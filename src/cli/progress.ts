/**
 * Terminal progress for a scan: one spinner that ticks per finished service.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { ScanObserver, ServiceOutcome } from '@shared/types';

export interface ScanProgress {
  observer: ScanObserver;
  outcomes(): readonly ServiceOutcome[];
  succeed(text: string): void;
  fail(text: string): void;
}

/**
 * One-line status of a finished service.
 */
export function describeOutcome(outcome: ServiceOutcome): string {
  if (outcome.failure) {
    return `${outcome.service}: failed (${outcome.failure.code})`;
  }
  const failed = outcome.regions.filter((region) => region.failure).length;
  const suffix = failed > 0 ? `, ${failed} region(s) failed` : '';
  return `${outcome.service}: ${outcome.resourceCount} resources${suffix}`;
}

export function createProgress(totalServices: number, enabled: boolean): ScanProgress {
  const collected: ServiceOutcome[] = [];
  const spinner: Ora = ora({
    text: `Scanning 0/${totalServices} services`,
    stream: process.stderr,
    isEnabled: enabled,
    isSilent: !enabled,
  }).start();

  return {
    observer: {
      onServiceComplete(outcome) {
        collected.push(outcome);
        spinner.text = `Scanning ${collected.length}/${totalServices} services (${describeOutcome(outcome)})`;
      },
    },
    outcomes: () => collected,
    succeed(text) {
      spinner.succeed(chalk.green(text));
    },
    fail(text) {
      spinner.fail(chalk.red(text));
    },
  };
}
