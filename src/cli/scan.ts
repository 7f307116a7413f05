/**
 * The `scan` command: resolve configuration, discover regions, run every
 * selected service and write the report.
 */

import { once } from 'events';
import { createWriteStream } from 'fs';
import { writeFile } from 'fs/promises';
import { finished } from 'stream/promises';
import chalk from 'chalk';
import { ConfigError, resolveConfig } from '@core/config';
import { errorMessage, isCancellation } from '@core/errors';
import { ScanOrchestrator, selectServices } from '@core/orchestrator';
import { AwsProvider, type CloudProvider } from '@core/provider';
import { renderReport, writeReportStream } from '@/report';
import { summarizeByService, totalCost } from '@/report/summary';
import { createScanners } from '@scanners/factory';
import type { RegionScanner } from '@scanners/base';
import type { ScannerConfig, ServiceOutcome } from '@shared/types';
import { setLogLevel, setupLogger } from '@shared/utils/logger';
import { reportPathFor, toOverrides, type ScanCommandOptions } from './options';
import { createProgress } from './progress';
import { renderSummaryTable } from './summaryTable';

const logger = setupLogger('aws-inventory:cli');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

export interface ScanContext {
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;

  /**
   * Replaces the AWS provider built from the configuration.
   */
  provider?: CloudProvider;
  scanners?: (provider: CloudProvider) => RegionScanner[];

  /**
   * Receives console output. Defaults to stdout.
   */
  print?: (text: string) => void;
}

interface ReportTotals {
  totalResources: number;
  totalCost: number;
}

/**
 * Stream the report into `path`. The file is opened before the scan starts;
 * a write failure aborts the scan and is rethrown in place of the cancellation.
 */
async function writeStreamingReport(
  config: ScannerConfig,
  path: string,
  orchestrator: ScanOrchestrator,
  scanners: readonly RegionScanner[],
  regions: readonly string[],
  outcomes: () => readonly ServiceOutcome[],
  signal?: AbortSignal
): Promise<ReportTotals> {
  const out = createWriteStream(path, { encoding: 'utf8' });
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  let writeError: unknown;
  out.on('error', (error) => {
    writeError ??= error;
    controller.abort(error);
  });

  try {
    await once(out, 'open');
    const result = await writeReportStream(
      config.report_format,
      orchestrator.streamServices(scanners, regions, controller.signal),
      out,
      { outcomes }
    );
    out.end();
    await finished(out);
    return result;
  } catch (error) {
    out.destroy();
    throw writeError ?? error;
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Run a scan with parsed command-line options.
 *
 * @returns Process exit code
 */
export async function runScan(
  options: ScanCommandOptions,
  context: ScanContext = {}
): Promise<number> {
  const print = context.print ?? ((text: string) => console.log(text));
  const { signal } = context;

  let config: ScannerConfig;
  try {
    config = await resolveConfig({
      path: options.config,
      env: context.env,
      overrides: toOverrides(options),
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      print(chalk.red(error.message));
      return EXIT_FAILURE;
    }
    throw error;
  }
  setLogLevel(config.log_level);

  const provider = context.provider ?? AwsProvider.fromConfig(config);
  const allScanners = (context.scanners ?? createScanners)(provider);
  const reportPath = reportPathFor(config);

  const selected = selectServices(allScanners, config);
  const progress = createProgress(selected.length, options.progress);
  const orchestrator = new ScanOrchestrator(config, { observer: progress.observer });

  try {
    const regions = await provider.listRegions(signal);

    if (options.streaming) {
      const totals = await writeStreamingReport(
        config,
        reportPath,
        orchestrator,
        selected,
        regions,
        progress.outcomes,
        signal
      );
      progress.succeed(
        `Found ${totals.totalResources} resources, report written to ${reportPath}`
      );
      return EXIT_OK;
    }

    const run = await orchestrator.scanServices(selected, regions, signal);
    await writeFile(
      reportPath,
      renderReport(config.report_format, { resources: run.resources, services: run.services }),
      'utf8'
    );
    progress.succeed(`Found ${run.resources.length} resources, report written to ${reportPath}`);

    print(
      renderSummaryTable(
        summarizeByService(run.resources),
        run.resources.length,
        totalCost(run.resources)
      )
    );
    return EXIT_OK;
  } catch (error) {
    if (isCancellation(error) || signal?.aborted) {
      progress.fail('Scan interrupted');
      logger.warn('Scan interrupted');
      return EXIT_INTERRUPTED;
    }

    progress.fail(errorMessage(error));
    logger.error({ error: String(error) }, 'Scan failed');
    return EXIT_FAILURE;
  }
}
