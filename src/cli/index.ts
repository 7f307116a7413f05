#!/usr/bin/env node

/**
 * AWS resource inventory CLI.
 *
 * Report and summary output go to stdout and the report file; logs go to stderr.
 */

import { Command, Option } from 'commander';
import { ScanCancelledError } from '@core/errors';
import { SERVICE_NAMES } from '@scanners/factory';
import {
  LOG_LEVELS,
  REPORT_FORMATS,
  parseFormatOption,
  parseListOption,
  parseLogLevelOption,
  type ScanCommandOptions,
} from './options';
import { EXIT_INTERRUPTED, runScan } from './scan';

const controller = new AbortController();

process.once('SIGINT', () => {
  controller.abort(new ScanCancelledError('Interrupted by SIGINT'));
  // A second Ctrl-C exits without waiting for in-flight calls.
  process.once('SIGINT', () => process.exit(EXIT_INTERRUPTED));
});

const program = new Command();

program
  .name('aws-inventory')
  .description('Scan an AWS account and report its resources with estimated monthly costs')
  .option('--regions <list>', 'only scan these regions (comma-separated)', parseListOption)
  .option('--skip-regions <list>', 'skip these regions (comma-separated)', parseListOption)
  .option(
    '--services <list>',
    `only scan these services (comma-separated; ${SERVICE_NAMES.join(', ')})`,
    parseListOption
  )
  .option('--skip-services <list>', 'skip these services (comma-separated)', parseListOption)
  .option('-o, --output <path>', 'report file path')
  .addOption(
    new Option('-f, --format <format>', `report format (${REPORT_FORMATS.join(', ')})`).argParser(
      parseFormatOption
    )
  )
  .addOption(
    new Option('--log-level <level>', `log level (${LOG_LEVELS.join(', ')})`).argParser(
      parseLogLevelOption
    )
  )
  .option('-c, --config <path>', 'configuration file (YAML or JSON)')
  .option('--no-progress', 'disable the progress spinner')
  .option('--streaming', 'write the report while scanning instead of holding every resource', false)
  .action(async () => {
    process.exitCode = await runScan(program.opts<ScanCommandOptions>(), {
      signal: controller.signal,
    });
  });

await program.parseAsync(process.argv);
