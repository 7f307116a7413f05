/**
 * Command-line options and their mapping onto configuration overrides.
 */

import { InvalidArgumentError } from 'commander';
import { DEFAULT_CONFIG, parseList } from '@core/config';
import type { LogLevel, ReportFormat, ScannerConfig } from '@shared/types';

export const REPORT_FORMATS: readonly ReportFormat[] = ['markdown', 'json', 'csv'];
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const REPORT_EXTENSIONS: Record<ReportFormat, string> = {
  markdown: '.md',
  json: '.json',
  csv: '.csv',
};

export interface ScanCommandOptions {
  regions?: string[];
  skipRegions?: string[];
  services?: string[];
  skipServices?: string[];
  output?: string;
  format?: ReportFormat;
  logLevel?: LogLevel;
  config?: string;
  progress: boolean;
  streaming: boolean;
}

/**
 * Commander argument parser for comma-separated lists.
 */
export function parseListOption(value: string): string[] {
  return parseList(value);
}

export function parseFormatOption(value: string): ReportFormat {
  const format = REPORT_FORMATS.find((candidate) => candidate === value.toLowerCase());
  if (!format) {
    throw new InvalidArgumentError(`Expected one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parseLogLevelOption(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}

/**
 * Options the user actually passed, as configuration overrides.
 */
export function toOverrides(options: ScanCommandOptions): Partial<ScannerConfig> {
  return {
    only_regions: options.regions,
    skip_regions: options.skipRegions,
    only_services: options.services,
    skip_services: options.skipServices,
    report_path: options.output,
    report_format: options.format,
    log_level: options.logLevel,
  };
}

/**
 * Report destination. The default file name follows the chosen format.
 */
export function reportPathFor(config: Pick<ScannerConfig, 'report_path' | 'report_format'>): string {
  if (config.report_path !== DEFAULT_CONFIG.report_path) {
    return config.report_path;
  }
  return config.report_path.replace(/\.md$/, REPORT_EXTENSIONS[config.report_format]);
}
