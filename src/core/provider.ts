/**
 * Cloud provider capability.
 *
 * Scanners only need two things from the account: the list of enabled
 * regions and the settings to build an SDK client for one of them.
 */

import { EC2Client, DescribeRegionsCommand } from '@aws-sdk/client-ec2';
import type { ScannerConfig } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { RegionDiscoveryError, isCancellation } from './errors';
import { RetryPolicy, withRetry } from './retry';

const logger = setupLogger('aws-inventory:provider');

const DEFAULT_HOME_REGION = 'us-east-1';
const DEFAULT_CONNECTION_TIMEOUT_MS = 5000;

/**
 * Settings handed to every AWS SDK v3 client constructor.
 *
 * SDK retries are disabled; RetryPolicy owns the attempt budget.
 */
export type AwsClientConfig = {
  region: string;
  maxAttempts: number;
  requestHandler: {
    requestTimeout: number;
    connectionTimeout: number;
  };
};

export interface CloudProvider {
  /**
   * Region used for account-level calls and global services.
   */
  readonly homeRegion: string;

  /**
   * Enabled regions of the account, sorted.
   */
  listRegions(signal?: AbortSignal): Promise<string[]>;

  clientConfig(region: string): AwsClientConfig;
}

export interface AwsProviderOptions {
  homeRegion?: string;
  requestTimeoutMs: number;
  connectionTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
}

/**
 * Resolve the home region from the standard AWS environment variables.
 */
export function resolveHomeRegion(env: NodeJS.ProcessEnv = process.env): string {
  return env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_HOME_REGION;
}

export class AwsProvider implements CloudProvider {
  readonly homeRegion: string;
  private readonly requestTimeoutMs: number;
  private readonly connectionTimeoutMs: number;
  private readonly retryPolicy?: RetryPolicy;

  constructor(options: AwsProviderOptions) {
    this.homeRegion = options.homeRegion ?? resolveHomeRegion();
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? DEFAULT_CONNECTION_TIMEOUT_MS;
    this.retryPolicy = options.retryPolicy;
  }

  static fromConfig(config: ScannerConfig, homeRegion?: string): AwsProvider {
    return new AwsProvider({
      homeRegion,
      requestTimeoutMs: config.request_timeout * 1000,
      retryPolicy: RetryPolicy.fromConfig(config),
    });
  }

  clientConfig(region: string): AwsClientConfig {
    return {
      region,
      maxAttempts: 1,
      requestHandler: {
        requestTimeout: this.requestTimeoutMs,
        connectionTimeout: this.connectionTimeoutMs,
      },
    };
  }

  /**
   * List enabled regions with EC2 DescribeRegions.
   *
   * @throws {RegionDiscoveryError} If the regions cannot be listed
   */
  async listRegions(signal?: AbortSignal): Promise<string[]> {
    const client = new EC2Client(this.clientConfig(this.homeRegion));
    const describe = async (): Promise<string[]> => {
      const response = await client.send(new DescribeRegionsCommand({}));
      return (response.Regions ?? [])
        .map((region) => region.RegionName)
        .filter((name): name is string => typeof name === 'string' && name.length > 0);
    };

    try {
      const regions = this.retryPolicy
        ? await withRetry(describe, this.retryPolicy, { label: 'DescribeRegions', signal })
        : await describe();

      regions.sort();
      logger.info({ count: regions.length, homeRegion: this.homeRegion }, 'Discovered regions');
      return regions;
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      throw new RegionDiscoveryError(
        `Failed to list regions from ${this.homeRegion}: ${String(error)}`,
        { cause: error }
      );
    } finally {
      client.destroy();
    }
  }
}
