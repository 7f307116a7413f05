/**
 * Simple factory for creating service scanners.
 *
 * Maps service names to their scanner classes.
 */

import type { CloudProvider } from '@core/provider';
import { estimateMonthlyCost, type CostEstimator } from '@/pricing/estimator';
import type { RegionScanner } from './base';
import { DynamoDBScanner } from './dynamodb';
import { EC2Scanner } from './ec2';
import { ECSScanner } from './ecs';
import { LambdaScanner } from './lambda';
import { RDSScanner } from './rds';
import { S3Scanner } from './s3';

/**
 * Registered services, in report order.
 */
export const SERVICE_NAMES = ['EC2', 'S3', 'RDS', 'Lambda', 'DynamoDB', 'ECS'] as const;

export type ServiceName = (typeof SERVICE_NAMES)[number];

/**
 * Get a scanner for a service.
 *
 * @param serviceName - Service name, case-insensitive (e.g. "ec2", "Lambda")
 * @param provider - Region listing and client settings
 * @param estimator - Cost estimator handed to the scanner
 * @returns Scanner instance or null if the service is not supported
 */
export function createScanner(
  serviceName: string,
  provider: CloudProvider,
  estimator: CostEstimator = estimateMonthlyCost
): RegionScanner | null {
  switch (serviceName.toLowerCase()) {
    case 'ec2':
      return new EC2Scanner(provider, estimator);
    case 's3':
      return new S3Scanner(provider, estimator);
    case 'rds':
      return new RDSScanner(provider, estimator);
    case 'lambda':
      return new LambdaScanner(provider, estimator);
    case 'dynamodb':
      return new DynamoDBScanner(provider, estimator);
    case 'ecs':
      return new ECSScanner(provider, estimator);
    default:
      return null;
  }
}

/**
 * Create one scanner per registered service.
 */
export function createScanners(
  provider: CloudProvider,
  estimator: CostEstimator = estimateMonthlyCost
): RegionScanner[] {
  return SERVICE_NAMES.map((name) => createScanner(name, provider, estimator)).filter(
    (scanner): scanner is RegionScanner => scanner !== null
  );
}
