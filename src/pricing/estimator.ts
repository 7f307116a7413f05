/**
 * Rough monthly cost estimates.
 *
 * Prices are static list prices from pricing.json; they ignore region,
 * reservations and actual usage.
 */

import { z } from 'zod';
import pricingData from './pricing.json';

const PriceTable = z.record(z.number().nonnegative());
const Price = z.number().nonnegative();

const PricingSchema = z.object({
  ec2: z.object({ instances: PriceTable, defaultInstance: Price }),
  ebs: z.object({ perGb: PriceTable, defaultPerGb: Price, snapshotPerGb: Price }),
  network: z.object({ idleElasticIp: Price, natGatewayMonthly: Price }),
  rds: z.object({
    instances: PriceTable,
    defaultInstance: Price,
    storagePerGb: Price,
    clusterMember: Price,
    snapshotPerGb: Price,
  }),
  lambda: z.object({
    monthlyInvocations: Price,
    averageDurationMs: Price,
    perGbSecond: Price,
    perMillionRequests: Price,
    arm64Multiplier: Price,
  }),
  dynamodb: z.object({ onDemandBase: Price, perCapacityUnit: Price, storagePerGb: Price }),
  fargate: z.object({
    perVcpuHour: Price,
    perGbHour: Price,
    taskVcpu: Price,
    taskMemoryGb: Price,
    hoursPerMonth: Price,
  }),
  s3: z.object({
    storagePerGb: Price,
    perThousandRequests: Price,
    versioningMultiplier: Price,
    lifecycleMultiplier: Price,
    minimumMonthly: Price,
  }),
});

export type Pricing = z.infer<typeof PricingSchema>;

export const PRICING: Pricing = PricingSchema.parse(pricingData);

const BYTES_PER_GB = 1024 ** 3;

/**
 * Attributes a scanner extracts from one raw record, tagged by resource kind.
 */
export type CostInput =
  | { kind: 'ec2-instance'; instanceType: string; state: string }
  | { kind: 'ebs-volume'; volumeType: string; sizeGb: number }
  | { kind: 'ebs-snapshot'; sizeGb: number }
  | { kind: 'elastic-ip'; attached: boolean }
  | { kind: 'nat-gateway'; state: string }
  | { kind: 'rds-instance'; instanceClass: string; storageGb: number; status: string }
  | { kind: 'rds-cluster'; memberCount: number; status: string }
  | { kind: 'rds-snapshot'; storageGb: number }
  | { kind: 'lambda-function'; memoryMb: number; architectures: readonly string[] }
  | {
      kind: 'dynamodb-table';
      billingMode: string;
      readCapacityUnits: number;
      writeCapacityUnits: number;
      sizeBytes: number;
    }
  | { kind: 'fargate-tasks'; taskCount: number }
  | {
      kind: 's3-bucket';
      sizeGb: number;
      objectCount: number;
      versioning: boolean;
      lifecycleRules: number;
    };

/**
 * Pure function from resource attributes to USD per month. Must not throw
 * and must return a finite number >= 0.
 */
export type CostEstimator = (input: CostInput) => number;

function amount(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function roundCents(value: number): number {
  return Math.round(amount(value) * 100) / 100;
}

function lookup(table: Readonly<Record<string, number>>, key: string, fallback: number): number {
  return Object.hasOwn(table, key) ? table[key] : fallback;
}

function fargateTaskMonthly(pricing: Pricing): number {
  const { perVcpuHour, perGbHour, taskVcpu, taskMemoryGb, hoursPerMonth } = pricing.fargate;
  return (perVcpuHour * taskVcpu + perGbHour * taskMemoryGb) * hoursPerMonth;
}

function lambdaMonthly(input: { memoryMb: number; architectures: readonly string[] }, pricing: Pricing): number {
  const { monthlyInvocations, averageDurationMs, perGbSecond, perMillionRequests, arm64Multiplier } =
    pricing.lambda;
  const gbSeconds =
    (amount(input.memoryMb) / 1024) * (averageDurationMs / 1000) * monthlyInvocations;
  let compute = gbSeconds * perGbSecond;
  if (input.architectures.includes('arm64')) {
    compute *= arm64Multiplier;
  }
  return compute + (monthlyInvocations / 1_000_000) * perMillionRequests;
}

function s3Monthly(
  input: { sizeGb: number; objectCount: number; versioning: boolean; lifecycleRules: number },
  pricing: Pricing
): number {
  const prices = pricing.s3;
  let storage = amount(input.sizeGb) * prices.storagePerGb;
  if (input.versioning) {
    storage *= prices.versioningMultiplier;
  }
  if (input.lifecycleRules > 0) {
    storage *= prices.lifecycleMultiplier;
  }
  const requests = (amount(input.objectCount) / 1000) * prices.perThousandRequests;
  return Math.max(storage + requests, prices.minimumMonthly);
}

/**
 * Build an estimator over a price table.
 */
export function createCostEstimator(pricing: Pricing = PRICING): CostEstimator {
  return (input) => {
    switch (input.kind) {
      case 'ec2-instance':
        return input.state === 'running'
          ? roundCents(lookup(pricing.ec2.instances, input.instanceType, pricing.ec2.defaultInstance))
          : 0;
      case 'ebs-volume':
        return roundCents(
          lookup(pricing.ebs.perGb, input.volumeType, pricing.ebs.defaultPerGb) * amount(input.sizeGb)
        );
      case 'ebs-snapshot':
        return roundCents(amount(input.sizeGb) * pricing.ebs.snapshotPerGb);
      case 'elastic-ip':
        return input.attached ? 0 : roundCents(pricing.network.idleElasticIp);
      case 'nat-gateway':
        return input.state === 'available' ? roundCents(pricing.network.natGatewayMonthly) : 0;
      case 'rds-instance':
        return input.status === 'available'
          ? roundCents(
              lookup(pricing.rds.instances, input.instanceClass, pricing.rds.defaultInstance) +
                amount(input.storageGb) * pricing.rds.storagePerGb
            )
          : 0;
      case 'rds-cluster':
        return input.status === 'available'
          ? roundCents(amount(input.memberCount) * pricing.rds.clusterMember)
          : 0;
      case 'rds-snapshot':
        return roundCents(amount(input.storageGb) * pricing.rds.snapshotPerGb);
      case 'lambda-function':
        return roundCents(lambdaMonthly(input, pricing));
      case 'dynamodb-table': {
        const base =
          input.billingMode === 'PAY_PER_REQUEST'
            ? pricing.dynamodb.onDemandBase
            : (amount(input.readCapacityUnits) + amount(input.writeCapacityUnits)) *
              pricing.dynamodb.perCapacityUnit;
        return roundCents(
          base + (amount(input.sizeBytes) / BYTES_PER_GB) * pricing.dynamodb.storagePerGb
        );
      }
      case 'fargate-tasks':
        return roundCents(amount(input.taskCount) * fargateTaskMonthly(pricing));
      case 's3-bucket':
        return roundCents(s3Monthly(input, pricing));
      default: {
        const unreachable: never = input;
        void unreachable;
        return 0;
      }
    }
  };
}

/**
 * Default estimator over the bundled price table.
 */
export const estimateMonthlyCost: CostEstimator = createCostEstimator();
