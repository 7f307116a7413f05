import { describe, it, expect } from 'vitest';
import { PRICING, createCostEstimator, estimateMonthlyCost } from '@/pricing/estimator';

const GB = 1024 ** 3;

describe('estimateMonthlyCost', () => {
  describe('EC2', () => {
    it('should charge running instances from the instance table', () => {
      expect(
        estimateMonthlyCost({ kind: 'ec2-instance', instanceType: 'm5.xlarge', state: 'running' })
      ).toBe(140);
    });

    it('should use the default price for unknown instance types', () => {
      expect(
        estimateMonthlyCost({ kind: 'ec2-instance', instanceType: 'x9.huge', state: 'running' })
      ).toBe(50);
    });

    it('should not charge stopped instances', () => {
      expect(
        estimateMonthlyCost({ kind: 'ec2-instance', instanceType: 'm5.xlarge', state: 'stopped' })
      ).toBe(0);
    });

    it('should not resolve prototype keys as instance types', () => {
      expect(
        estimateMonthlyCost({ kind: 'ec2-instance', instanceType: 'constructor', state: 'running' })
      ).toBe(50);
    });
  });

  describe('storage and networking', () => {
    it('should price EBS volumes per GB by type', () => {
      expect(estimateMonthlyCost({ kind: 'ebs-volume', volumeType: 'io1', sizeGb: 200 })).toBe(25);
      expect(estimateMonthlyCost({ kind: 'ebs-volume', volumeType: 'mystery', sizeGb: 50 })).toBe(5);
    });

    it('should price snapshots per GB', () => {
      expect(estimateMonthlyCost({ kind: 'ebs-snapshot', sizeGb: 30 })).toBe(1.5);
    });

    it('should charge only idle Elastic IPs', () => {
      expect(estimateMonthlyCost({ kind: 'elastic-ip', attached: false })).toBe(3.6);
      expect(estimateMonthlyCost({ kind: 'elastic-ip', attached: true })).toBe(0);
    });

    it('should charge available NAT gateways', () => {
      expect(estimateMonthlyCost({ kind: 'nat-gateway', state: 'available' })).toBe(45);
      expect(estimateMonthlyCost({ kind: 'nat-gateway', state: 'pending' })).toBe(0);
    });
  });

  describe('RDS', () => {
    it('should add storage to the instance class price', () => {
      expect(
        estimateMonthlyCost({
          kind: 'rds-instance',
          instanceClass: 'db.r5.large',
          storageGb: 100,
          status: 'available',
        })
      ).toBe(191.5);
    });

    it('should fall back to the default class price', () => {
      expect(
        estimateMonthlyCost({
          kind: 'rds-instance',
          instanceClass: 'db.x2g.large',
          storageGb: 0,
          status: 'available',
        })
      ).toBe(100);
    });

    it('should price clusters per member and snapshots per GB', () => {
      expect(estimateMonthlyCost({ kind: 'rds-cluster', memberCount: 3, status: 'available' })).toBe(
        300
      );
      expect(estimateMonthlyCost({ kind: 'rds-cluster', memberCount: 3, status: 'stopped' })).toBe(0);
      expect(estimateMonthlyCost({ kind: 'rds-snapshot', storageGb: 10 })).toBe(0.95);
    });
  });

  describe('serverless', () => {
    it('should price Lambda from GB-seconds and requests', () => {
      expect(
        estimateMonthlyCost({ kind: 'lambda-function', memoryMb: 128, architectures: ['x86_64'] })
      ).toBe(0.04);
      expect(
        estimateMonthlyCost({ kind: 'lambda-function', memoryMb: 1024, architectures: ['x86_64'] })
      ).toBe(0.19);
      expect(
        estimateMonthlyCost({ kind: 'lambda-function', memoryMb: 1024, architectures: ['arm64'] })
      ).toBe(0.15);
    });

    it('should price DynamoDB by billing mode and storage', () => {
      expect(
        estimateMonthlyCost({
          kind: 'dynamodb-table',
          billingMode: 'PAY_PER_REQUEST',
          readCapacityUnits: 0,
          writeCapacityUnits: 0,
          sizeBytes: 4 * GB,
        })
      ).toBe(6);
      expect(
        estimateMonthlyCost({
          kind: 'dynamodb-table',
          billingMode: 'PROVISIONED',
          readCapacityUnits: 10,
          writeCapacityUnits: 10,
          sizeBytes: 0,
        })
      ).toBe(9.4);
    });

    it('should price Fargate per task', () => {
      expect(estimateMonthlyCost({ kind: 'fargate-tasks', taskCount: 1 })).toBe(17.52);
      expect(estimateMonthlyCost({ kind: 'fargate-tasks', taskCount: 0 })).toBe(0);
    });
  });

  describe('S3', () => {
    it('should apply the monthly minimum', () => {
      expect(
        estimateMonthlyCost({
          kind: 's3-bucket',
          sizeGb: 0,
          objectCount: 0,
          versioning: false,
          lifecycleRules: 0,
        })
      ).toBe(0.5);
    });

    it('should adjust storage for versioning and lifecycle rules', () => {
      const base = { kind: 's3-bucket', sizeGb: 1000, objectCount: 0 } as const;

      expect(estimateMonthlyCost({ ...base, versioning: false, lifecycleRules: 0 })).toBe(23);
      expect(estimateMonthlyCost({ ...base, versioning: true, lifecycleRules: 0 })).toBe(27.6);
      expect(estimateMonthlyCost({ ...base, versioning: false, lifecycleRules: 2 })).toBe(18.4);
    });
  });

  it('should return the same cost for the same attributes', () => {
    const input = { kind: 'rds-instance', instanceClass: 'db.t3.micro', storageGb: 20, status: 'available' } as const;

    expect(estimateMonthlyCost(input)).toBe(estimateMonthlyCost(input));
    expect(estimateMonthlyCost(input)).toBe(15.3);
  });

  it('should never return a negative or non-finite amount', () => {
    expect(estimateMonthlyCost({ kind: 'ebs-volume', volumeType: 'gp3', sizeGb: -10 })).toBe(0);
    expect(estimateMonthlyCost({ kind: 'ebs-snapshot', sizeGb: Number.NaN })).toBe(0);
    expect(estimateMonthlyCost({ kind: 'fargate-tasks', taskCount: Infinity })).toBe(0);
  });
});

describe('createCostEstimator', () => {
  it('should use the given price table', () => {
    const estimate = createCostEstimator({
      ...PRICING,
      network: { ...PRICING.network, natGatewayMonthly: 30 },
    });

    expect(estimate({ kind: 'nat-gateway', state: 'available' })).toBe(30);
  });
});
