import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import {
  RDSClient,
  DescribeDBClustersCommand,
  DescribeDBInstancesCommand,
  DescribeDBSnapshotsCommand,
} from '@aws-sdk/client-rds';
import { RDSScanner } from '@scanners/rds';
import { FakeProvider } from '../../helpers/fakeProvider';

const rdsMock = mockClient(RDSClient);

describe('RDSScanner', () => {
  let scanner: RDSScanner;

  beforeEach(() => {
    rdsMock.reset();
    rdsMock.on(DescribeDBInstancesCommand).resolves({ DBInstances: [] });
    rdsMock.on(DescribeDBClustersCommand).resolves({ DBClusters: [] });
    rdsMock.on(DescribeDBSnapshotsCommand).resolves({ DBSnapshots: [] });
    scanner = new RDSScanner(new FakeProvider());
  });

  it('should price available instances by class and storage', async () => {
    rdsMock.on(DescribeDBInstancesCommand).resolves({
      DBInstances: [
        {
          DBInstanceIdentifier: 'orders-db',
          DBInstanceClass: 'db.t3.micro',
          DBInstanceStatus: 'available',
          AllocatedStorage: 20,
          Engine: 'postgres',
          MultiAZ: false,
          Endpoint: { Address: 'orders-db.example.internal' },
        },
        {
          DBInstanceIdentifier: 'paused-db',
          DBInstanceClass: 'db.m5.large',
          DBInstanceStatus: 'stopped',
          AllocatedStorage: 100,
        },
      ],
    });

    const [available, stopped] = await scanner.scanRegion('eu-west-1');

    expect(available).toMatchObject({
      id: 'orders-db',
      type: 'DB Instance',
      service: 'RDS',
      region: 'eu-west-1',
      state: 'available',
      estimatedMonthlyCost: 15.3,
      additionalInfo: {
        engine: 'postgres',
        instanceClass: 'db.t3.micro',
        allocatedStorage: '20 GB',
        multiAZ: false,
        endpoint: 'orders-db.example.internal',
      },
    });
    expect(stopped.estimatedMonthlyCost).toBe(0);
  });

  it('should price clusters per member', async () => {
    rdsMock.on(DescribeDBClustersCommand).resolves({
      DBClusters: [
        {
          DBClusterIdentifier: 'aurora-main',
          Status: 'available',
          Engine: 'aurora-mysql',
          DBClusterMembers: [{ DBInstanceIdentifier: 'a' }, { DBInstanceIdentifier: 'b' }],
        },
      ],
    });

    const [cluster] = await scanner.scanRegion('eu-west-1');

    expect(cluster).toMatchObject({
      id: 'aurora-main',
      type: 'DB Cluster',
      estimatedMonthlyCost: 200,
      additionalInfo: { memberCount: 2 },
    });
  });

  it('should list manual snapshots only', async () => {
    rdsMock.on(DescribeDBSnapshotsCommand).resolves({
      DBSnapshots: [
        {
          DBSnapshotIdentifier: 'orders-before-upgrade',
          AllocatedStorage: 100,
          Status: 'available',
          DBInstanceIdentifier: 'orders-db',
        },
      ],
    });

    const [snapshot] = await scanner.scanRegion('eu-west-1');

    expect(snapshot).toMatchObject({
      id: 'orders-before-upgrade',
      type: 'DB Snapshot',
      estimatedMonthlyCost: 9.5,
      additionalInfo: { allocatedStorage: '100 GB', sourceDBInstance: 'orders-db' },
    });
    expect(rdsMock.commandCalls(DescribeDBSnapshotsCommand)[0].args[0].input).toMatchObject({
      SnapshotType: 'manual',
    });
  });
});
