/**
 * RDS scanner: DB instances, DB clusters (Aurora) and manual DB snapshots.
 */

import {
  RDSClient,
  paginateDescribeDBClusters,
  paginateDescribeDBInstances,
  paginateDescribeDBSnapshots,
  type DBCluster,
  type DBInstance,
  type DBSnapshot,
} from '@aws-sdk/client-rds';
import type { Resource } from '@shared/types';
import { BaseScanner, toDate } from './base';

export class RDSScanner extends BaseScanner {
  readonly serviceName = 'RDS';

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    const client = new RDSClient(this.provider.clientConfig(region));

    try {
      const resources: Resource[] = [];

      for await (const page of paginateDescribeDBInstances({ client }, {})) {
        signal?.throwIfAborted();
        for (const instance of page.DBInstances ?? []) {
          resources.push(this.instanceResource(instance, region));
        }
      }

      for await (const page of paginateDescribeDBClusters({ client }, {})) {
        signal?.throwIfAborted();
        for (const cluster of page.DBClusters ?? []) {
          resources.push(this.clusterResource(cluster, region));
        }
      }

      for await (const page of paginateDescribeDBSnapshots({ client }, { SnapshotType: 'manual' })) {
        signal?.throwIfAborted();
        for (const snapshot of page.DBSnapshots ?? []) {
          resources.push(this.snapshotResource(snapshot, region));
        }
      }

      this.logger.debug({ region, count: resources.length }, 'RDS scan finished');
      return resources;
    } finally {
      client.destroy();
    }
  }

  private instanceResource(instance: DBInstance, region: string): Resource {
    const identifier = instance.DBInstanceIdentifier ?? 'Unknown';
    const storageGb = instance.AllocatedStorage ?? 0;
    const status = instance.DBInstanceStatus ?? 'unknown';

    return this.createResource({
      id: identifier,
      type: 'DB Instance',
      region,
      name: instance.DBInstanceIdentifier,
      createdAt: toDate(instance.InstanceCreateTime),
      state: status,
      estimatedMonthlyCost: this.estimate({
        kind: 'rds-instance',
        instanceClass: instance.DBInstanceClass ?? '',
        storageGb,
        status,
      }),
      additionalInfo: {
        engine: instance.Engine,
        engineVersion: instance.EngineVersion,
        instanceClass: instance.DBInstanceClass,
        allocatedStorage: `${storageGb} GB`,
        multiAZ: instance.MultiAZ,
        endpoint: instance.Endpoint?.Address,
      },
    });
  }

  private clusterResource(cluster: DBCluster, region: string): Resource {
    const memberCount = cluster.DBClusterMembers?.length ?? 0;
    const status = cluster.Status ?? 'unknown';

    return this.createResource({
      id: cluster.DBClusterIdentifier ?? 'Unknown',
      type: 'DB Cluster',
      region,
      name: cluster.DBClusterIdentifier,
      createdAt: toDate(cluster.ClusterCreateTime),
      state: status,
      estimatedMonthlyCost: this.estimate({ kind: 'rds-cluster', memberCount, status }),
      additionalInfo: {
        engine: cluster.Engine,
        engineVersion: cluster.EngineVersion,
        memberCount,
        allocatedStorage: cluster.AllocatedStorage,
        endpoint: cluster.Endpoint,
      },
    });
  }

  private snapshotResource(snapshot: DBSnapshot, region: string): Resource {
    const storageGb = snapshot.AllocatedStorage ?? 0;

    return this.createResource({
      id: snapshot.DBSnapshotIdentifier ?? 'Unknown',
      type: 'DB Snapshot',
      region,
      name: snapshot.DBSnapshotIdentifier,
      createdAt: toDate(snapshot.SnapshotCreateTime),
      state: snapshot.Status,
      estimatedMonthlyCost: this.estimate({ kind: 'rds-snapshot', storageGb }),
      additionalInfo: {
        engine: snapshot.Engine,
        allocatedStorage: `${storageGb} GB`,
        encrypted: snapshot.Encrypted,
        sourceDBInstance: snapshot.DBInstanceIdentifier,
      },
    });
  }
}
