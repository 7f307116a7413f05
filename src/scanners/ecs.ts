/**
 * ECS scanner: clusters and their services.
 */

import {
  ECSClient,
  DescribeClustersCommand,
  DescribeServicesCommand,
  paginateListClusters,
  paginateListServices,
  type Cluster,
  type Service,
} from '@aws-sdk/client-ecs';
import type { Resource } from '@shared/types';
import { BaseScanner, chunk, tagsToRecord, toDate } from './base';

/** DescribeClusters accepts up to 100 ARNs per call. */
const CLUSTER_BATCH_SIZE = 100;

/** DescribeServices accepts up to 10 ARNs per call. */
const SERVICE_BATCH_SIZE = 10;

export class ECSScanner extends BaseScanner {
  readonly serviceName = 'ECS';

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    const client = new ECSClient(this.provider.clientConfig(region));

    try {
      const clusterArns: string[] = [];
      for await (const page of paginateListClusters({ client }, {})) {
        signal?.throwIfAborted();
        clusterArns.push(...(page.clusterArns ?? []));
      }

      const resources: Resource[] = [];
      for (const batch of chunk(clusterArns, CLUSTER_BATCH_SIZE)) {
        signal?.throwIfAborted();
        const response = await client.send(
          new DescribeClustersCommand({ clusters: batch, include: ['STATISTICS', 'TAGS'] })
        );

        for (const cluster of response.clusters ?? []) {
          resources.push(this.clusterResource(cluster, region));
          if (cluster.clusterArn) {
            resources.push(...(await this.scanServices(client, cluster.clusterArn, region, signal)));
          }
        }
      }

      return resources;
    } finally {
      client.destroy();
    }
  }

  private async scanServices(
    client: ECSClient,
    clusterArn: string,
    region: string,
    signal?: AbortSignal
  ): Promise<Resource[]> {
    const serviceArns: string[] = [];
    for await (const page of paginateListServices({ client }, { cluster: clusterArn })) {
      signal?.throwIfAborted();
      serviceArns.push(...(page.serviceArns ?? []));
    }

    const resources: Resource[] = [];
    for (const batch of chunk(serviceArns, SERVICE_BATCH_SIZE)) {
      signal?.throwIfAborted();
      const response = await client.send(
        new DescribeServicesCommand({ cluster: clusterArn, services: batch, include: ['TAGS'] })
      );
      for (const service of response.services ?? []) {
        resources.push(this.serviceResource(service, region));
      }
    }
    return resources;
  }

  private clusterResource(cluster: Cluster, region: string): Resource {
    const tags = tagsToRecord(cluster.tags);
    const clusterName = cluster.clusterName ?? 'Unknown';
    const runningTasks = cluster.runningTasksCount ?? 0;

    return this.createResource({
      id: cluster.clusterArn ?? '',
      type: 'Cluster',
      region,
      name: tags.Name ?? clusterName,
      state: cluster.status,
      estimatedMonthlyCost: this.estimate({ kind: 'fargate-tasks', taskCount: runningTasks }),
      additionalInfo: {
        clusterName,
        runningTasksCount: runningTasks,
        pendingTasksCount: cluster.pendingTasksCount ?? 0,
        activeServicesCount: cluster.activeServicesCount ?? 0,
        registeredContainerInstancesCount: cluster.registeredContainerInstancesCount ?? 0,
        capacityProviders: cluster.capacityProviders ?? [],
        tags,
      },
    });
  }

  private serviceResource(service: Service, region: string): Resource {
    const tags = tagsToRecord(service.tags);
    const serviceName = service.serviceName ?? 'Unknown';
    const desiredCount = service.desiredCount ?? 0;
    const launchType = service.launchType ?? 'EC2';

    return this.createResource({
      id: service.serviceArn ?? '',
      type: 'Service',
      region,
      name: tags.Name ?? serviceName,
      createdAt: toDate(service.createdAt),
      state: service.status,
      estimatedMonthlyCost: this.estimate({
        kind: 'fargate-tasks',
        taskCount: launchType === 'FARGATE' ? desiredCount : 0,
      }),
      additionalInfo: {
        serviceName,
        launchType,
        desiredCount,
        runningCount: service.runningCount ?? 0,
        pendingCount: service.pendingCount ?? 0,
        taskDefinition: service.taskDefinition?.split('/').pop() ?? '',
        deploymentController: service.deploymentController?.type,
        tags,
      },
    });
  }
}
