/**
 * EC2 scanner: instances, EBS volumes, snapshots, Elastic IPs and NAT gateways.
 */

import {
  EC2Client,
  DescribeAddressesCommand,
  paginateDescribeInstances,
  paginateDescribeNatGateways,
  paginateDescribeSnapshots,
  paginateDescribeVolumes,
  type Address,
  type Instance,
  type NatGateway,
  type Snapshot,
  type Volume,
} from '@aws-sdk/client-ec2';
import type { Resource } from '@shared/types';
import { BaseScanner, tagsToRecord, toDate } from './base';

const GONE_NAT_GATEWAY_STATES: ReadonlySet<string> = new Set(['deleted', 'deleting', 'failed']);

export class EC2Scanner extends BaseScanner {
  readonly serviceName = 'EC2';

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    const client = new EC2Client(this.provider.clientConfig(region));

    try {
      const resources: Resource[] = [];
      resources.push(...(await this.scanInstances(client, region, signal)));
      resources.push(...(await this.scanVolumes(client, region, signal)));
      resources.push(...(await this.scanSnapshots(client, region, signal)));
      resources.push(...(await this.scanElasticIps(client, region, signal)));
      resources.push(...(await this.scanNatGateways(client, region, signal)));

      this.logger.debug({ region, count: resources.length }, 'EC2 scan finished');
      return resources;
    } finally {
      client.destroy();
    }
  }

  private async scanInstances(
    client: EC2Client,
    region: string,
    signal?: AbortSignal
  ): Promise<Resource[]> {
    const resources: Resource[] = [];

    for await (const page of paginateDescribeInstances({ client }, {})) {
      signal?.throwIfAborted();
      for (const reservation of page.Reservations ?? []) {
        for (const instance of reservation.Instances ?? []) {
          if (instance.State?.Name !== 'terminated') {
            resources.push(this.instanceResource(instance, region));
          }
        }
      }
    }

    return resources;
  }

  private instanceResource(instance: Instance, region: string): Resource {
    const tags = tagsToRecord(instance.Tags);
    const instanceType = instance.InstanceType ?? '';
    const state = instance.State?.Name ?? 'unknown';

    return this.createResource({
      id: instance.InstanceId ?? 'Unknown',
      type: 'Instance',
      region,
      name: tags.Name,
      createdAt: toDate(instance.LaunchTime),
      state,
      estimatedMonthlyCost: this.estimate({ kind: 'ec2-instance', instanceType, state }),
      additionalInfo: {
        instanceType,
        publicIp: instance.PublicIpAddress,
        privateIp: instance.PrivateIpAddress,
        vpcId: instance.VpcId,
        subnetId: instance.SubnetId,
        availabilityZone: instance.Placement?.AvailabilityZone,
        platform: instance.Platform,
        architecture: instance.Architecture,
      },
    });
  }

  private async scanVolumes(
    client: EC2Client,
    region: string,
    signal?: AbortSignal
  ): Promise<Resource[]> {
    const resources: Resource[] = [];

    for await (const page of paginateDescribeVolumes({ client }, {})) {
      signal?.throwIfAborted();
      for (const volume of page.Volumes ?? []) {
        if (volume.State !== 'deleted') {
          resources.push(this.volumeResource(volume, region));
        }
      }
    }

    return resources;
  }

  private volumeResource(volume: Volume, region: string): Resource {
    const tags = tagsToRecord(volume.Tags);
    const volumeType = volume.VolumeType ?? 'gp2';
    const sizeGb = volume.Size ?? 0;

    return this.createResource({
      id: volume.VolumeId ?? 'Unknown',
      type: 'EBS Volume',
      region,
      name: tags.Name,
      createdAt: toDate(volume.CreateTime),
      state: volume.State,
      estimatedMonthlyCost: this.estimate({ kind: 'ebs-volume', volumeType, sizeGb }),
      additionalInfo: {
        volumeType,
        size: sizeGb,
        iops: volume.Iops,
        throughput: volume.Throughput,
        encrypted: volume.Encrypted ?? false,
        availabilityZone: volume.AvailabilityZone ?? '',
        attachments: volume.Attachments?.length ?? 0,
      },
    });
  }

  private async scanSnapshots(
    client: EC2Client,
    region: string,
    signal?: AbortSignal
  ): Promise<Resource[]> {
    const resources: Resource[] = [];

    for await (const page of paginateDescribeSnapshots({ client }, { OwnerIds: ['self'] })) {
      signal?.throwIfAborted();
      for (const snapshot of page.Snapshots ?? []) {
        resources.push(this.snapshotResource(snapshot, region));
      }
    }

    return resources;
  }

  private snapshotResource(snapshot: Snapshot, region: string): Resource {
    const tags = tagsToRecord(snapshot.Tags);
    const sizeGb = snapshot.VolumeSize ?? 0;

    return this.createResource({
      id: snapshot.SnapshotId ?? 'Unknown',
      type: 'Snapshot',
      region,
      name: tags.Name || snapshot.Description || undefined,
      createdAt: toDate(snapshot.StartTime),
      state: snapshot.State,
      estimatedMonthlyCost: this.estimate({ kind: 'ebs-snapshot', sizeGb }),
      additionalInfo: {
        volumeSize: sizeGb,
        progress: snapshot.Progress,
        encrypted: snapshot.Encrypted ?? false,
        description: snapshot.Description,
      },
    });
  }

  private async scanElasticIps(
    client: EC2Client,
    region: string,
    signal?: AbortSignal
  ): Promise<Resource[]> {
    signal?.throwIfAborted();
    const response = await client.send(new DescribeAddressesCommand({}));
    return (response.Addresses ?? []).map((address) => this.elasticIpResource(address, region));
  }

  private elasticIpResource(address: Address, region: string): Resource {
    const tags = tagsToRecord(address.Tags);
    const attached = Boolean(address.InstanceId);

    return this.createResource({
      id: address.AllocationId ?? 'Unknown',
      type: 'Elastic IP',
      region,
      name: tags.Name,
      state: attached ? 'attached' : 'unattached',
      estimatedMonthlyCost: this.estimate({ kind: 'elastic-ip', attached }),
      additionalInfo: {
        publicIp: address.PublicIp,
        domain: address.Domain,
        instanceId: address.InstanceId,
        networkInterfaceId: address.NetworkInterfaceId,
        privateIpAddress: address.PrivateIpAddress,
      },
    });
  }

  private async scanNatGateways(
    client: EC2Client,
    region: string,
    signal?: AbortSignal
  ): Promise<Resource[]> {
    const resources: Resource[] = [];

    for await (const page of paginateDescribeNatGateways({ client }, {})) {
      signal?.throwIfAborted();
      for (const natGateway of page.NatGateways ?? []) {
        if (!GONE_NAT_GATEWAY_STATES.has(natGateway.State ?? '')) {
          resources.push(this.natGatewayResource(natGateway, region));
        }
      }
    }

    return resources;
  }

  private natGatewayResource(natGateway: NatGateway, region: string): Resource {
    const tags = tagsToRecord(natGateway.Tags);
    const state = natGateway.State ?? 'unknown';

    return this.createResource({
      id: natGateway.NatGatewayId ?? 'Unknown',
      type: 'NAT Gateway',
      region,
      name: tags.Name,
      createdAt: toDate(natGateway.CreateTime),
      state,
      estimatedMonthlyCost: this.estimate({ kind: 'nat-gateway', state }),
      additionalInfo: {
        vpcId: natGateway.VpcId,
        subnetId: natGateway.SubnetId,
        connectivityType: natGateway.ConnectivityType,
        natGatewayAddresses: (natGateway.NatGatewayAddresses ?? [])
          .map((address) => address.PublicIp)
          .filter((ip): ip is string => typeof ip === 'string'),
      },
    });
  }
}
