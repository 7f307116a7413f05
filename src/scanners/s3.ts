/**
 * S3 scanner.
 *
 * Buckets are account-wide, so this scanner runs once per scan and labels
 * everything with the "global" region. Per-bucket detail calls go to the
 * bucket's own region.
 */

import {
  S3Client,
  GetBucketEncryptionCommand,
  GetBucketLifecycleConfigurationCommand,
  GetBucketLocationCommand,
  GetBucketTaggingCommand,
  GetBucketVersioningCommand,
  GetPublicAccessBlockCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  type Bucket,
} from '@aws-sdk/client-s3';
import { errorCode, isCancellation } from '@core/errors';
import { GLOBAL_REGION, type Resource } from '@shared/types';
import { BaseScanner, tagsToRecord, toDate, type ScannerScope } from './base';

const BYTES_PER_GB = 1024 ** 3;

/** Codes S3 returns when an optional bucket setting was never configured. */
const NOT_CONFIGURED_CODES: ReadonlySet<string> = new Set([
  'NoSuchBucketPolicy',
  'NoSuchLifecycleConfiguration',
  'NoSuchPublicAccessBlockConfiguration',
  'NoSuchTagSet',
  'ServerSideEncryptionConfigurationNotFoundError',
]);

interface BucketDetails {
  location: string;
  objectCount: number;
  totalSizeGb: number;
  versioning: boolean;
  encryption: boolean;
  publicAccess: boolean;
  lifecycleRules: number;
  tags: Record<string, string>;
}

/**
 * Map a GetBucketLocation answer to a region code.
 */
export function bucketRegion(locationConstraint: string | undefined): string {
  if (!locationConstraint) {
    return 'us-east-1';
  }
  return locationConstraint === 'EU' ? 'eu-west-1' : locationConstraint;
}

function formatSize(sizeGb: number): string {
  return sizeGb < 1 ? `${(sizeGb * 1024).toFixed(2)} MB` : `${sizeGb.toFixed(2)} GB`;
}

export class S3Scanner extends BaseScanner {
  readonly serviceName = 'S3';
  override readonly scope: ScannerScope = 'global';

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    const clients = new Map<string, S3Client>();
    const clientFor = (bucketLocation: string): S3Client => {
      let client = clients.get(bucketLocation);
      if (!client) {
        client = new S3Client(this.provider.clientConfig(bucketLocation));
        clients.set(bucketLocation, client);
      }
      return client;
    };

    const homeRegion = region === GLOBAL_REGION ? this.provider.homeRegion : region;

    try {
      const response = await clientFor(homeRegion).send(new ListBucketsCommand({}));
      const resources: Resource[] = [];

      for (const bucket of response.Buckets ?? []) {
        signal?.throwIfAborted();
        resources.push(await this.bucketResource(bucket, homeRegion, clientFor));
      }

      this.logger.debug({ count: resources.length }, 'S3 scan finished');
      return resources;
    } finally {
      for (const client of clients.values()) {
        client.destroy();
      }
    }
  }

  private async bucketResource(
    bucket: Bucket,
    homeRegion: string,
    clientFor: (location: string) => S3Client
  ): Promise<Resource> {
    const bucketName = bucket.Name ?? '';

    try {
      const details = await this.bucketDetails(bucketName, homeRegion, clientFor);
      return this.createResource({
        id: bucketName,
        type: 'Bucket',
        region: GLOBAL_REGION,
        name: details.tags.Name ?? bucketName,
        createdAt: toDate(bucket.CreationDate),
        state: 'available',
        estimatedMonthlyCost: this.estimate({
          kind: 's3-bucket',
          sizeGb: details.totalSizeGb,
          objectCount: details.objectCount,
          versioning: details.versioning,
          lifecycleRules: details.lifecycleRules,
        }),
        additionalInfo: {
          location: details.location,
          objectCount: details.objectCount,
          totalSize: details.totalSizeGb,
          sizeStr: formatSize(details.totalSizeGb),
          versioning: details.versioning,
          encryption: details.encryption,
          publicAccess: details.publicAccess,
          lifecycleRules: details.lifecycleRules,
          tags: Object.keys(details.tags).length > 0 ? details.tags : undefined,
        },
      });
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }

      this.logger.warn(
        { bucket: bucketName, code: errorCode(error), error: String(error) },
        'Could not fetch bucket details'
      );
      return this.createResource({
        id: bucketName,
        type: 'Bucket',
        region: GLOBAL_REGION,
        name: bucketName,
        createdAt: toDate(bucket.CreationDate),
        state: 'available',
        estimatedMonthlyCost: this.estimate({
          kind: 's3-bucket',
          sizeGb: 0,
          objectCount: 0,
          versioning: false,
          lifecycleRules: 0,
        }),
        additionalInfo: { error: 'Could not fetch bucket details' },
      });
    }
  }

  private async bucketDetails(
    bucketName: string,
    homeRegion: string,
    clientFor: (location: string) => S3Client
  ): Promise<BucketDetails> {
    const location = await clientFor(homeRegion)
      .send(new GetBucketLocationCommand({ Bucket: bucketName }))
      .then((response) => bucketRegion(response.LocationConstraint));
    const client = clientFor(location);

    // First page only: a full listing of large buckets is too slow for an inventory.
    const objects = await client.send(
      new ListObjectsV2Command({ Bucket: bucketName, MaxKeys: 1000 })
    );
    const contents = objects.Contents ?? [];
    const totalBytes = contents.reduce((sum, object) => sum + (object.Size ?? 0), 0);

    const versioning = await client.send(new GetBucketVersioningCommand({ Bucket: bucketName }));

    const encryption = await this.optional(
      () => client.send(new GetBucketEncryptionCommand({ Bucket: bucketName })).then(() => true),
      false
    );

    const publicAccess = await this.optional(async () => {
      const response = await client.send(new GetPublicAccessBlockCommand({ Bucket: bucketName }));
      const config = response.PublicAccessBlockConfiguration ?? {};
      return !(
        config.BlockPublicAcls &&
        config.IgnorePublicAcls &&
        config.BlockPublicPolicy &&
        config.RestrictPublicBuckets
      );
    }, true);

    const lifecycleRules = await this.optional(
      () =>
        client
          .send(new GetBucketLifecycleConfigurationCommand({ Bucket: bucketName }))
          .then((response) => response.Rules?.length ?? 0),
      0
    );

    const tags = await this.optional<Record<string, string>>(
      () =>
        client
          .send(new GetBucketTaggingCommand({ Bucket: bucketName }))
          .then((response) => tagsToRecord(response.TagSet)),
      {}
    );

    return {
      location,
      objectCount: contents.length,
      totalSizeGb: totalBytes / BYTES_PER_GB,
      versioning: versioning.Status === 'Enabled',
      encryption,
      publicAccess,
      lifecycleRules,
      tags,
    };
  }

  /**
   * Run a settings lookup, mapping "never configured" errors to a fallback.
   */
  private async optional<T>(lookup: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await lookup();
    } catch (error) {
      if (NOT_CONFIGURED_CODES.has(errorCode(error))) {
        return fallback;
      }
      throw error;
    }
  }
}
