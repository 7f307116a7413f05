/**
 * Scanners module - exports all scanner-related types and functions.
 */

export {
  BaseScanner,
  chunk,
  compactInfo,
  tagsToRecord,
  toDate,
  type AwsTag,
  type RegionScanner,
  type ScannerScope,
} from './base';

export { EC2Scanner } from './ec2';
export { S3Scanner, bucketRegion } from './s3';
export { RDSScanner } from './rds';
export { LambdaScanner } from './lambda';
export { DynamoDBScanner } from './dynamodb';
export { ECSScanner } from './ecs';

export { SERVICE_NAMES, createScanner, createScanners, type ServiceName } from './factory';
