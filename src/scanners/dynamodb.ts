/**
 * DynamoDB scanner.
 */

import {
  DynamoDBClient,
  DescribeTableCommand,
  paginateListTables,
  type TableDescription,
} from '@aws-sdk/client-dynamodb';
import { errorCode } from '@core/errors';
import type { Resource } from '@shared/types';
import { BaseScanner, toDate } from './base';

const BYTES_PER_GB = 1024 ** 3;

export class DynamoDBScanner extends BaseScanner {
  readonly serviceName = 'DynamoDB';

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    const client = new DynamoDBClient(this.provider.clientConfig(region));

    try {
      const tableNames: string[] = [];
      for await (const page of paginateListTables({ client }, {})) {
        signal?.throwIfAborted();
        tableNames.push(...(page.TableNames ?? []));
      }

      const resources: Resource[] = [];
      for (const tableName of tableNames) {
        signal?.throwIfAborted();
        const table = await this.describeTable(client, tableName);
        if (table) {
          resources.push(this.tableResource(table, tableName, region));
        }
      }
      return resources;
    } finally {
      client.destroy();
    }
  }

  /**
   * Describe one table. A table deleted since the listing yields undefined.
   */
  private async describeTable(
    client: DynamoDBClient,
    tableName: string
  ): Promise<TableDescription | undefined> {
    try {
      const response = await client.send(new DescribeTableCommand({ TableName: tableName }));
      return response.Table;
    } catch (error) {
      if (errorCode(error) === 'ResourceNotFoundException') {
        this.logger.debug({ tableName }, 'Table disappeared before it could be described');
        return undefined;
      }
      throw error;
    }
  }

  private tableResource(table: TableDescription, tableName: string, region: string): Resource {
    const billingMode = table.BillingModeSummary?.BillingMode ?? 'PROVISIONED';
    const readCapacityUnits = table.ProvisionedThroughput?.ReadCapacityUnits ?? 0;
    const writeCapacityUnits = table.ProvisionedThroughput?.WriteCapacityUnits ?? 0;
    const sizeBytes = table.TableSizeBytes ?? 0;

    return this.createResource({
      id: table.TableArn ?? tableName,
      type: 'Table',
      region,
      name: tableName,
      createdAt: toDate(table.CreationDateTime),
      state: table.TableStatus,
      estimatedMonthlyCost: this.estimate({
        kind: 'dynamodb-table',
        billingMode,
        readCapacityUnits,
        writeCapacityUnits,
        sizeBytes,
      }),
      additionalInfo: {
        billingMode,
        itemCount: table.ItemCount,
        sizeBytes,
        sizeGB: (sizeBytes / BYTES_PER_GB).toFixed(2),
        readCapacityUnits: table.ProvisionedThroughput?.ReadCapacityUnits,
        writeCapacityUnits: table.ProvisionedThroughput?.WriteCapacityUnits,
      },
    });
  }
}
