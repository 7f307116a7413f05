/**
 * Lambda scanner.
 */

import {
  LambdaClient,
  paginateListFunctions,
  type FunctionConfiguration,
} from '@aws-sdk/client-lambda';
import type { Resource } from '@shared/types';
import { BaseScanner, toDate } from './base';

const DEFAULT_MEMORY_MB = 128;

export class LambdaScanner extends BaseScanner {
  readonly serviceName = 'Lambda';

  async scanRegion(region: string, signal?: AbortSignal): Promise<Resource[]> {
    const client = new LambdaClient(this.provider.clientConfig(region));

    try {
      const resources: Resource[] = [];
      for await (const page of paginateListFunctions({ client }, {})) {
        signal?.throwIfAborted();
        for (const fn of page.Functions ?? []) {
          resources.push(this.functionResource(fn, region));
        }
      }
      return resources;
    } finally {
      client.destroy();
    }
  }

  private functionResource(fn: FunctionConfiguration, region: string): Resource {
    const memoryMb = fn.MemorySize ?? DEFAULT_MEMORY_MB;
    const architectures: string[] = fn.Architectures ?? ['x86_64'];
    const variables = fn.Environment?.Variables;

    return this.createResource({
      id: fn.FunctionArn ?? 'Unknown',
      type: 'Function',
      region,
      name: fn.FunctionName,
      // ListFunctions only exposes the last modification time.
      createdAt: toDate(fn.LastModified),
      state: fn.State ?? 'unknown',
      estimatedMonthlyCost: this.estimate({ kind: 'lambda-function', memoryMb, architectures }),
      additionalInfo: {
        runtime: fn.Runtime,
        memorySize: memoryMb,
        timeout: fn.Timeout,
        handler: fn.Handler,
        codeSize: fn.CodeSize,
        lastModified: fn.LastModified,
        architectures,
        description: fn.Description || undefined,
        layers: fn.Layers?.length || undefined,
        envVars: variables ? Object.keys(variables).length || undefined : undefined,
      },
    });
  }
}
