import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { LambdaClient, ListFunctionsCommand } from '@aws-sdk/client-lambda';
import { LambdaScanner } from '@scanners/lambda';
import { FakeProvider } from '../../helpers/fakeProvider';

const lambdaMock = mockClient(LambdaClient);

describe('LambdaScanner', () => {
  let scanner: LambdaScanner;

  beforeEach(() => {
    lambdaMock.reset();
    scanner = new LambdaScanner(new FakeProvider());
  });

  it('should describe functions with defaults for missing settings', async () => {
    lambdaMock.on(ListFunctionsCommand).resolves({
      Functions: [
        {
          FunctionName: 'resize-images',
          FunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:resize-images',
          Runtime: 'nodejs20.x',
          Handler: 'index.handler',
          LastModified: '2024-05-01T12:00:00.000Z',
        },
      ],
    });

    const [fn] = await scanner.scanRegion('us-east-1');

    expect(fn).toMatchObject({
      id: 'arn:aws:lambda:us-east-1:123456789012:function:resize-images',
      type: 'Function',
      service: 'Lambda',
      name: 'resize-images',
      estimatedMonthlyCost: 0.04,
      additionalInfo: {
        runtime: 'nodejs20.x',
        memorySize: 128,
        handler: 'index.handler',
        architectures: ['x86_64'],
      },
    });
    expect(fn.createdAt).toEqual(new Date('2024-05-01T12:00:00.000Z'));
    expect(fn.additionalInfo).not.toHaveProperty('envVars');
  });

  it('should discount arm64 compute and count layers and variables', async () => {
    lambdaMock.on(ListFunctionsCommand).resolves({
      Functions: [
        {
          FunctionName: 'ingest',
          FunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:ingest',
          MemorySize: 1024,
          Architectures: ['arm64'],
          Layers: [{ Arn: 'layer-1' }],
          Environment: { Variables: { STAGE: 'test', TABLE: 'events' } },
          Description: 'Event ingestion',
        },
      ],
    });

    const [fn] = await scanner.scanRegion('us-east-1');

    expect(fn.estimatedMonthlyCost).toBe(0.15);
    expect(fn.additionalInfo).toMatchObject({
      memorySize: 1024,
      architectures: ['arm64'],
      layers: 1,
      envVars: 2,
      description: 'Event ingestion',
    });
  });

  it('should follow pagination', async () => {
    lambdaMock
      .on(ListFunctionsCommand)
      .resolvesOnce({ Functions: [{ FunctionName: 'a', FunctionArn: 'arn:a' }], NextMarker: 'page-2' })
      .resolves({ Functions: [{ FunctionName: 'b', FunctionArn: 'arn:b' }] });

    const functions = await scanner.scanRegion('us-east-1');

    expect(functions.map((fn) => fn.name)).toEqual(['a', 'b']);
    expect(lambdaMock.commandCalls(ListFunctionsCommand)).toHaveLength(2);
  });
});
