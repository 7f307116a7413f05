import { describe, it, expect } from 'vitest';
import { ServiceScanConductor } from '@core/conductor';
import { ScanCancelledError } from '@core/errors';
import { ScanOrchestrator, selectServices } from '@core/orchestrator';
import type { Resource, ServiceOutcome } from '@shared/types';
import {
  FakeScanner,
  awsError,
  fixedScanner,
  makeResource,
  testConfig,
} from '../../helpers/fixtures';
import { assertCleanOutcome, assertRegionFailed, idsOf } from '../../helpers/assertions';

const REGIONS = ['r1', 'r2'];

async function collect(stream: AsyncIterable<Resource>): Promise<Resource[]> {
  const resources: Resource[] = [];
  for await (const resource of stream) {
    resources.push(resource);
  }
  return resources;
}

/**
 * A: two resources per region; B: r2 denied; C: every region fails.
 */
function partialFailureScanners(): FakeScanner[] {
  return [
    fixedScanner('A', 1, 2),
    new FakeScanner('B', async (region) => {
      if (region === 'r2') {
        throw awsError('AccessDeniedException');
      }
      return [makeResource({ id: `b-${region}`, service: 'B', region })];
    }),
    new FakeScanner('C', async () => {
      throw new Error('corrupt response');
    }),
  ];
}

function outcomeOf(outcomes: readonly ServiceOutcome[], service: string): ServiceOutcome {
  const outcome = outcomes.find((candidate) => candidate.service === service);
  if (!outcome) {
    throw new Error(`No outcome for ${service}`);
  }
  return outcome;
}

describe('selectServices', () => {
  it('should match service names case-insensitively with the deny list winning', () => {
    const scanners = [fixedScanner('EC2', 1), fixedScanner('S3', 1), fixedScanner('Lambda', 1)];

    const selected = selectServices(scanners, {
      only_services: ['ec2', 's3'],
      skip_services: ['S3'],
    });

    expect(selected.map((scanner) => scanner.serviceName)).toEqual(['EC2']);
  });
});

describe('ScanOrchestrator', () => {
  describe('scanServices', () => {
    it('should keep partial results when some services and regions fail', async () => {
      const orchestrator = new ScanOrchestrator(testConfig());

      const run = await orchestrator.scanServices(partialFailureScanners(), REGIONS);

      expect(run.resources).toHaveLength(5);
      expect(idsOf(run.resources)).toEqual(['a-r1-0', 'a-r1-1', 'a-r2-0', 'a-r2-1', 'b-r1']);
      assertCleanOutcome(outcomeOf(run.services, 'A'), 4);
      assertRegionFailed(outcomeOf(run.services, 'B'), 'r2', 'access-denied');
      assertRegionFailed(outcomeOf(run.services, 'C'), 'r1', 'fatal');
      assertRegionFailed(outcomeOf(run.services, 'C'), 'r2', 'fatal');
    });

    it('should record a service-level failure without stopping the others', async () => {
      const orchestrator = new ScanOrchestrator(testConfig(), {
        conductorFactory: (scanner) => {
          if (scanner.serviceName === 'Broken') {
            throw new Error('cannot build conductor');
          }
          return new ServiceScanConductor(scanner, { config: testConfig() });
        },
      });

      const run = await orchestrator.scanServices(
        [fixedScanner('Good', 5), fixedScanner('Broken', 5)],
        REGIONS
      );

      expect(run.resources).toHaveLength(2);
      expect(outcomeOf(run.services, 'Broken')).toMatchObject({
        resourceCount: 0,
        regions: [],
        failure: { kind: 'fatal', code: 'Unknown', message: 'cannot build conductor' },
      });
    });

    it('should skip filtered services', async () => {
      const skipped = fixedScanner('S3', 1);
      const orchestrator = new ScanOrchestrator(testConfig({ skip_services: ['s3'] }));

      const run = await orchestrator.scanServices([fixedScanner('EC2', 1), skipped], REGIONS);

      expect(run.services.map((outcome) => outcome.service)).toEqual(['EC2']);
      expect(skipped.calls).toEqual([]);
    });

    it('should report each finished service to the observer', async () => {
      const finished: string[] = [];
      const orchestrator = new ScanOrchestrator(testConfig(), {
        observer: { onServiceComplete: (outcome) => finished.push(outcome.service) },
      });

      await orchestrator.scanServices(partialFailureScanners(), REGIONS);

      expect(finished.sort()).toEqual(['A', 'B', 'C']);
    });

    it('should keep at most max_concurrent_services services in flight', async () => {
      let active = 0;
      let peak = 0;
      const slow = (name: string) =>
        new FakeScanner(name, async () => {
          active += 1;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active -= 1;
          return [];
        });
      const orchestrator = new ScanOrchestrator(
        testConfig({ max_concurrent_services: 2, max_concurrent_regions: 1 })
      );

      await orchestrator.scanServices([slow('A'), slow('B'), slow('C'), slow('D')], ['r1']);

      expect(peak).toBe(2);
    });

    it('should throw ScanCancelledError when the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const orchestrator = new ScanOrchestrator(testConfig());

      await expect(
        orchestrator.scanServices([fixedScanner('EC2', 1)], REGIONS, controller.signal)
      ).rejects.toBeInstanceOf(ScanCancelledError);
    });
  });

  describe('streamServices', () => {
    it('should yield the same resources as an eager scan', async () => {
      const orchestrator = new ScanOrchestrator(testConfig());

      const resources = await collect(
        orchestrator.streamServices(partialFailureScanners(), REGIONS)
      );

      expect(idsOf(resources)).toEqual(['a-r1-0', 'a-r1-1', 'a-r2-0', 'a-r2-1', 'b-r1']);
    });

    it('should yield nothing when no service is selected', async () => {
      const orchestrator = new ScanOrchestrator(testConfig({ only_services: ['nothing'] }));

      await expect(collect(orchestrator.streamServices([fixedScanner('EC2', 1)], REGIONS))).resolves.toEqual(
        []
      );
    });

    it('should not launch further services once the consumer stops', async () => {
      const first = fixedScanner('A', 1, 3);
      const second = fixedScanner('B', 1);
      const orchestrator = new ScanOrchestrator(testConfig({ max_concurrent_services: 1 }));

      for await (const resource of orchestrator.streamServices([first, second], ['r1'])) {
        expect(resource.service).toBe('A');
        break;
      }

      expect(first.calls).toEqual(['r1']);
      expect(second.calls).toEqual([]);
    });

    it('should launch the next service after a finished one is drained', async () => {
      const first = fixedScanner('A', 1);
      const second = fixedScanner('B', 1);
      const orchestrator = new ScanOrchestrator(testConfig({ max_concurrent_services: 1 }));

      const resources = await collect(orchestrator.streamServices([first, second], ['r1']));

      expect(resources.map((resource) => resource.service)).toEqual(['A', 'B']);
    });

    it('should throw ScanCancelledError when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const scanner = fixedScanner('EC2', 1);
      const orchestrator = new ScanOrchestrator(testConfig());

      await expect(
        collect(orchestrator.streamServices([scanner], REGIONS, controller.signal))
      ).rejects.toBeInstanceOf(ScanCancelledError);
      expect(scanner.calls).toEqual([]);
    });

    it('should throw ScanCancelledError when aborted mid-stream', async () => {
      const controller = new AbortController();
      const scanner = new FakeScanner('EC2', async (_region, _attempt, signal) => {
        controller.abort();
        signal?.throwIfAborted();
        return [];
      });
      const orchestrator = new ScanOrchestrator(testConfig());

      await expect(
        collect(orchestrator.streamServices([scanner], REGIONS, controller.signal))
      ).rejects.toBeInstanceOf(ScanCancelledError);
    });
  });
});
