import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { EXIT_FAILURE, EXIT_INTERRUPTED, EXIT_OK, runScan } from '@/cli/scan';
import type { ScanCommandOptions } from '@/cli/options';
import { clearConfigCache } from '@core/config';
import { FailingProvider, FakeProvider } from '../../helpers/fakeProvider';
import { FakeScanner, fixedScanner } from '../../helpers/fixtures';

describe('runScan', () => {
  let dir: string;
  let printed: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aws-inventory-cli-'));
    printed = [];
    clearConfigCache();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const options = (overrides: Partial<ScanCommandOptions> = {}): ScanCommandOptions => ({
    output: join(dir, 'report.out'),
    logLevel: 'silent',
    progress: false,
    streaming: false,
    ...overrides,
  });

  const context = (provider = new FakeProvider()) => ({
    env: {},
    provider,
    scanners: () => [fixedScanner('EC2', 10), fixedScanner('Lambda', 20)],
    print: (text: string) => printed.push(text),
  });

  it('should write a markdown report and print the summary', async () => {
    const code = await runScan(options(), context());

    expect(code).toBe(EXIT_OK);
    const report = await readFile(join(dir, 'report.out'), 'utf8');
    expect(report.split('\n')).toContain('**Total Resources Found:** 4');
    expect(report.split('\n')).toContain('**Total Estimated Monthly Cost:** $60.00');
    expect(printed).toHaveLength(1);
    expect(printed[0]).toContain('$60.00');
  });

  it('should honour service filters', async () => {
    const code = await runScan(options({ services: ['lambda'], format: 'json' }), context());

    expect(code).toBe(EXIT_OK);
    const report: unknown = JSON.parse(await readFile(join(dir, 'report.out'), 'utf8'));
    expect(report).toMatchObject({
      total_resources: 2,
      total_estimated_monthly_cost: 40,
      summary: [{ service: 'Lambda', total_resources: 2 }],
    });
  });

  it('should stream a CSV report', async () => {
    const code = await runScan(options({ format: 'csv', streaming: true }), context());

    expect(code).toBe(EXIT_OK);
    const lines = (await readFile(join(dir, 'report.out'), 'utf8')).split('\r\n');
    expect(lines[0]).toBe(
      'id,type,service,region,name,state,estimated_monthly_cost,created_at,additional_info'
    );
    expect(lines.slice(1, -1).map((line) => line.split(',')[0]).sort()).toEqual([
      'ec2-us-east-1-0',
      'ec2-us-west-2-0',
      'lambda-us-east-1-0',
      'lambda-us-west-2-0',
    ]);
    expect(lines[lines.length - 1]).toBe('');
  });

  it('should fail before scanning when the streamed report cannot be opened', async () => {
    const slow = new FakeScanner('EC2', async () => {
      await new Promise((resolve) => setTimeout(resolve, 200));
      return [];
    });

    const code = await runScan(
      options({ output: join(dir, 'missing', 'report.csv'), format: 'csv', streaming: true }),
      { ...context(), scanners: () => [slow] }
    );

    expect(code).toBe(EXIT_FAILURE);
    expect(slow.calls).toEqual([]);
  });

  it('should fail on a missing explicit config file', async () => {
    const code = await runScan(options({ config: join(dir, 'missing.yaml') }), context());

    expect(code).toBe(EXIT_FAILURE);
    expect(printed[0]).toContain('Failed to read config file');
  });

  it('should fail when regions cannot be discovered', async () => {
    const code = await runScan(options(), context(new FailingProvider(new Error('no network'))));

    expect(code).toBe(EXIT_FAILURE);
    expect(printed).toEqual([]);
  });

  it('should report an interrupted scan', async () => {
    const controller = new AbortController();
    controller.abort();

    const code = await runScan(options(), { ...context(), signal: controller.signal });

    expect(code).toBe(EXIT_INTERRUPTED);
  });
});
