import { describe, it, expect } from 'vitest';
import { csvField, csvRow, renderCsvReport } from '@/report/csv';
import { makeResource } from '../../helpers/fixtures';

const HEADER =
  'id,type,service,region,name,state,estimated_monthly_cost,created_at,additional_info\r\n';

describe('csvField', () => {
  it('should leave plain values alone', () => {
    expect(csvField('us-east-1')).toBe('us-east-1');
    expect(csvField('')).toBe('');
  });

  it('should quote commas, quotes and line breaks', () => {
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('csvRow', () => {
  it('should write every column in header order', () => {
    const resource = makeResource({
      id: 'i-1',
      name: 'web, primary',
      state: 'running',
      estimatedMonthlyCost: 7.5,
      createdAt: new Date('2024-01-02T03:04:05Z'),
      additionalInfo: { instanceType: 't3.micro' },
    });

    expect(csvRow(resource)).toBe(
      'i-1,Instance,EC2,us-east-1,"web, primary",running,7.50,2024-01-02T03:04:05.000Z,"{""instanceType"":""t3.micro""}"\r\n'
    );
  });

  it('should leave optional columns empty', () => {
    expect(csvRow(makeResource())).toBe('res-1,Instance,EC2,us-east-1,,,0.00,,\r\n');
  });
});

describe('renderCsvReport', () => {
  it('should write only the header for no resources', () => {
    expect(renderCsvReport({ resources: [] })).toBe(HEADER);
  });

  it('should write one row per resource', () => {
    const report = renderCsvReport({
      resources: [makeResource({ id: 'a' }), makeResource({ id: 'b' })],
    });

    expect(report).toBe(
      `${HEADER}a,Instance,EC2,us-east-1,,,0.00,,\r\nb,Instance,EC2,us-east-1,,,0.00,,\r\n`
    );
  });
});
