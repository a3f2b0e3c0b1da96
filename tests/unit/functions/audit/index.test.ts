/**
 * Unit tests for the audit Lambda entry point.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Context } from 'aws-lambda';
import { mockClient } from 'aws-sdk-client-mock';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { clearConfigCache } from '@/core/config';
import { DEFAULT_METRIC_WINDOWS } from '@/core/thresholds';
import type { ScanResult } from '@/inventory/scanner';
import { NOW, daysAgo, floatingIp, volume } from '../../../helpers/fixtures';

const { mockScan, scannerOptions } = vi.hoisted(() => {
  const scannerOptions: unknown[] = [];
  return { mockScan: vi.fn<() => Promise<ScanResult>>(), scannerOptions };
});

vi.mock('@/inventory/scanner', () => ({
  Scanner: class {
    constructor(options: unknown) {
      scannerOptions.push(options);
    }

    scan(): Promise<ScanResult> {
      return mockScan();
    }
  },
}));

import { main } from '@/functions/audit';

const ssmMock = mockClient(SSMClient);

const context: Context = {
  callbackWaitsForEmptyEventLoop: true,
  functionName: 'cloud-sweep-audit',
  functionVersion: '1',
  invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:cloud-sweep-audit',
  memoryLimitInMB: '512',
  awsRequestId: 'test-request-id',
  logGroupName: '/aws/lambda/cloud-sweep-audit',
  logStreamName: '2026/03/01/[$LATEST]abc123',
  getRemainingTimeInMillis: () => 30000,
  done: vi.fn(),
  fail: vi.fn(),
  succeed: vi.fn(),
};

describe('audit Lambda (main)', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(NOW);
    ssmMock.reset();
    clearConfigCache();
    mockScan.mockReset();
    scannerOptions.length = 0;
    ssmMock.on(GetParameterCommand).resolves({
      Parameter: { Value: 'regions: [us-east-1]\nresource_kinds: [Volume, FloatingIP]\n' },
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns disposition counts for the configured regions', async () => {
    mockScan.mockResolvedValue({
      regions: ['us-east-1'],
      records: [volume({ createdAt: daysAgo(61) }), floatingIp()],
      failures: [],
    });

    const response = await main({}, context);

    expect(response.statusCode).toBe(200);
    expect(ssmMock.call(0).args[0].input).toEqual({ Name: '/cloud-sweep/config' });
    expect(scannerOptions).toEqual([
      { regions: ['us-east-1'], kinds: ['Volume', 'FloatingIP'], windows: DEFAULT_METRIC_WINDOWS },
    ]);

    const body = JSON.parse(response.body);
    expect(body).toMatchObject({
      regions: ['us-east-1'],
      total: 2,
      delete_candidates: 2,
      review_candidates: 0,
      estimated_monthly_savings: 11.6,
      unencrypted_buckets: [],
      failures: [],
      timestamp: '2026-03-01T00:00:00.000Z',
      request_id: 'test-request-id',
    });
    expect(body.by_kind.Volume.dispositions).toEqual({ DELETE: 1, REVIEW: 0, KEEP: 0, IGNORE: 0 });
  });

  it('scans the regions named in the event', async () => {
    mockScan.mockResolvedValue({ regions: ['eu-west-1'], records: [], failures: [] });

    await main({ regions: ['eu-west-1', 5, ''] }, context);

    expect(scannerOptions).toMatchObject([{ regions: ['eu-west-1'] }]);
  });

  it('returns 500 when the configuration cannot be loaded', async () => {
    const notFound = new Error('Parameter not found');
    notFound.name = 'ParameterNotFound';
    ssmMock.reset();
    ssmMock.on(GetParameterCommand).rejects(notFound);

    const response = await main({}, context);

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({
      error: 'Could not find SSM parameter: /cloud-sweep/config',
      timestamp: '2026-03-01T00:00:00.000Z',
      request_id: 'test-request-id',
    });
    expect(mockScan).not.toHaveBeenCalled();
  });

  it('returns 500 when the scan fails', async () => {
    mockScan.mockRejectedValue(new Error('credentials expired'));

    const response = await main({}, context);

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body).error).toBe('credentials expired');
  });
});
