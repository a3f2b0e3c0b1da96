import { describe, it, expect } from 'vitest';
import { classify, classifyAll } from '@/classifier';
import { createThresholds, DEFAULT_THRESHOLDS } from '@/core/thresholds';
import type { ResourceRecord } from '@shared/types';
import {
  NOW,
  daysAgo,
  floatingIp,
  instance,
  loadBalancer,
  managedDb,
  natGateway,
  objectBucket,
  serverlessFunction,
  snapshot,
  volume,
} from '../../helpers/fixtures';

describe('classify', () => {
  describe('scenarios', () => {
    it('marks an unassociated floating IP for deletion at $3.60/month', () => {
      const verdict = classify(floatingIp(), DEFAULT_THRESHOLDS, NOW);

      expect(verdict.disposition).toBe('DELETE');
      expect(verdict.reason).toContain('unassociated');
      expect(verdict.estimatedMonthlyCost).toBe(3.6);
    });

    it('keeps a stopped instance younger than the threshold', () => {
      const verdict = classify(instance({ createdAt: daysAgo(45) }), DEFAULT_THRESHOLDS, NOW);

      expect(verdict.disposition).toBe('KEEP');
      expect(verdict.reason).toBe(
        'Stopped instance, 45 days old, below 90 day threshold; est. $0.00/month'
      );
    });

    it('deletes a stopped instance older than the threshold', () => {
      const verdict = classify(instance({ createdAt: daysAgo(120) }), DEFAULT_THRESHOLDS, NOW);

      expect(verdict.disposition).toBe('DELETE');
      expect(verdict.reason).toBe(
        'Stopped instance, 120 days old (threshold 90 days); est. $0.00/month'
      );
    });

    it('ignores tags: a protected volume is still a DELETE candidate', () => {
      const record = volume({ createdAt: daysAgo(61), tags: { DoNotDelete: 'true' } });
      const verdict = classify(record, DEFAULT_THRESHOLDS, NOW);

      expect(verdict.disposition).toBe('DELETE');
      expect(verdict.reason).toBe(
        'Unattached volume, 61 days old (threshold 60 days); est. $8.00/month'
      );
    });
  });

  describe('per-kind rules', () => {
    it('reviews a running instance with low CPU', () => {
      const verdict = classify(
        instance({ state: 'running', utilization: 2.5, createdAt: daysAgo(400) }),
        DEFAULT_THRESHOLDS,
        NOW
      );

      expect(verdict).toEqual({
        disposition: 'REVIEW',
        reason: 'Average CPU 2.5% over 30 days, below 5%; est. $7.50/month',
        estimatedMonthlyCost: 7.5,
      });
    });

    it('keeps a busy instance and labels the default rate of an unlisted type', () => {
      const verdict = classify(
        instance({ state: 'running', utilization: 50, instanceType: 'm6i.large' }),
        DEFAULT_THRESHOLDS,
        NOW
      );

      expect(verdict.disposition).toBe('KEEP');
      expect(verdict.reason).toBe(
        'Running, average CPU 50.0% over 30 days; est. $50.00/month, default rate for unlisted m6i.large'
      );
    });

    it('keeps a running instance whose CPU metric is unavailable', () => {
      const verdict = classify(instance({ state: 'running' }), DEFAULT_THRESHOLDS, NOW);
      expect(verdict.disposition).toBe('KEEP');
    });

    it('ignores removed resources of any kind', () => {
      const verdict = classify(
        instance({ state: 'terminated', createdAt: daysAgo(500) }),
        DEFAULT_THRESHOLDS,
        NOW
      );

      expect(verdict).toEqual({
        disposition: 'IGNORE',
        reason: 'Resource is terminated; cost unknown',
        estimatedMonthlyCost: undefined,
      });
      expect(classify(snapshot({ state: 'deleting' }), DEFAULT_THRESHOLDS, NOW).disposition).toBe(
        'IGNORE'
      );
    });

    it('reviews an unattached volume below the age threshold and keeps an attached one', () => {
      expect(classify(volume({ createdAt: daysAgo(10) }), DEFAULT_THRESHOLDS, NOW).disposition).toBe(
        'REVIEW'
      );
      expect(
        classify(
          volume({ state: 'in-use', associatedId: 'i-0abc123', createdAt: daysAgo(400) }),
          DEFAULT_THRESHOLDS,
          NOW
        ).reason
      ).toBe('Volume in-use to i-0abc123; est. $8.00/month');
    });

    it.each([
      [800, 'DELETE'],
      [365, 'DELETE'],
      [100, 'REVIEW'],
      [90, 'REVIEW'],
      [30, 'KEEP'],
    ] as const)('classifies a %i day old snapshot as %s', (age, disposition) => {
      const verdict = classify(snapshot({ createdAt: daysAgo(age) }), DEFAULT_THRESHOLDS, NOW);
      expect(verdict.disposition).toBe(disposition);
      expect(verdict.estimatedMonthlyCost).toBe(1);
    });

    it('keeps an associated floating IP', () => {
      const verdict = classify(
        floatingIp({ state: 'associated', associatedId: 'i-0abc123' }),
        DEFAULT_THRESHOLDS,
        NOW
      );

      expect(verdict).toEqual({
        disposition: 'KEEP',
        reason: 'Associated with i-0abc123; est. $0.00/month',
        estimatedMonthlyCost: 0,
      });
    });

    it('deletes an idle load balancer only once it is old enough', () => {
      const old = classify(
        loadBalancer({ utilization: 0.2, createdAt: daysAgo(10) }),
        DEFAULT_THRESHOLDS,
        NOW
      );
      expect(old.disposition).toBe('DELETE');
      expect(old.reason).toBe(
        'Idle load balancer: Average 0.20 requests/day over 30 days, 10 days old (threshold 7 days); est. $16.43/month'
      );

      const young = classify(
        loadBalancer({ utilization: 0.2, createdAt: daysAgo(3) }),
        DEFAULT_THRESHOLDS,
        NOW
      );
      expect(young.disposition).toBe('KEEP');
    });

    it('keeps a load balancer with traffic or without a metric', () => {
      expect(
        classify(loadBalancer({ utilization: 40, createdAt: daysAgo(100) }), DEFAULT_THRESHOLDS, NOW)
          .disposition
      ).toBe('KEEP');
      expect(
        classify(loadBalancer({ createdAt: daysAgo(100) }), DEFAULT_THRESHOLDS, NOW).disposition
      ).toBe('KEEP');
    });

    it('reviews a stopped database and deletes an idle one', () => {
      expect(classify(managedDb({ state: 'stopped' }), DEFAULT_THRESHOLDS, NOW).disposition).toBe(
        'REVIEW'
      );

      const idle = classify(managedDb({ utilization: 0 }), DEFAULT_THRESHOLDS, NOW);
      expect(idle).toEqual({
        disposition: 'DELETE',
        reason: 'Idle database: Average 0.00 connections over 30 days; est. $15.00/month',
        estimatedMonthlyCost: 15,
      });

      expect(classify(managedDb({ utilization: 5 }), DEFAULT_THRESHOLDS, NOW).disposition).toBe(
        'KEEP'
      );
      expect(classify(managedDb(), DEFAULT_THRESHOLDS, NOW).disposition).toBe('KEEP');
    });

    it('deletes an unused function last modified long ago', () => {
      const stale = classify(
        serverlessFunction({ utilization: 0, createdAt: daysAgo(120) }),
        DEFAULT_THRESHOLDS,
        NOW
      );
      expect(stale.disposition).toBe('DELETE');
      expect(stale.estimatedMonthlyCost).toBe(0.5);

      const recent = classify(
        serverlessFunction({ utilization: 0, createdAt: daysAgo(30) }),
        DEFAULT_THRESHOLDS,
        NOW
      );
      expect(recent.disposition).toBe('KEEP');
    });

    it('never deletes a NAT gateway, even with no traffic', () => {
      const verdict = classify(natGateway({ utilization: 500 }), DEFAULT_THRESHOLDS, NOW);
      expect(verdict).toEqual({
        disposition: 'REVIEW',
        reason:
          'Low traffic: Average 500 bytes out/day over 30 days, below 1000000; est. $32.40/month',
        estimatedMonthlyCost: 32.4,
      });

      expect(
        classify(natGateway({ utilization: 0, createdAt: daysAgo(900) }), DEFAULT_THRESHOLDS, NOW)
          .disposition
      ).toBe('REVIEW');
      expect(
        classify(natGateway({ utilization: 5e9 }), DEFAULT_THRESHOLDS, NOW).disposition
      ).toBe('KEEP');
    });

    it('classifies empty and nearly empty buckets by age', () => {
      expect(
        classify(objectBucket({ createdAt: daysAgo(200) }), DEFAULT_THRESHOLDS, NOW).reason
      ).toBe('Empty bucket, 200 days old (threshold 180 days); est. $0.00/month');
      expect(
        classify(objectBucket({ createdAt: daysAgo(10) }), DEFAULT_THRESHOLDS, NOW).disposition
      ).toBe('REVIEW');

      const nearlyEmpty = classify(
        objectBucket({ state: 'not-empty', objectCount: 5, sizeGb: 0.05, createdAt: daysAgo(200) }),
        DEFAULT_THRESHOLDS,
        NOW
      );
      expect(nearlyEmpty.disposition).toBe('REVIEW');
      expect(nearlyEmpty.reason).toBe('Nearly empty bucket (0.05 GB), 200 days old; est. $0.00/month');

      expect(
        classify(
          objectBucket({ state: 'not-empty', objectCount: 5, sizeGb: 10, createdAt: daysAgo(200) }),
          DEFAULT_THRESHOLDS,
          NOW
        ).disposition
      ).toBe('KEEP');
    });

    it('does not delete a listed bucket whose object count reads zero', () => {
      expect(
        classify(
          objectBucket({ state: 'not-empty', objectCount: 0, sizeGb: 10, createdAt: daysAgo(400) }),
          DEFAULT_THRESHOLDS,
          NOW
        ).disposition
      ).toBe('KEEP');
    });
  });

  describe('properties', () => {
    const idleRecords: ResourceRecord[] = [
      instance(),
      volume(),
      snapshot(),
      loadBalancer({ utilization: 0 }),
      serverlessFunction({ utilization: 0 }),
      natGateway({ utilization: 0 }),
      objectBucket(),
    ];

    it('never deletes an age-gated resource of unknown age', () => {
      for (const record of idleRecords) {
        expect(classify(record, DEFAULT_THRESHOLDS, NOW).disposition).not.toBe('DELETE');
      }
    });

    it('returns the same verdict for the same input', () => {
      for (const record of idleRecords) {
        const aged = { ...record, createdAt: daysAgo(1000) };
        expect(classify(aged, DEFAULT_THRESHOLDS, NOW)).toEqual(
          classify(aged, DEFAULT_THRESHOLDS, NOW)
        );
      }
    });

    it('moves a verdict across the threshold in the expected direction', () => {
      const record = instance({ createdAt: daysAgo(120) });

      const raised = createThresholds({ stoppedInstanceMinDays: 150 });
      const lowered = createThresholds({ stoppedInstanceMinDays: 100 });

      expect(classify(record, raised, NOW).disposition).toBe('KEEP');
      expect(classify(record, lowered, NOW).disposition).toBe('DELETE');
    });

    it('uses the configured metric window in reasons', () => {
      const thresholds = createThresholds({ metricWindows: { Instance: 14 } });
      const verdict = classify(instance({ state: 'running', utilization: 1 }), thresholds, NOW);

      expect(verdict.reason).toBe('Average CPU 1.0% over 14 days, below 5%; est. $7.50/month');
    });
  });
});

describe('classifyAll', () => {
  it('classifies each record independently and keeps input order', () => {
    const records = [floatingIp(), instance({ createdAt: daysAgo(45) }), snapshot({ createdAt: daysAgo(800) })];

    const result = classifyAll(records, DEFAULT_THRESHOLDS, NOW);

    expect(result.map((item) => item.record.id)).toEqual(['eipalloc-0abc123', 'i-0abc123', 'snap-0abc123']);
    expect(result.map((item) => item.verdict.disposition)).toEqual(['DELETE', 'KEEP', 'DELETE']);
  });
});
