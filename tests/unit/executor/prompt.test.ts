import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';
import { describeForConfirmation, parseConfirmation, ReadlinePrompt } from '@/executor/prompt';
import { createSessionId } from '@/executor/session';
import { volume } from '../../helpers/fixtures';

describe('parseConfirmation', () => {
  it.each([
    ['yes', 'yes'],
    ['Y', 'yes'],
    ['  yes  ', 'yes'],
    ['q', 'quit'],
    ['QUIT', 'quit'],
    ['no', 'no'],
    ['', 'no'],
    ['yeah', 'no'],
  ] as const)('reads %j as %s', (input, expected) => {
    expect(parseConfirmation(input)).toBe(expected);
  });
});

describe('describeForConfirmation', () => {
  it('shows the key attributes of the resource', () => {
    const text = describeForConfirmation({
      sequence: 2,
      total: 5,
      record: volume({ tags: { Team: 'data' } }),
      verdict: {
        disposition: 'DELETE',
        reason: 'Unattached volume, 61 days old (threshold 60 days); est. $8.00/month',
        estimatedMonthlyCost: 8,
      },
    });

    expect(text.split('\n')).toEqual([
      '[2/5] Volume vol-0abc123 (us-east-1)',
      '  Name:   scratch',
      '  State:  available',
      '  Tags:   Team=data',
      '  Reason: Unattached volume, 61 days old (threshold 60 days); est. $8.00/month',
      '  Cost:   $8.00/month (estimate)',
    ]);
  });
});

describe('ReadlinePrompt', () => {
  it('reads the answer from its input stream', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompt = new ReadlinePrompt(input, output);

    const answer = prompt.confirm({
      sequence: 1,
      total: 1,
      record: volume(),
      verdict: { disposition: 'DELETE', reason: 'test fixture' },
    });
    input.write('quit\n');

    await expect(answer).resolves.toBe('quit');
    prompt.close();
  });
});

describe('createSessionId', () => {
  it('formats the UTC time', () => {
    expect(createSessionId(new Date('2026-10-19T07:05:09.123Z'))).toBe('20261019-070509');
  });
});
