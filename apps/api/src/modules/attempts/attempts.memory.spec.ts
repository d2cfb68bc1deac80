import { describe, expect, it } from 'vitest';
import { createMemoryAttemptLog } from './attempts.memory';
import type { NewScanAttempt } from './attempts.store';

const attempt = (overrides: Partial<NewScanAttempt>): NewScanAttempt => ({
  credentialId: 'cred_a',
  source: 'MOBILE_UPLOAD',
  occurredAt: new Date('2030-01-01T00:00:00.000Z'),
  outcome: 'DENIED',
  reason: 'DUPLICATE_SCAN',
  payloadHash: '0'.repeat(64),
  operator: null,
  ...overrides
});

describe('memory attempt log', () => {
  it('numbers appends in order and lists newest first', async () => {
    const log = createMemoryAttemptLog();
    const a = await log.append(attempt({ outcome: 'ADMITTED', reason: null }));
    const b = await log.append(attempt({}));

    expect([a.seq, b.seq]).toEqual([1, 2]);
    expect((await log.list({ limit: 10 })).map((x) => x.seq)).toEqual([2, 1]);
  });

  it('filters by credential, time and cursor', async () => {
    const log = createMemoryAttemptLog();
    await log.append(attempt({ occurredAt: new Date('2030-01-01T00:00:00.000Z') }));
    await log.append(attempt({ credentialId: 'cred_b', occurredAt: new Date('2030-01-01T00:05:00.000Z') }));
    await log.append(attempt({ credentialId: null, reason: 'MALFORMED', occurredAt: new Date('2030-01-01T00:10:00.000Z') }));

    expect((await log.list({ credentialId: 'cred_b', limit: 10 })).map((x) => x.seq)).toEqual([2]);
    expect(
      (await log.list({ since: new Date('2030-01-01T00:05:00.000Z'), limit: 10 })).map((x) => x.seq)
    ).toEqual([3, 2]);
    expect((await log.list({ before: 3, limit: 10 })).map((x) => x.seq)).toEqual([2, 1]);
    expect((await log.list({ limit: 1 })).map((x) => x.seq)).toEqual([3]);
  });
});
