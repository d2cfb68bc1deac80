import { describe, expect, it } from 'vitest';
import { createMemoryCredentialStore } from './credentials.memory';

const T0 = new Date('2030-01-01T00:00:00.000Z');
const at = (seconds: number) => new Date(T0.getTime() + seconds * 1000);

describe('memory credential store', () => {
  it('issues unused credentials expiring after the ttl', async () => {
    const store = createMemoryCredentialStore();
    const credential = await store.issue({ subject: 'alice', ttlSeconds: 60, now: T0 });

    expect(credential.id).toMatch(/^cred_/);
    expect(credential.status).toBe('UNUSED');
    expect(credential.expiresAt.toISOString()).toBe('2030-01-01T00:01:00.000Z');
    expect(credential.consumedAt).toBeNull();
  });

  it('consumes exactly once', async () => {
    const store = createMemoryCredentialStore();
    const { id } = await store.issue({ subject: 'alice', ttlSeconds: 60, now: T0 });

    const first = await store.tryConsume(id, at(30));
    expect(first.result).toBe('CONSUMED');
    expect(first.credential?.consumedAt?.toISOString()).toBe('2030-01-01T00:00:30.000Z');

    const second = await store.tryConsume(id, at(31));
    expect(second.result).toBe('ALREADY_CONSUMED');
    expect(second.credential?.consumedAt?.toISOString()).toBe('2030-01-01T00:00:30.000Z');
  });

  it('treats the expiry instant itself as expired', async () => {
    const store = createMemoryCredentialStore();
    const { id } = await store.issue({ subject: 'bob', ttlSeconds: 60, now: T0 });

    expect((await store.tryConsume(id, at(60))).result).toBe('EXPIRED');
    expect((await store.get(id))?.status).toBe('UNUSED');
  });

  it('lets only one of many concurrent consumes win', async () => {
    const store = createMemoryCredentialStore();
    const { id } = await store.issue({ subject: 'carol', ttlSeconds: 60, now: T0 });

    const results = await Promise.all(
      Array.from({ length: 20 }, () => store.tryConsume(id, at(1)))
    );

    expect(results.filter((r) => r.result === 'CONSUMED')).toHaveLength(1);
    expect(results.filter((r) => r.result === 'ALREADY_CONSUMED')).toHaveLength(19);
  });

  it('answers NOT_FOUND for unknown ids', async () => {
    const store = createMemoryCredentialStore();
    expect(await store.tryConsume('cred_missing', T0)).toEqual({ result: 'NOT_FOUND', credential: null });
    expect(await store.revoke('cred_missing', T0)).toBe('NOT_FOUND');
    expect(await store.archive('cred_missing', T0)).toEqual({ result: 'NOT_FOUND' });
  });

  it('revokes idempotently and blocks later consumption', async () => {
    const store = createMemoryCredentialStore();
    const { id } = await store.issue({ subject: 'dave', ttlSeconds: 60, now: T0 });

    expect(await store.revoke(id, at(5))).toBe('REVOKED');
    expect(await store.revoke(id, at(6))).toBe('REVOKED');
    expect((await store.get(id))?.revokedAt?.toISOString()).toBe('2030-01-01T00:00:05.000Z');
    expect((await store.tryConsume(id, at(7))).result).toBe('REVOKED');
  });

  it('does not revoke a consumed credential', async () => {
    const store = createMemoryCredentialStore();
    const { id } = await store.issue({ subject: 'erin', ttlSeconds: 60, now: T0 });
    await store.tryConsume(id, at(1));

    expect(await store.revoke(id, at(2))).toBe('ALREADY_CONSUMED');
    expect((await store.get(id))?.status).toBe('CONSUMED');
  });

  it('reports revocation ahead of expiry', async () => {
    const store = createMemoryCredentialStore();
    const { id } = await store.issue({ subject: 'frank', ttlSeconds: 60, now: T0 });
    await store.revoke(id, at(1));

    expect((await store.tryConsume(id, at(120))).result).toBe('REVOKED');
  });

  it('archives only credentials that can no longer be used', async () => {
    const store = createMemoryCredentialStore();
    const live = await store.issue({ subject: 'gina', ttlSeconds: 60, now: T0 });
    const used = await store.issue({ subject: 'hank', ttlSeconds: 60, now: T0 });
    await store.tryConsume(used.id, at(1));

    expect((await store.archive(live.id, at(2))).result).toBe('STILL_ACTIVE');
    expect((await store.archive(live.id, at(60))).result).toBe('ARCHIVED');

    const archived = await store.archive(used.id, at(3));
    expect(archived.result).toBe('ARCHIVED');
    const again = await store.archive(used.id, at(4));
    expect(again.result === 'ARCHIVED' && again.credential.archivedAt?.toISOString()).toBe(
      '2030-01-01T00:00:03.000Z'
    );
  });

  it('lists newest first and hides archived credentials by default', async () => {
    const store = createMemoryCredentialStore();
    const older = await store.issue({ subject: 'ivy', ttlSeconds: 60, now: T0 });
    const newer = await store.issue({ subject: 'jack', ttlSeconds: 60, now: at(10) });
    await store.revoke(older.id, at(11));
    await store.archive(older.id, at(12));

    const visible = await store.list({ includeArchived: false, limit: 10 });
    expect(visible.map((c) => c.id)).toEqual([newer.id]);

    const all = await store.list({ includeArchived: true, limit: 10 });
    expect(all.map((c) => c.id)).toEqual([newer.id, older.id]);

    const revoked = await store.list({ status: 'REVOKED', includeArchived: true, limit: 10 });
    expect(revoked.map((c) => c.subject)).toEqual(['ivy']);
  });
});
