import type { RevokeResult } from '@checkpass/types';
import { newId } from '../../core/ids';
import {
  consumeVerdict,
  isExpired,
  type ArchiveOutcome,
  type ConsumeOutcome,
  type Credential,
  type CredentialStore
} from './credentials.store';

/**
 * In-process store. Every mutating method does its check and its write
 * without awaiting in between, so on a single event loop each call is
 * one indivisible step per id.
 */
export function createMemoryCredentialStore(): CredentialStore {
  const byId = new Map<string, Credential>();

  const copy = (c: Credential): Credential => ({ ...c });

  return {
    async issue({ subject, ttlSeconds, now }) {
      const credential: Credential = {
        id: newId('cred'),
        subject,
        status: 'UNUSED',
        issuedAt: now,
        expiresAt: new Date(now.getTime() + ttlSeconds * 1000),
        consumedAt: null,
        revokedAt: null,
        archivedAt: null
      };
      byId.set(credential.id, credential);
      return copy(credential);
    },

    async tryConsume(id, now): Promise<ConsumeOutcome> {
      const current = byId.get(id);
      if (!current) return { result: 'NOT_FOUND', credential: null };

      const verdict = consumeVerdict(current, now);
      if (verdict !== 'CONSUMED') {
        return { result: verdict, credential: copy(current) };
      }

      const next: Credential = { ...current, status: 'CONSUMED', consumedAt: now };
      byId.set(id, next);
      return { result: 'CONSUMED', credential: copy(next) };
    },

    async revoke(id, now): Promise<RevokeResult> {
      const current = byId.get(id);
      if (!current) return 'NOT_FOUND';
      if (current.status === 'CONSUMED') return 'ALREADY_CONSUMED';
      if (current.status === 'UNUSED') {
        byId.set(id, { ...current, status: 'REVOKED', revokedAt: now });
      }
      return 'REVOKED';
    },

    async get(id) {
      const c = byId.get(id);
      return c ? copy(c) : null;
    },

    async list({ status, includeArchived, limit }) {
      return [...byId.values()]
        .filter((c) => (status ? c.status === status : true))
        .filter((c) => includeArchived || c.archivedAt === null)
        .sort(
          (a, b) =>
            b.issuedAt.getTime() - a.issuedAt.getTime() || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0)
        )
        .slice(0, limit)
        .map(copy);
    },

    async archive(id, now): Promise<ArchiveOutcome> {
      const current = byId.get(id);
      if (!current) return { result: 'NOT_FOUND' };
      if (current.status === 'UNUSED' && !isExpired(current, now)) {
        return { result: 'STILL_ACTIVE', credential: copy(current) };
      }
      const next: Credential = { ...current, archivedAt: current.archivedAt ?? now };
      byId.set(id, next);
      return { result: 'ARCHIVED', credential: copy(next) };
    }
  };
}
