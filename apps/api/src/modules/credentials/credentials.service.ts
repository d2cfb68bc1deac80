import type { CredentialDto, RevokeResult } from '@checkpass/types';
import { AppError } from '../../core/errors/AppError';
import type { Clock } from '../../core/ids';
import type { TokenCodec } from '../../core/qr/tokenCodec';
import { renderQrPng } from '../../core/qr/qrImage';
import type { Credential, CredentialStore } from './credentials.store';
import type { IssueCredentialInput, ListCredentialsQuery } from './credentials.schemas';

export type CredentialsServiceDeps = {
  store: CredentialStore;
  codec: TokenCodec;
  clock: Clock;
  defaultTtlSeconds: number;
};

export function toCredentialDto(c: Credential): CredentialDto {
  return {
    id: c.id,
    subject: c.subject,
    status: c.status,
    issuedAt: c.issuedAt.toISOString(),
    expiresAt: c.expiresAt.toISOString(),
    consumedAt: c.consumedAt?.toISOString() ?? null,
    revokedAt: c.revokedAt?.toISOString() ?? null,
    archivedAt: c.archivedAt?.toISOString() ?? null
  };
}

export function createCredentialsService(deps: CredentialsServiceDeps) {
  const { store, codec, clock } = deps;

  async function issue(input: IssueCredentialInput) {
    const credential = await store.issue({
      subject: input.subject,
      ttlSeconds: input.ttlSeconds ?? deps.defaultTtlSeconds,
      now: clock()
    });

    return { credential, qrPayload: codec.encode(credential) };
  }

  async function getCredential(id: string) {
    const credential = await store.get(id);

    if (!credential) {
      throw new AppError(404, 'Credential not found');
    }

    return credential;
  }

  function revoke(id: string): Promise<RevokeResult> {
    return store.revoke(id, clock());
  }

  function listCredentials(query: ListCredentialsQuery) {
    return store.list(query);
  }

  async function archive(id: string) {
    const outcome = await store.archive(id, clock());

    if (outcome.result === 'NOT_FOUND') {
      throw new AppError(404, 'Credential not found');
    }
    if (outcome.result === 'STILL_ACTIVE') {
      throw new AppError(409, 'Credential is still usable; revoke it or wait for expiry first');
    }

    return outcome.credential;
  }

  // The payload is derived from id + expiry, so it can be re-rendered at any time
  async function qrPng(id: string) {
    const credential = await getCredential(id);
    return renderQrPng(codec.encode(credential));
  }

  return { issue, getCredential, revoke, listCredentials, archive, qrPng };
}

export type CredentialsService = ReturnType<typeof createCredentialsService>;
