import type { ConsumeResult, CredentialStatus, RevokeResult } from '@checkpass/types';

export type Credential = {
  id: string;
  subject: string;
  status: CredentialStatus;
  issuedAt: Date;
  expiresAt: Date;
  consumedAt: Date | null;
  revokedAt: Date | null;
  archivedAt: Date | null;
};

export type ConsumeOutcome = {
  result: ConsumeResult;
  /** Present whenever the id exists. */
  credential: Credential | null;
};

export type ArchiveOutcome =
  | { result: 'ARCHIVED'; credential: Credential }
  | { result: 'NOT_FOUND' }
  | { result: 'STILL_ACTIVE'; credential: Credential };

export type ListCredentialsFilter = {
  status?: CredentialStatus;
  includeArchived: boolean;
  limit: number;
};

/**
 * Owner of credential state. tryConsume is the one place where a
 * credential moves to CONSUMED, and it must check-and-set atomically
 * per id, including the expiry comparison.
 */
export interface CredentialStore {
  issue(input: { subject: string; ttlSeconds: number; now: Date }): Promise<Credential>;
  tryConsume(id: string, now: Date): Promise<ConsumeOutcome>;
  revoke(id: string, now: Date): Promise<RevokeResult>;
  get(id: string): Promise<Credential | null>;
  list(filter: ListCredentialsFilter): Promise<Credential[]>;
  archive(id: string, now: Date): Promise<ArchiveOutcome>;
}

export function isExpired(credential: Pick<Credential, 'expiresAt'>, now: Date) {
  return now.getTime() >= credential.expiresAt.getTime();
}

/**
 * What tryConsume would answer for this credential at `now`.
 * 'CONSUMED' means it may be consumed.
 */
export function consumeVerdict(credential: Credential, now: Date): ConsumeResult {
  if (credential.status === 'REVOKED') return 'REVOKED';
  if (credential.status === 'CONSUMED') return 'ALREADY_CONSUMED';
  if (isExpired(credential, now)) return 'EXPIRED';
  return 'CONSUMED';
}
