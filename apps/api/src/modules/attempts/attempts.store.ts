import type { DenialReason, ScanOutcome, ScanSource } from '@checkpass/types';

export type NewScanAttempt = {
  credentialId: string | null;
  source: ScanSource;
  occurredAt: Date;
  outcome: ScanOutcome;
  reason: DenialReason | null;
  payloadHash: string;
  operator: string | null;
};

export type ScanAttempt = NewScanAttempt & {
  /** Monotonically increasing; later appends get larger values. */
  seq: number;
};

export type ListAttemptsFilter = {
  since?: Date;
  /** Only attempts with seq below this, for paging backwards. */
  before?: number;
  credentialId?: string;
  limit: number;
};

/**
 * Append-only audit trail. No update or delete on purpose: the
 * verification path only ever appends.
 */
export interface AttemptLog {
  append(attempt: NewScanAttempt): Promise<ScanAttempt>;
  /** Newest first. */
  list(filter: ListAttemptsFilter): Promise<ScanAttempt[]>;
}
