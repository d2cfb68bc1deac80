import type { ConsumeResult, DenialReason, ScanOutcome, ScanSource } from '@checkpass/types';
import { ServiceUnavailableError } from '../../core/errors/AppError';
import type { Clock } from '../../core/ids';
import { hashPayload, type TokenCodec } from '../../core/qr/tokenCodec';
import type { AttemptLog, ScanAttempt } from '../attempts/attempts.store';
import type { ConsumeOutcome, CredentialStore } from '../credentials/credentials.store';

export type ScanMetadata = {
  source: ScanSource;
  /** Username of an authenticated admin who submitted the scan, if any. */
  operator?: string | null;
};

export type VerificationResult = {
  outcome: ScanOutcome;
  reason: DenialReason | null;
  subject: string | null;
  credentialId: string | null;
  attempt: ScanAttempt;
};

/**
 * What every scan producer (camera loop, upload endpoint) feeds.
 */
export interface ScanSubmitter {
  submit(payload: string, meta: ScanMetadata): Promise<VerificationResult>;
}

const DENIAL_FOR: Record<Exclude<ConsumeResult, 'CONSUMED'>, DenialReason> = {
  ALREADY_CONSUMED: 'DUPLICATE_SCAN',
  REVOKED: 'REVOKED',
  EXPIRED: 'EXPIRED',
  NOT_FOUND: 'UNKNOWN_CREDENTIAL'
};

export type VerificationEngineDeps = {
  codec: TokenCodec;
  credentials: CredentialStore;
  attempts: AttemptLog;
  clock: Clock;
};

export function createVerificationEngine(deps: VerificationEngineDeps): ScanSubmitter {
  const { codec, credentials, attempts, clock } = deps;

  async function submit(payload: string, meta: ScanMetadata): Promise<VerificationResult> {
    const payloadHash = hashPayload(payload);
    const decoded = codec.decode(payload);

    let credentialId: string | null = null;
    let outcome: ScanOutcome = 'DENIED';
    let reason: DenialReason | null = null;
    let subject: string | null = null;
    let now: Date;

    if (!decoded.ok) {
      // 1) Undecodable or tampered → denied without touching the store
      now = clock();
      reason = decoded.error;
    } else {
      credentialId = decoded.ref.credentialId;

      // 2) One atomic check-and-set; time is read right before it so the
      //    expiry comparison happens at consumption, not at submission
      now = clock();
      let consumed: ConsumeOutcome;
      try {
        consumed = await credentials.tryConsume(credentialId, now);
      } catch (err) {
        throw new ServiceUnavailableError('Credential store unavailable', err);
      }

      if (consumed.result === 'CONSUMED') {
        outcome = 'ADMITTED';
        subject = consumed.credential?.subject ?? null;
      } else {
        reason = DENIAL_FOR[consumed.result];
      }
    }

    // 3) Exactly one audit row per evaluation, whatever the outcome
    let attempt: ScanAttempt;
    try {
      attempt = await attempts.append({
        credentialId,
        source: meta.source,
        occurredAt: now,
        outcome,
        reason,
        payloadHash,
        operator: meta.operator ?? null
      });
    } catch (err) {
      // An admission that already happened stays consumed
      throw new ServiceUnavailableError('Audit log unavailable', err);
    }

    console.log(
      `[checkins] ${meta.source} ${outcome}${reason ? ` ${reason}` : ''} ${credentialId ?? '-'}`
    );

    return { outcome, reason, subject, credentialId, attempt };
  }

  return { submit };
}
