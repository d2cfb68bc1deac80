import type { ScanAttemptDto } from '@checkpass/types';
import type { AttemptLog, ScanAttempt } from './attempts.store';
import type { ListAttemptsQuery } from './attempts.schemas';

export function toAttemptDto(a: ScanAttempt): ScanAttemptDto {
  return {
    id: String(a.seq),
    credentialId: a.credentialId,
    source: a.source,
    occurredAt: a.occurredAt.toISOString(),
    outcome: a.outcome,
    reason: a.reason,
    payloadHash: a.payloadHash,
    operator: a.operator
  };
}

export function createAttemptsService(log: AttemptLog) {
  async function listAttempts(query: ListAttemptsQuery) {
    const attempts = await log.list({
      since: query.since ? new Date(query.since) : undefined,
      before: query.before,
      credentialId: query.credentialId,
      limit: query.limit
    });
    return attempts.map(toAttemptDto);
  }

  return { listAttempts };
}

export type AttemptsService = ReturnType<typeof createAttemptsService>;
