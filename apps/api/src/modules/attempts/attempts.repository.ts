import type { Pool } from 'pg';
import type { DenialReason, ScanOutcome, ScanSource } from '@checkpass/types';
import type { AttemptLog, ListAttemptsFilter, ScanAttempt } from './attempts.store';

type AttemptRow = {
  seq: string; // BIGSERIAL comes back as text
  credential_id: string | null;
  source: ScanSource;
  occurred_at: Date;
  outcome: ScanOutcome;
  reason: DenialReason | null;
  payload_hash: string;
  operator: string | null;
};

const COLUMNS =
  'seq, credential_id, source, occurred_at, outcome, reason, payload_hash, operator';

function toAttempt(row: AttemptRow): ScanAttempt {
  return {
    seq: Number(row.seq),
    credentialId: row.credential_id,
    source: row.source,
    occurredAt: row.occurred_at,
    outcome: row.outcome,
    reason: row.reason,
    payloadHash: row.payload_hash,
    operator: row.operator
  };
}

export function createPgAttemptLog(pool: Pool): AttemptLog {
  return {
    async append(a) {
      const r = await pool.query<AttemptRow>(
        `
        INSERT INTO scan_attempts
          (credential_id, source, occurred_at, outcome, reason, payload_hash, operator)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        RETURNING ${COLUMNS}
        `,
        [a.credentialId, a.source, a.occurredAt, a.outcome, a.reason, a.payloadHash, a.operator]
      );
      return toAttempt(r.rows[0]);
    },

    async list({ since, before, credentialId, limit }: ListAttemptsFilter) {
      const where: string[] = [];
      const params: unknown[] = [];

      if (since) {
        params.push(since);
        where.push(`occurred_at >= $${params.length}`);
      }
      if (before !== undefined) {
        params.push(before);
        where.push(`seq < $${params.length}`);
      }
      if (credentialId) {
        params.push(credentialId);
        where.push(`credential_id = $${params.length}`);
      }
      params.push(limit);

      const r = await pool.query<AttemptRow>(
        `
        SELECT ${COLUMNS}
        FROM scan_attempts
        ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
        ORDER BY seq DESC
        LIMIT $${params.length}
        `,
        params
      );
      return r.rows.map(toAttempt);
    }
  };
}
