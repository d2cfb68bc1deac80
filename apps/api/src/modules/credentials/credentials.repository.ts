import type { Pool } from 'pg';
import type { CredentialStatus, RevokeResult } from '@checkpass/types';
import { newId } from '../../core/ids';
import {
  consumeVerdict,
  type ArchiveOutcome,
  type ConsumeOutcome,
  type Credential,
  type CredentialStore,
  type ListCredentialsFilter
} from './credentials.store';

type CredentialRow = {
  id: string;
  subject: string;
  status: CredentialStatus;
  issued_at: Date;
  expires_at: Date;
  consumed_at: Date | null;
  revoked_at: Date | null;
  archived_at: Date | null;
};

const COLUMNS =
  'id, subject, status, issued_at, expires_at, consumed_at, revoked_at, archived_at';

function toCredential(row: CredentialRow): Credential {
  return {
    id: row.id,
    subject: row.subject,
    status: row.status,
    issuedAt: row.issued_at,
    expiresAt: row.expires_at,
    consumedAt: row.consumed_at,
    revokedAt: row.revoked_at,
    archivedAt: row.archived_at
  };
}

export function createPgCredentialStore(pool: Pool): CredentialStore {
  async function get(id: string) {
    const r = await pool.query<CredentialRow>(
      `SELECT ${COLUMNS} FROM credentials WHERE id = $1`,
      [id]
    );
    return r.rows[0] ? toCredential(r.rows[0]) : null;
  }

  return {
    async issue({ subject, ttlSeconds, now }) {
      const expiresAt = new Date(now.getTime() + ttlSeconds * 1000);
      const r = await pool.query<CredentialRow>(
        `
        INSERT INTO credentials (id, subject, status, issued_at, expires_at)
        VALUES ($1, $2, 'UNUSED', $3, $4)
        RETURNING ${COLUMNS}
        `,
        [newId('cred'), subject, now, expiresAt]
      );
      return toCredential(r.rows[0]);
    },

    async tryConsume(id, now): Promise<ConsumeOutcome> {
      // Single conditional UPDATE: status and expiry are checked by the same
      // statement that flips the row, so two racing scans cannot both win.
      // Expiry is compared against the later of the caller's clock and the
      // database clock at execution time.
      const r = await pool.query<CredentialRow>(
        `
        UPDATE credentials
        SET status = 'CONSUMED', consumed_at = $2
        WHERE id = $1 AND status = 'UNUSED' AND expires_at > GREATEST($2::timestamptz, NOW())
        RETURNING ${COLUMNS}
        `,
        [id, now]
      );

      if (r.rows[0]) {
        return { result: 'CONSUMED', credential: toCredential(r.rows[0]) };
      }

      const existing = await get(id);
      if (!existing) {
        return { result: 'NOT_FOUND', credential: null };
      }

      const verdict = consumeVerdict(existing, now);
      // row was UNUSED and unexpired at read time but the UPDATE missed: only
      // possible if it expired in between, so it stays a refusal
      return { result: verdict === 'CONSUMED' ? 'EXPIRED' : verdict, credential: existing };
    },

    async revoke(id, now): Promise<RevokeResult> {
      const r = await pool.query(
        `
        UPDATE credentials
        SET status = 'REVOKED', revoked_at = $2
        WHERE id = $1 AND status = 'UNUSED'
        `,
        [id, now]
      );

      if (r.rowCount === 1) return 'REVOKED';

      const existing = await get(id);
      if (!existing) return 'NOT_FOUND';
      return existing.status === 'CONSUMED' ? 'ALREADY_CONSUMED' : 'REVOKED';
    },

    get,

    async list({ status, includeArchived, limit }: ListCredentialsFilter) {
      const where: string[] = [];
      const params: unknown[] = [];

      if (status) {
        params.push(status);
        where.push(`status = $${params.length}`);
      }
      if (!includeArchived) {
        where.push('archived_at IS NULL');
      }
      params.push(limit);

      const r = await pool.query<CredentialRow>(
        `
        SELECT ${COLUMNS}
        FROM credentials
        ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
        ORDER BY issued_at DESC, id DESC
        LIMIT $${params.length}
        `,
        params
      );
      return r.rows.map(toCredential);
    },

    async archive(id, now): Promise<ArchiveOutcome> {
      const r = await pool.query<CredentialRow>(
        `
        UPDATE credentials
        SET archived_at = COALESCE(archived_at, $2)
        WHERE id = $1 AND (status <> 'UNUSED' OR expires_at <= $2)
        RETURNING ${COLUMNS}
        `,
        [id, now]
      );

      if (r.rows[0]) {
        return { result: 'ARCHIVED', credential: toCredential(r.rows[0]) };
      }

      const existing = await get(id);
      if (!existing) return { result: 'NOT_FOUND' };
      return { result: 'STILL_ACTIVE', credential: existing };
    }
  };
}
