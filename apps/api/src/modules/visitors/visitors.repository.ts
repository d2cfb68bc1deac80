import type { Pool } from 'pg';
import { newId } from '../../core/ids';
import type { CheckoutOutcome, Visitor, VisitorStore } from './visitors.store';

type VisitorRow = {
  id: string;
  name: string;
  encrypted_phone: string;
  encrypted_purpose: string;
  credential_id: string;
  registered_at: Date;
  checked_out_at: Date | null;
};

const COLUMNS =
  'id, name, encrypted_phone, encrypted_purpose, credential_id, registered_at, checked_out_at';

function toVisitor(row: VisitorRow): Visitor {
  return {
    id: row.id,
    name: row.name,
    encryptedPhone: row.encrypted_phone,
    encryptedPurpose: row.encrypted_purpose,
    credentialId: row.credential_id,
    registeredAt: row.registered_at,
    checkedOutAt: row.checked_out_at
  };
}

export function createPgVisitorStore(pool: Pool): VisitorStore {
  async function get(id: string) {
    const r = await pool.query<VisitorRow>(`SELECT ${COLUMNS} FROM visitors WHERE id = $1`, [id]);
    return r.rows[0] ? toVisitor(r.rows[0]) : null;
  }

  return {
    async create(v) {
      const r = await pool.query<VisitorRow>(
        `
        INSERT INTO visitors (id, name, encrypted_phone, encrypted_purpose, credential_id, registered_at)
        VALUES ($1, $2, $3, $4, $5, $6)
        RETURNING ${COLUMNS}
        `,
        [newId('vis'), v.name, v.encryptedPhone, v.encryptedPurpose, v.credentialId, v.registeredAt]
      );
      return toVisitor(r.rows[0]);
    },

    get,

    async list(limit) {
      const r = await pool.query<VisitorRow>(
        `SELECT ${COLUMNS} FROM visitors ORDER BY registered_at DESC, id DESC LIMIT $1`,
        [limit]
      );
      return r.rows.map(toVisitor);
    },

    async checkout(id, now): Promise<CheckoutOutcome> {
      const r = await pool.query<VisitorRow>(
        `
        UPDATE visitors SET checked_out_at = $2
        WHERE id = $1 AND checked_out_at IS NULL
        RETURNING ${COLUMNS}
        `,
        [id, now]
      );
      if (r.rows[0]) return { result: 'CHECKED_OUT', visitor: toVisitor(r.rows[0]) };

      const existing = await get(id);
      if (!existing) return { result: 'NOT_FOUND' };
      return { result: 'ALREADY_CHECKED_OUT', visitor: existing };
    }
  };
}
