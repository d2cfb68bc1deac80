import type { Pool } from 'pg';
import type { AdminRole } from '@checkpass/types';
import { newId } from '../../core/ids';
import { normalizeUsername, type AdminUser, type UserStore } from './users.store';

type UserRow = {
  id: string;
  username: string;
  password_hash: string;
  role: AdminRole;
  must_change_password: boolean;
  created_at: Date;
  updated_at: Date;
};

const COLUMNS = 'id, username, password_hash, role, must_change_password, created_at, updated_at';

function toUser(row: UserRow): AdminUser {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    role: row.role,
    mustChangePassword: row.must_change_password,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function createPgUserStore(pool: Pool): UserStore {
  return {
    async findByUsername(username) {
      const u = normalizeUsername(username);
      if (!u) return null;

      const r = await pool.query<UserRow>(
        `SELECT ${COLUMNS} FROM admin_users WHERE username = $1 LIMIT 1`,
        [u]
      );
      return r.rows[0] ? toUser(r.rows[0]) : null;
    },

    async findById(id) {
      const r = await pool.query<UserRow>(`SELECT ${COLUMNS} FROM admin_users WHERE id = $1`, [id]);
      return r.rows[0] ? toUser(r.rows[0]) : null;
    },

    async create(data) {
      const r = await pool.query<UserRow>(
        `
        INSERT INTO admin_users (id, username, password_hash, role, must_change_password)
        VALUES ($1, $2, $3, $4, $5)
        ON CONFLICT (username) DO NOTHING
        RETURNING ${COLUMNS}
        `,
        [newId('usr'), normalizeUsername(data.username), data.passwordHash, data.role, data.mustChangePassword]
      );
      return r.rows[0] ? toUser(r.rows[0]) : null;
    },

    async updatePassword(id, passwordHash, mustChangePassword) {
      const r = await pool.query<UserRow>(
        `
        UPDATE admin_users
        SET password_hash = $2, must_change_password = $3, updated_at = NOW()
        WHERE id = $1
        RETURNING ${COLUMNS}
        `,
        [id, passwordHash, mustChangePassword]
      );
      return r.rows[0] ? toUser(r.rows[0]) : null;
    }
  };
}
