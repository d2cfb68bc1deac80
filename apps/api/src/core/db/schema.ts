import type { Pool } from 'pg';
import { withTx } from './client';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS credentials (
  id           TEXT PRIMARY KEY,
  subject      TEXT        NOT NULL,
  status       TEXT        NOT NULL DEFAULT 'UNUSED'
               CHECK (status IN ('UNUSED', 'CONSUMED', 'REVOKED')),
  issued_at    TIMESTAMPTZ NOT NULL,
  expires_at   TIMESTAMPTZ NOT NULL,
  consumed_at  TIMESTAMPTZ,
  revoked_at   TIMESTAMPTZ,
  archived_at  TIMESTAMPTZ
);

CREATE INDEX IF NOT EXISTS credentials_issued_at_idx ON credentials (issued_at DESC);

CREATE TABLE IF NOT EXISTS scan_attempts (
  seq            BIGSERIAL PRIMARY KEY,
  credential_id  TEXT,
  source         TEXT        NOT NULL CHECK (source IN ('LOCAL_CAMERA', 'MOBILE_UPLOAD')),
  occurred_at    TIMESTAMPTZ NOT NULL,
  outcome        TEXT        NOT NULL CHECK (outcome IN ('ADMITTED', 'DENIED')),
  reason         TEXT,
  payload_hash   TEXT        NOT NULL,
  operator       TEXT
);

CREATE INDEX IF NOT EXISTS scan_attempts_credential_idx ON scan_attempts (credential_id, seq DESC);
CREATE INDEX IF NOT EXISTS scan_attempts_occurred_at_idx ON scan_attempts (occurred_at);

CREATE TABLE IF NOT EXISTS admin_users (
  id                    TEXT PRIMARY KEY,
  username              TEXT        NOT NULL UNIQUE,
  password_hash         TEXT        NOT NULL,
  role                  TEXT        NOT NULL DEFAULT 'ADMIN' CHECK (role IN ('ADMIN', 'RECEPTION')),
  must_change_password  BOOLEAN     NOT NULL DEFAULT TRUE,
  created_at            TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at            TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS visitors (
  id                 TEXT PRIMARY KEY,
  name               TEXT        NOT NULL,
  encrypted_phone    TEXT        NOT NULL,
  encrypted_purpose  TEXT        NOT NULL,
  credential_id      TEXT        NOT NULL REFERENCES credentials (id),
  registered_at      TIMESTAMPTZ NOT NULL,
  checked_out_at     TIMESTAMPTZ
);

CREATE INDEX IF NOT EXISTS visitors_registered_at_idx ON visitors (registered_at DESC);
`;

export async function initSchema(pool: Pool) {
  await withTx(pool, async (client) => {
    await client.query(SCHEMA);
  });
  console.log('[db] schema ready');
}
