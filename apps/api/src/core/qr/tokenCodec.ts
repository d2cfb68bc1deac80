import crypto from 'node:crypto';
import type { DecodeErrorKind } from '@checkpass/types';

export const TOKEN_VERSION = 'cq1';

const ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
const VERSION_PATTERN = /^cq\d+$/;

export type CredentialRef = {
  credentialId: string;
  expiresAt: Date;
};

export type DecodeResult =
  | { ok: true; ref: CredentialRef }
  | { ok: false; error: DecodeErrorKind };

export interface TokenCodec {
  encode(credential: { id: string; expiresAt: Date }): string;
  decode(payload: string): DecodeResult;
}

function b64url(input: Buffer | string) {
  const buf = Buffer.isBuffer(input) ? input : Buffer.from(input);
  return buf
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

/**
 * Payload format:
 *   cq1.<credentialId>.<expiresAtMs>.<tag>
 * where tag = base64url(HMAC-SHA256(secret, "cq1.<credentialId>.<expiresAtMs>")).
 *
 * The tag covers both the id and the expiry, so neither can be swapped or
 * extended without a TAG_MISMATCH.
 */
export function createTokenCodec(secret: string): TokenCodec {
  if (!secret) {
    throw new Error('QR token secret is required');
  }

  function tag(body: string) {
    return b64url(crypto.createHmac('sha256', secret).update(body).digest());
  }

  function encode(credential: { id: string; expiresAt: Date }) {
    if (!ID_PATTERN.test(credential.id)) {
      throw new Error(`Credential id cannot be embedded in a token: ${credential.id}`);
    }
    const body = `${TOKEN_VERSION}.${credential.id}.${credential.expiresAt.getTime()}`;
    return `${body}.${tag(body)}`;
  }

  function decode(payload: string): DecodeResult {
    const raw = payload.trim();
    if (!raw) return { ok: false, error: 'MALFORMED' };

    const firstDot = raw.indexOf('.');
    const version = firstDot === -1 ? raw : raw.slice(0, firstDot);

    if (version !== TOKEN_VERSION) {
      return { ok: false, error: VERSION_PATTERN.test(version) ? 'UNSUPPORTED' : 'MALFORMED' };
    }

    // id and expiry are fixed fields; whatever follows the third dot is the tag
    const secondDot = raw.indexOf('.', firstDot + 1);
    const thirdDot = secondDot === -1 ? -1 : raw.indexOf('.', secondDot + 1);
    if (secondDot === -1 || thirdDot === -1) return { ok: false, error: 'MALFORMED' };

    const credentialId = raw.slice(firstDot + 1, secondDot);
    const expStr = raw.slice(secondDot + 1, thirdDot);
    const sig = raw.slice(thirdDot + 1);

    if (!ID_PATTERN.test(credentialId)) return { ok: false, error: 'MALFORMED' };
    if (!/^\d+$/.test(expStr)) return { ok: false, error: 'MALFORMED' };

    const expiresAtMs = Number(expStr);
    if (!Number.isSafeInteger(expiresAtMs) || expiresAtMs <= 0) {
      return { ok: false, error: 'MALFORMED' };
    }
    if (!sig) return { ok: false, error: 'MALFORMED' };

    const expected = Buffer.from(tag(`${TOKEN_VERSION}.${credentialId}.${expStr}`));
    const given = Buffer.from(sig);

    // timing-safe compare needs equal lengths
    if (expected.length !== given.length || !crypto.timingSafeEqual(expected, given)) {
      return { ok: false, error: 'TAG_MISMATCH' };
    }

    return { ok: true, ref: { credentialId, expiresAt: new Date(expiresAtMs) } };
  }

  return { encode, decode };
}

export function hashPayload(payload: string) {
  return crypto.createHash('sha256').update(payload).digest('hex');
}
