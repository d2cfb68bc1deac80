import crypto from 'node:crypto';

const ALGO = 'aes-256-gcm';
const IV_BYTES = 12;
const TAG_BYTES = 16;
const PREFIX = 'gcm1';

export interface FieldCipher {
  encrypt(plain: string): string;
  decrypt(stored: string): string;
}

/**
 * AES-256-GCM for visitor contact fields.
 * Stored form: gcm1:<iv_b64>:<tag_b64>:<ciphertext_b64>
 */
export function createFieldCipher(hexKey: string): FieldCipher {
  const key = Buffer.from(hexKey, 'hex');
  if (key.length !== 32) {
    throw new Error('Field encryption key must be 32 bytes');
  }

  function encrypt(plain: string) {
    if (!plain) {
      throw new Error('Cannot encrypt empty data');
    }
    const iv = crypto.randomBytes(IV_BYTES);
    const cipher = crypto.createCipheriv(ALGO, key, iv, { authTagLength: TAG_BYTES });
    const enc = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return [PREFIX, iv.toString('base64'), tag.toString('base64'), enc.toString('base64')].join(':');
  }

  function decrypt(stored: string) {
    const parts = stored.split(':');
    if (parts.length !== 4 || parts[0] !== PREFIX) {
      throw new Error('Unrecognized encrypted field format');
    }
    const [, ivB64, tagB64, dataB64] = parts;
    const decipher = crypto.createDecipheriv(ALGO, key, Buffer.from(ivB64, 'base64'), {
      authTagLength: TAG_BYTES
    });
    decipher.setAuthTag(Buffer.from(tagB64, 'base64'));
    return Buffer.concat([
      decipher.update(Buffer.from(dataB64, 'base64')),
      decipher.final()
    ]).toString('utf8');
  }

  return { encrypt, decrypt };
}
