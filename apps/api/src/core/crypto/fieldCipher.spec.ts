import { describe, expect, it } from 'vitest';
import { createFieldCipher } from './fieldCipher';

const KEY = '11'.repeat(32);

describe('field cipher', () => {
  const cipher = createFieldCipher(KEY);

  it('decrypts what it encrypted', () => {
    const stored = cipher.encrypt('5551234567');
    expect(stored.startsWith('gcm1:')).toBe(true);
    expect(stored).not.toContain('5551234567');
    expect(cipher.decrypt(stored)).toBe('5551234567');
  });

  it('uses a fresh IV for each encryption', () => {
    expect(cipher.encrypt('Meeting with facilities')).not.toBe(cipher.encrypt('Meeting with facilities'));
  });

  it('refuses modified ciphertext', () => {
    const [prefix, iv, tag, data] = cipher.encrypt('Parcel delivery').split(':');
    const bytes = Buffer.from(data, 'base64');
    bytes[0] ^= 0x01;
    expect(() => cipher.decrypt([prefix, iv, tag, bytes.toString('base64')].join(':'))).toThrow();
  });

  it('refuses data encrypted under another key', () => {
    const other = createFieldCipher('22'.repeat(32));
    expect(() => cipher.decrypt(other.encrypt('secret'))).toThrow();
  });

  it('rejects unknown formats and empty input', () => {
    expect(() => cipher.decrypt('dGVzdA==')).toThrow('Unrecognized encrypted field format');
    expect(() => cipher.encrypt('')).toThrow('Cannot encrypt empty data');
  });

  it('requires a 32-byte key', () => {
    expect(() => createFieldCipher('abcd')).toThrow('Field encryption key must be 32 bytes');
  });
});
