import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { ImageDecodeError, imageFromBase64, renderQrPng, sharpQrDecoder } from './qrImage';

const PAYLOAD = 'cq1.cred_abc_123.1893456060000.placeholder-tag';

describe('qr images', () => {
  it('reads back the payload of a rendered code', async () => {
    const png = await renderQrPng(PAYLOAD);
    await expect(sharpQrDecoder.decodeImage(png)).resolves.toBe(PAYLOAD);
  });

  it('returns null for a picture without a code', async () => {
    const blank = await sharp({
      create: { width: 200, height: 200, channels: 3, background: '#ffffff' }
    })
      .png()
      .toBuffer();
    await expect(sharpQrDecoder.decodeImage(blank)).resolves.toBeNull();
  });

  it('reports bytes that are not an image', async () => {
    const err = await sharpQrDecoder.decodeImage(Buffer.from('definitely not a png')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ImageDecodeError);
    expect(err instanceof Error && err.message.startsWith('Unreadable image: ')).toBe(true);
  });
});

describe('imageFromBase64', () => {
  it('accepts plain base64 and data URLs', () => {
    expect(imageFromBase64('aGVsbG8=').toString()).toBe('hello');
    expect(imageFromBase64('data:image/png;base64,aGVsbG8=').toString()).toBe('hello');
  });

  it('rejects anything else', () => {
    expect(() => imageFromBase64('')).toThrow('Image must be base64 or a data URL');
    expect(() => imageFromBase64('data:image/png;base64,')).toThrow(ImageDecodeError);
    expect(() => imageFromBase64('not base64!')).toThrow(ImageDecodeError);
  });
});
