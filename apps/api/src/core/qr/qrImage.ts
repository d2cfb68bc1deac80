import QRCode from 'qrcode';
import sharp from 'sharp';
import jsQR from 'jsqr';

const MAX_DECODE_WIDTH = 1600;

/** Raw RGBA pixels, 4 bytes per pixel, row-major. */
export type RgbaFrame = {
  data: Uint8Array;
  width: number;
  height: number;
};

export class ImageDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImageDecodeError';
  }
}

export interface QrImageDecoder {
  /** Resolves to the QR text, or null when the picture holds no readable code. */
  decodeImage(image: Buffer): Promise<string | null>;
}

export function renderQrPng(payload: string) {
  return QRCode.toBuffer(payload, {
    type: 'png',
    width: 320,
    margin: 2,
    errorCorrectionLevel: 'M'
  });
}

export function decodeQrFrame(frame: RgbaFrame): string | null {
  if (frame.data.length < frame.width * frame.height * 4) {
    return null;
  }
  const pixels = new Uint8ClampedArray(frame.data.buffer, frame.data.byteOffset, frame.width * frame.height * 4);
  const code = jsQR(pixels, frame.width, frame.height);
  return code && code.data ? code.data : null;
}

export const sharpQrDecoder: QrImageDecoder = {
  async decodeImage(image) {
    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      decoded = await sharp(image)
        .rotate()
        .resize({ width: MAX_DECODE_WIDTH, withoutEnlargement: true })
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'unknown error';
      throw new ImageDecodeError(`Unreadable image: ${message}`);
    }

    return decodeQrFrame({
      data: decoded.data,
      width: decoded.info.width,
      height: decoded.info.height
    });
  }
};

/**
 * Accepts plain base64 or a data URL (data:image/png;base64,...).
 */
export function imageFromBase64(input: string): Buffer {
  const trimmed = input.trim();
  const b64 = trimmed.startsWith('data:') ? trimmed.slice(trimmed.indexOf(',') + 1) : trimmed;
  if (!b64 || !/^[A-Za-z0-9+/=_-]+$/.test(b64.replace(/\s+/g, ''))) {
    throw new ImageDecodeError('Image must be base64 or a data URL');
  }
  return Buffer.from(b64.replace(/\s+/g, ''), 'base64');
}
