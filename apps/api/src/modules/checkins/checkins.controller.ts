import type { NextFunction, Request, Response } from 'express';
import type { ScanResponse } from '@checkpass/types';
import { AppError } from '../../core/errors/AppError';
import { ImageDecodeError, imageFromBase64, type QrImageDecoder } from '../../core/qr/qrImage';
import { scanSubmissionSchema, type ScanSubmissionInput } from './checkins.schemas';
import type { ScanSubmitter, VerificationResult } from './checkins.service';

export function toScanResponse(result: VerificationResult): ScanResponse {
  const body: ScanResponse = {
    outcome: result.outcome,
    attemptId: String(result.attempt.seq),
    scannedAt: result.attempt.occurredAt.toISOString()
  };

  if (result.outcome === 'ADMITTED' && result.subject) {
    body.subject = result.subject;
  }
  if (result.reason) {
    body.reason = result.reason;
  }

  return body;
}

export function createCheckinsController(deps: {
  engine: ScanSubmitter;
  imageDecoder: QrImageDecoder;
}) {
  async function resolvePayload(input: ScanSubmissionInput): Promise<string> {
    if (input.payload !== undefined) {
      return input.payload;
    }

    try {
      const text = await deps.imageDecoder.decodeImage(imageFromBase64(input.image ?? ''));
      if (text === null) {
        throw new AppError(422, 'No QR code detected');
      }
      return text;
    } catch (err) {
      if (err instanceof ImageDecodeError) {
        throw new AppError(400, err.message);
      }
      throw err;
    }
  }

  // Visitor-facing: one submission per request, answered synchronously
  async function scanHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = scanSubmissionSchema.safeParse(req.body);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const payload = await resolvePayload(parsed.data);

      const result = await deps.engine.submit(payload, {
        source: 'MOBILE_UPLOAD',
        operator: req.user?.username ?? null
      });

      return res.status(200).json(toScanResponse(result));
    } catch (err) {
      next(err);
    }
  }

  return { scanHandler };
}
