import type { NextFunction, Request, Response } from 'express';
import type { CameraStatusDto } from '@checkpass/types';
import { AppError, ServiceUnavailableError } from '../../core/errors/AppError';
import { toScanResponse } from '../checkins/checkins.controller';
import { scanOnceSchema } from './camera.schemas';
import type { CameraScanner } from './camera.scanner';

const UNAVAILABLE_STATUS: CameraStatusDto = {
  available: false,
  running: false,
  framesSeen: 0,
  payloadsSubmitted: 0,
  lastOutcome: null,
  lastReason: null,
  lastScanAt: null,
  lastError: null
};

// Hosted deployments have no camera; the adapter is simply absent there
export function createCameraController(camera: CameraScanner | null) {
  function requireCamera(): CameraScanner {
    if (!camera) {
      throw new ServiceUnavailableError('Camera not available on this host');
    }
    return camera;
  }

  function statusHandler(_req: Request, res: Response) {
    return res.status(200).json({ camera: camera ? camera.status() : UNAVAILABLE_STATUS });
  }

  function startHandler(_req: Request, res: Response, next: NextFunction) {
    try {
      const started = requireCamera().start();
      return res.status(started ? 202 : 200).json({ started, camera: requireCamera().status() });
    } catch (err) {
      next(err);
    }
  }

  async function stopHandler(_req: Request, res: Response, next: NextFunction) {
    try {
      const stopped = await requireCamera().stop();
      return res.status(200).json({ stopped, camera: requireCamera().status() });
    } catch (err) {
      next(err);
    }
  }

  async function scanOnceHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const scanner = requireCamera();
      const parsed = scanOnceSchema.safeParse(req.body ?? {});

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const result = await scanner.scanOnce(parsed.data.timeoutSeconds * 1000);

      if (!result) {
        return res.status(200).json({ detected: false, message: 'No QR code detected. Try again.' });
      }

      return res.status(200).json({ detected: true, ...toScanResponse(result) });
    } catch (err) {
      next(err);
    }
  }

  return { statusHandler, startHandler, stopHandler, scanOnceHandler };
}
