import { Router } from 'express';
import { optionalAuth } from '../../core/middleware/authMiddleware';
import type { QrImageDecoder } from '../../core/qr/qrImage';
import { createCheckinsController } from './checkins.controller';
import type { ScanSubmitter } from './checkins.service';

export function createCheckinsRouter(deps: {
  engine: ScanSubmitter;
  imageDecoder: QrImageDecoder;
  jwtSecret: string;
}) {
  const router = Router();
  const controller = createCheckinsController(deps);

  // Scan submission from a phone or browser (payload text or QR picture).
  // No login needed; an admin token, when sent, is recorded as the operator.
  // POST /api/checkins/scan
  router.post('/scan', optionalAuth(deps.jwtSecret), controller.scanHandler);

  return router;
}
