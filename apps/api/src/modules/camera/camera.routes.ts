import { Router } from 'express';
import { authMiddleware } from '../../core/middleware/authMiddleware';
import { requireRole } from '../../core/middleware/requireRole';
import { createCameraController } from './camera.controller';
import type { CameraScanner } from './camera.scanner';

export function createCameraRouter(deps: { camera: CameraScanner | null; jwtSecret: string }) {
  const router = Router();
  const controller = createCameraController(deps.camera);

  router.use(authMiddleware(deps.jwtSecret), requireRole(['ADMIN']));

  // GET /api/camera/status
  router.get('/status', controller.statusHandler);

  // Continuous capture loop
  // POST /api/camera/start, POST /api/camera/stop
  router.post('/start', controller.startHandler);
  router.post('/stop', controller.stopHandler);

  // Wait for the next pass in front of the camera
  // POST /api/camera/scan-once { timeoutSeconds? }
  router.post('/scan-once', controller.scanOnceHandler);

  return router;
}
