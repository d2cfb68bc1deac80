import { Router } from 'express';
import { authMiddleware } from '../../core/middleware/authMiddleware';
import { requireRole } from '../../core/middleware/requireRole';
import { createAttemptsController } from './attempts.controller';
import type { AttemptsService } from './attempts.service';

export function createAttemptsRouter(deps: { attemptsService: AttemptsService; jwtSecret: string }) {
  const router = Router();
  const controller = createAttemptsController(deps.attemptsService);

  // Audit trail, newest first
  // GET /api/attempts?since=&before=&credentialId=&limit=
  router.get(
    '/',
    authMiddleware(deps.jwtSecret),
    requireRole(['ADMIN']),
    controller.listAttemptsHandler
  );

  return router;
}
