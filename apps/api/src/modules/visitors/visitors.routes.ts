import { Router } from 'express';
import { authMiddleware } from '../../core/middleware/authMiddleware';
import { requireRole } from '../../core/middleware/requireRole';
import { createVisitorsController } from './visitors.controller';
import type { VisitorsService } from './visitors.service';

export function createVisitorsRouter(deps: { visitorsService: VisitorsService; jwtSecret: string }) {
  const router = Router();
  const controller = createVisitorsController(deps.visitorsService);
  const auth = authMiddleware(deps.jwtSecret);

  // Reception: register a visitor and hand out their pass
  // POST /api/visitors
  router.post('/', auth, requireRole(['ADMIN', 'RECEPTION']), controller.registerVisitorHandler);

  // GET /api/visitors?limit=
  router.get('/', auth, requireRole(['ADMIN']), controller.listVisitorsHandler);

  // GET /api/visitors/:id
  router.get('/:id', auth, requireRole(['ADMIN']), controller.getVisitorHandler);

  // POST /api/visitors/:id/checkout
  router.post('/:id/checkout', auth, requireRole(['ADMIN']), controller.checkoutVisitorHandler);

  return router;
}
