import { Router } from 'express';
import { authMiddleware } from '../../core/middleware/authMiddleware';
import { requireRole } from '../../core/middleware/requireRole';
import { createCredentialsController } from './credentials.controller';
import type { CredentialsService } from './credentials.service';

export function createCredentialsRouter(deps: {
  credentialsService: CredentialsService;
  jwtSecret: string;
}) {
  const router = Router();
  const controller = createCredentialsController(deps.credentialsService);
  const auth = authMiddleware(deps.jwtSecret);

  // Issue a credential
  // POST /api/credentials
  router.post(
    '/',
    auth,
    requireRole(['ADMIN', 'RECEPTION']),
    controller.issueCredentialHandler
  );

  // GET /api/credentials?status=&includeArchived=&limit=
  router.get('/', auth, requireRole(['ADMIN']), controller.listCredentialsHandler);

  // GET /api/credentials/:id
  router.get('/:id', auth, requireRole(['ADMIN']), controller.getCredentialHandler);

  // Printable pass
  // GET /api/credentials/:id/qr.png
  router.get(
    '/:id/qr.png',
    auth,
    requireRole(['ADMIN', 'RECEPTION']),
    controller.credentialQrHandler
  );

  // POST /api/credentials/:id/revoke
  router.post('/:id/revoke', auth, requireRole(['ADMIN']), controller.revokeCredentialHandler);

  // POST /api/credentials/:id/archive
  router.post('/:id/archive', auth, requireRole(['ADMIN']), controller.archiveCredentialHandler);

  return router;
}
