import { Router } from 'express';
import { authMiddleware } from '../../core/middleware/authMiddleware';
import { createAuthController } from './auth.controller';
import type { AuthService } from './auth.service';

export function createAuthRouter(deps: { authService: AuthService; jwtSecret: string }) {
  const router = Router();
  const controller = createAuthController(deps.authService);
  const auth = authMiddleware(deps.jwtSecret);

  // POST /api/auth/login
  router.post('/login', controller.loginHandler);

  // GET /api/auth/me
  router.get('/me', auth, controller.meHandler);

  // POST /api/auth/change-password
  router.post('/change-password', auth, controller.changePasswordHandler);

  return router;
}
