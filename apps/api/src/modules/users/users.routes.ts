import { Router } from 'express';
import { authMiddleware } from '../../core/middleware/authMiddleware';
import { requireRole } from '../../core/middleware/requireRole';
import { createUsersController } from './users.controller';
import type { UsersService } from './users.service';

export function createUsersRouter(deps: { usersService: UsersService; jwtSecret: string }) {
  const router = Router();
  const controller = createUsersController(deps.usersService);

  // POST /api/users
  router.post('/', authMiddleware(deps.jwtSecret), requireRole(['ADMIN']), controller.createUserHandler);

  return router;
}
