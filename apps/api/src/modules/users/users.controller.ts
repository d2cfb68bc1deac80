import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../../core/errors/AppError';
import { createUserSchema } from './users.schemas';
import type { UsersService } from './users.service';

export function createUsersController(usersService: UsersService) {
  async function createUserHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = createUserSchema.safeParse(req.body);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const user = await usersService.createUser(parsed.data);

      return res.status(201).json({ user });
    } catch (err) {
      next(err);
    }
  }

  return { createUserHandler };
}
