import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../../core/errors/AppError';
import { listAttemptsQuerySchema } from './attempts.schemas';
import type { AttemptsService } from './attempts.service';

export function createAttemptsController(attemptsService: AttemptsService) {
  async function listAttemptsHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = listAttemptsQuerySchema.safeParse(req.query);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const attempts = await attemptsService.listAttempts(parsed.data);

      return res.status(200).json({ attempts });
    } catch (err) {
      next(err);
    }
  }

  return { listAttemptsHandler };
}
