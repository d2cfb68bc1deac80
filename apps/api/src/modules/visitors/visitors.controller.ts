import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../../core/errors/AppError';
import { listVisitorsQuerySchema, registerVisitorSchema } from './visitors.schemas';
import type { VisitorsService } from './visitors.service';

export function createVisitorsController(visitorsService: VisitorsService) {
  async function registerVisitorHandler(req: Request, res: Response, next: NextFunction) {
    try {
      if (!req.user) {
        throw new AppError(401, 'Unauthorized');
      }

      const parsed = registerVisitorSchema.safeParse(req.body);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const result = await visitorsService.register(parsed.data);

      console.log(`[visitors] ${req.user.username} registered ${result.visitor.id}`);

      return res.status(201).json(result);
    } catch (err) {
      next(err);
    }
  }

  async function listVisitorsHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = listVisitorsQuerySchema.safeParse(req.query);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const visitors = await visitorsService.listVisitors(parsed.data.limit);

      return res.status(200).json({ visitors });
    } catch (err) {
      next(err);
    }
  }

  async function getVisitorHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const visitor = await visitorsService.getVisitor(req.params.id);
      return res.status(200).json({ visitor });
    } catch (err) {
      next(err);
    }
  }

  async function checkoutVisitorHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const visitor = await visitorsService.checkout(req.params.id);
      return res.status(200).json({ visitor });
    } catch (err) {
      next(err);
    }
  }

  return {
    registerVisitorHandler,
    listVisitorsHandler,
    getVisitorHandler,
    checkoutVisitorHandler
  };
}
