import type { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors/AppError';
import { verifyAccessToken } from '../auth/jwt';

function readBearer(req: Request): string | null {
  const header = req.headers['authorization'];

  if (!header || typeof header !== 'string') {
    return null;
  }

  const [scheme, token] = header.split(' ');

  if (scheme !== 'Bearer' || !token) {
    throw new AppError(401, 'Invalid Authorization header format');
  }

  return token;
}

export function authMiddleware(jwtSecret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = readBearer(req);

    if (!token) {
      throw new AppError(401, 'Missing Authorization header');
    }

    try {
      const payload = verifyAccessToken(token, jwtSecret);

      req.user = {
        id: payload.sub,
        username: payload.username,
        role: payload.role,
        tokenPayload: payload
      };
    } catch {
      throw new AppError(401, 'Invalid or expired token');
    }

    next();
  };
}

/**
 * Attaches req.user when a valid admin token is present, lets the request
 * through untouched otherwise. Used on the visitor-facing scan route.
 */
export function optionalAuth(jwtSecret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers['authorization'];

    if (typeof header === 'string') {
      const [scheme, token] = header.split(' ');

      if (scheme === 'Bearer' && token) {
        try {
          const payload = verifyAccessToken(token, jwtSecret);
          req.user = {
            id: payload.sub,
            username: payload.username,
            role: payload.role,
            tokenPayload: payload
          };
        } catch {
          req.user = undefined;
        }
      }
    }

    next();
  };
}
