import type { AdminRole } from '@checkpass/types';
import type { JwtPayload } from '../core/auth/jwt';

declare global {
  namespace Express {
    interface UserPayload {
      id: string;
      username: string;
      role: AdminRole;
      tokenPayload: JwtPayload;
    }

    interface Request {
      user?: UserPayload;
    }
  }
}

export {};
