import jwt from 'jsonwebtoken';
import type { AdminRole } from '@checkpass/types';

export interface JwtPayload {
  sub: string; // admin user id
  username: string;
  role: AdminRole;
}

const EXPIRES_IN = '12h';

function isAdminRole(value: unknown): value is AdminRole {
  return value === 'ADMIN' || value === 'RECEPTION';
}

export function signAccessToken(
  user: { id: string; username: string; role: AdminRole },
  secret: string
) {
  const payload: JwtPayload = {
    sub: user.id,
    username: user.username,
    role: user.role
  };

  return jwt.sign(payload, secret, {
    expiresIn: EXPIRES_IN
  });
}

export function verifyAccessToken(token: string, secret: string): JwtPayload {
  const decoded = jwt.verify(token, secret);

  // jwt.verify may hand back a string or an arbitrary object
  if (typeof decoded === 'string') {
    throw new Error('Invalid token payload');
  }

  const { sub, username, role } = decoded;

  if (typeof sub !== 'string' || typeof username !== 'string' || !isAdminRole(role)) {
    throw new Error('Invalid token payload');
  }

  return { sub, username, role };
}
