import bcrypt from 'bcryptjs';
import { AppError } from '../../core/errors/AppError';
import { signAccessToken } from '../../core/auth/jwt';
import type { UserStore } from '../users/users.store';
import { BCRYPT_ROUNDS, toSafeUser } from '../users/users.service';
import type { ChangePasswordInput, LoginInput } from './auth.schemas';

export function createAuthService(deps: { users: UserStore; jwtSecret: string }) {
  const { users, jwtSecret } = deps;

  async function login(payload: LoginInput) {
    const user = await users.findByUsername(payload.username);

    if (!user) {
      throw new AppError(401, 'Invalid credentials');
    }

    const isMatch = await bcrypt.compare(payload.password, user.passwordHash);

    if (!isMatch) {
      throw new AppError(401, 'Invalid credentials');
    }

    const token = signAccessToken(
      { id: user.id, username: user.username, role: user.role },
      jwtSecret
    );

    return { token, user: toSafeUser(user), mustChangePassword: user.mustChangePassword };
  }

  async function getCurrentUser(userId: string) {
    const user = await users.findById(userId);

    if (!user) {
      throw new AppError(404, 'User not found');
    }

    return toSafeUser(user);
  }

  async function changePassword(userId: string, input: ChangePasswordInput) {
    const user = await users.findById(userId);

    if (!user) {
      throw new AppError(404, 'User not found');
    }

    const isMatch = await bcrypt.compare(input.currentPassword, user.passwordHash);

    if (!isMatch) {
      throw new AppError(401, 'Current password is incorrect');
    }

    const passwordHash = await bcrypt.hash(input.newPassword, BCRYPT_ROUNDS);
    const updated = await users.updatePassword(user.id, passwordHash, false);

    if (!updated) {
      throw new AppError(404, 'User not found');
    }

    return toSafeUser(updated);
  }

  return { login, getCurrentUser, changePassword };
}

export type AuthService = ReturnType<typeof createAuthService>;
