import bcrypt from 'bcryptjs';
import { AppError } from '../../core/errors/AppError';
import type { CreateUserInput } from './users.schemas';
import type { AdminUser, UserStore } from './users.store';

export const BCRYPT_ROUNDS = 10;

export type SafeUser = Omit<AdminUser, 'passwordHash'>;

export function toSafeUser(user: AdminUser): SafeUser {
  // drop the hash before anything leaves the service
  const { passwordHash, ...safeUser } = user;
  return safeUser;
}

export function createUsersService(store: UserStore) {
  async function createUser(input: CreateUserInput) {
    const passwordHash = await bcrypt.hash(input.password, BCRYPT_ROUNDS);

    const user = await store.create({
      username: input.username,
      passwordHash,
      role: input.role,
      // whoever receives the account picks their own password on first login
      mustChangePassword: true
    });

    if (!user) {
      throw new AppError(409, 'Username already in use');
    }

    return toSafeUser(user);
  }

  /**
   * Default admin from configuration. Created when missing; its password
   * follows the configured one only until the admin changes it.
   */
  async function ensureDefaultAdmin(username: string, password: string) {
    const existing = await store.findByUsername(username);
    const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);

    if (!existing) {
      await store.create({ username, passwordHash, role: 'ADMIN', mustChangePassword: true });
      console.log(`[users] default admin created: ${username}`);
      return 'CREATED' as const;
    }

    if (existing.mustChangePassword) {
      await store.updatePassword(existing.id, passwordHash, true);
      return 'SYNCED' as const;
    }

    return 'UNCHANGED' as const;
  }

  return { createUser, ensureDefaultAdmin };
}

export type UsersService = ReturnType<typeof createUsersService>;
