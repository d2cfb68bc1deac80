import bcrypt from 'bcryptjs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AppError } from '../../core/errors/AppError';
import { createMemoryUserStore } from './users.memory';
import { createUsersService } from './users.service';

describe('users service', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    return () => vi.restoreAllMocks();
  });

  it('creates users that must pick their own password', async () => {
    const store = createMemoryUserStore();
    const service = createUsersService(store);

    const user = await service.createUser({ username: 'Front.Desk', password: 'password-1', role: 'RECEPTION' });

    expect(user).toMatchObject({ username: 'front.desk', role: 'RECEPTION', mustChangePassword: true });
    expect(user).not.toHaveProperty('passwordHash');

    const stored = await store.findByUsername('front.desk');
    expect(stored && (await bcrypt.compare('password-1', stored.passwordHash))).toBe(true);
  });

  it('refuses a taken username regardless of case', async () => {
    const service = createUsersService(createMemoryUserStore());
    await service.createUser({ username: 'guard', password: 'password-1', role: 'RECEPTION' });

    const err = await service
      .createUser({ username: 'GUARD', password: 'password-2', role: 'ADMIN' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AppError);
    expect(err instanceof AppError && [err.statusCode, err.message]).toEqual([409, 'Username already in use']);
  });

  describe('ensureDefaultAdmin', () => {
    it('creates the admin on first boot', async () => {
      const store = createMemoryUserStore();
      const service = createUsersService(store);

      await expect(service.ensureDefaultAdmin('admin', 'first-password')).resolves.toBe('CREATED');

      const admin = await store.findByUsername('admin');
      expect(admin?.role).toBe('ADMIN');
      expect(admin?.mustChangePassword).toBe(true);
    });

    it('follows the configured password until the admin changes it', async () => {
      const store = createMemoryUserStore();
      const service = createUsersService(store);
      await service.ensureDefaultAdmin('admin', 'first-password');

      await expect(service.ensureDefaultAdmin('admin', 'second-password')).resolves.toBe('SYNCED');
      const synced = await store.findByUsername('admin');
      expect(synced && (await bcrypt.compare('second-password', synced.passwordHash))).toBe(true);

      if (synced) {
        await store.updatePassword(synced.id, await bcrypt.hash('chosen-by-admin', 4), false);
      }

      await expect(service.ensureDefaultAdmin('admin', 'third-password')).resolves.toBe('UNCHANGED');
      const kept = await store.findByUsername('admin');
      expect(kept && (await bcrypt.compare('chosen-by-admin', kept.passwordHash))).toBe(true);
    });
  });
});
