import { newId } from '../../core/ids';
import { normalizeUsername, type AdminUser, type UserStore } from './users.store';

export function createMemoryUserStore(): UserStore {
  const byId = new Map<string, AdminUser>();

  function findByUsernameSync(username: string) {
    const u = normalizeUsername(username);
    for (const user of byId.values()) {
      if (user.username === u) return user;
    }
    return null;
  }

  return {
    async findByUsername(username) {
      const user = findByUsernameSync(username);
      return user ? { ...user } : null;
    },

    async findById(id) {
      const user = byId.get(id);
      return user ? { ...user } : null;
    },

    async create(data) {
      if (findByUsernameSync(data.username)) return null;

      const now = new Date();
      const user: AdminUser = {
        id: newId('usr'),
        username: normalizeUsername(data.username),
        passwordHash: data.passwordHash,
        role: data.role,
        mustChangePassword: data.mustChangePassword,
        createdAt: now,
        updatedAt: now
      };
      byId.set(user.id, user);
      return { ...user };
    },

    async updatePassword(id, passwordHash, mustChangePassword) {
      const user = byId.get(id);
      if (!user) return null;

      const next: AdminUser = { ...user, passwordHash, mustChangePassword, updatedAt: new Date() };
      byId.set(id, next);
      return { ...next };
    }
  };
}
