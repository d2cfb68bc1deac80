import type { AdminRole } from '@checkpass/types';

export type AdminUser = {
  id: string;
  username: string;
  passwordHash: string;
  role: AdminRole;
  mustChangePassword: boolean;
  createdAt: Date;
  updatedAt: Date;
};

export interface CreateUserData {
  username: string;
  passwordHash: string;
  role: AdminRole;
  mustChangePassword: boolean;
}

export interface UserStore {
  findByUsername(username: string): Promise<AdminUser | null>;
  findById(id: string): Promise<AdminUser | null>;
  /** Resolves null when the username is taken. */
  create(data: CreateUserData): Promise<AdminUser | null>;
  updatePassword(
    id: string,
    passwordHash: string,
    mustChangePassword: boolean
  ): Promise<AdminUser | null>;
}

export function normalizeUsername(username: string) {
  return username.trim().toLowerCase();
}
