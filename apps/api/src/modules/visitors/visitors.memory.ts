import { newId } from '../../core/ids';
import type { CheckoutOutcome, Visitor, VisitorStore } from './visitors.store';

export function createMemoryVisitorStore(): VisitorStore {
  const rows: Visitor[] = [];

  return {
    async create(v) {
      const visitor: Visitor = { ...v, id: newId('vis'), checkedOutAt: null };
      rows.push(visitor);
      return { ...visitor };
    },

    async get(id) {
      const v = rows.find((row) => row.id === id);
      return v ? { ...v } : null;
    },

    async list(limit) {
      return rows
        .slice()
        .reverse()
        .slice(0, limit)
        .map((v) => ({ ...v }));
    },

    async checkout(id, now): Promise<CheckoutOutcome> {
      const index = rows.findIndex((row) => row.id === id);
      if (index === -1) return { result: 'NOT_FOUND' };

      const current = rows[index];
      if (current.checkedOutAt) return { result: 'ALREADY_CHECKED_OUT', visitor: { ...current } };

      const next: Visitor = { ...current, checkedOutAt: now };
      rows[index] = next;
      return { result: 'CHECKED_OUT', visitor: { ...next } };
    }
  };
}
