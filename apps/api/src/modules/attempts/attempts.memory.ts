import type { AttemptLog, ScanAttempt } from './attempts.store';

export function createMemoryAttemptLog(): AttemptLog {
  const rows: ScanAttempt[] = [];
  let seq = 0;

  return {
    async append(attempt) {
      seq += 1;
      const row: ScanAttempt = { ...attempt, seq };
      rows.push(row);
      return { ...row };
    },

    async list({ since, before, credentialId, limit }) {
      const out: ScanAttempt[] = [];
      for (let i = rows.length - 1; i >= 0 && out.length < limit; i--) {
        const a = rows[i];
        if (since && a.occurredAt.getTime() < since.getTime()) continue;
        if (before !== undefined && a.seq >= before) continue;
        if (credentialId && a.credentialId !== credentialId) continue;
        out.push({ ...a });
      }
      return out;
    }
  };
}
