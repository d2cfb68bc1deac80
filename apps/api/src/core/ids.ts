import crypto from 'node:crypto';

export function newId(prefix: string) {
  const a = Date.now().toString(36);
  const b = crypto.randomBytes(6).toString('hex');
  return `${prefix}_${a}_${b}`;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
