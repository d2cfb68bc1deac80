import { z } from 'zod';

function intVar(defaultValue: number, min = 0) {
  return z
    .string()
    .default(String(defaultValue))
    .transform((v) => Number(v))
    .refine((v) => Number.isInteger(v) && v >= min, {
      message: `must be an integer >= ${min}`
    });
}

function boolVar(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((v) => {
      const s = (v ?? '').trim().toLowerCase();
      if (!s) return defaultValue;
      return s === 'true' || s === '1' || s === 'yes';
    });
}

// `FOO=` in a .env file arrives as an empty string; treat it as unset
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: intVar(4000, 1),

  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_SSL: boolVar(false),
  DATABASE_POOL_MAX: intVar(5, 1),

  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  QR_SECRET: z.string().min(32, 'QR_SECRET must be at least 32 characters'),
  FIELD_ENCRYPTION_KEY: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'FIELD_ENCRYPTION_KEY must be 64 hex characters (32 bytes)'),

  DEFAULT_CREDENTIAL_TTL_SECONDS: intVar(24 * 60 * 60, 1),

  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: optionalString,

  CAMERA_DEVICE: optionalString,
  CAMERA_WIDTH: intVar(640, 1),
  CAMERA_HEIGHT: intVar(480, 1),
  CAMERA_FRAME_SKIP: intVar(3, 1),
  CAMERA_REPEAT_COOLDOWN_MS: intVar(0),

  SCAN_BODY_LIMIT: z.string().default('5mb'),

  SMTP_HOST: optionalString,
  SMTP_PORT: intVar(587, 1),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  MAIL_FROM: optionalString
});

export type Env = z.infer<typeof envSchema>;
