import { env } from './core/config/env';
import { connectDB, createPool, disconnectDB } from './core/db/client';
import { initSchema } from './core/db/schema';
import { createMailer } from './core/mail';
import { createApp } from './app';
import { createContext, createPgStores } from './context';
import { createFfmpegFrameSource } from './modules/camera/frameSource';

async function start() {
  const pool = createPool({
    connectionString: env.DATABASE_URL,
    ssl: env.DATABASE_SSL,
    max: env.DATABASE_POOL_MAX
  });

  try {
    await connectDB(pool);
    await initSchema(pool);

    const ctx = createContext({
      stores: createPgStores(pool),
      jwtSecret: env.JWT_SECRET,
      qrSecret: env.QR_SECRET,
      fieldEncryptionKey: env.FIELD_ENCRYPTION_KEY,
      defaultTtlSeconds: env.DEFAULT_CREDENTIAL_TTL_SECONDS,
      mailer: createMailer({
        host: env.SMTP_HOST,
        port: env.SMTP_PORT,
        user: env.SMTP_USER,
        pass: env.SMTP_PASS,
        from: env.MAIL_FROM
      }),
      camera: env.CAMERA_DEVICE
        ? {
            source: createFfmpegFrameSource({
              device: env.CAMERA_DEVICE,
              width: env.CAMERA_WIDTH,
              height: env.CAMERA_HEIGHT
            }),
            frameSkip: env.CAMERA_FRAME_SKIP,
            repeatCooldownMs: env.CAMERA_REPEAT_COOLDOWN_MS
          }
        : null
    });

    if (env.ADMIN_PASSWORD) {
      await ctx.usersService.ensureDefaultAdmin(env.ADMIN_USERNAME, env.ADMIN_PASSWORD);
    } else {
      console.warn('[users] ADMIN_PASSWORD not set, no default admin is provisioned');
    }

    const app = createApp(ctx, { bodyLimit: env.SCAN_BODY_LIMIT });

    const server = app.listen(env.PORT, '0.0.0.0', () => {
      console.log(`🚀 API listening on http://0.0.0.0:${env.PORT}`);
    });

    if (ctx.camera) {
      ctx.camera.start();
    } else {
      console.log('[camera] no CAMERA_DEVICE configured, local scanning disabled');
    }

    const shutdown = async () => {
      console.log('Shutting down gracefully...');
      if (ctx.camera) {
        await ctx.camera.stop();
      }
      server.close(() => {
        disconnectDB(pool).then(
          () => process.exit(0),
          (err: unknown) => {
            console.error('[db] disconnect failed', err);
            process.exit(1);
          }
        );
      });
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  } catch (err) {
    console.error('Failed to start server', err);
    await pool.end().catch((endErr: unknown) => console.error('[db] pool close failed', endErr));
    process.exit(1);
  }
}

void start();
