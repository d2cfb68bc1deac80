import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './core/errors/errorHandler';
import type { AppContext } from './context';
import { createAttemptsRouter } from './modules/attempts/attempts.routes';
import { createAuthRouter } from './modules/auth/auth.routes';
import { createCameraRouter } from './modules/camera/camera.routes';
import { createCheckinsRouter } from './modules/checkins/checkins.routes';
import { createCredentialsRouter } from './modules/credentials/credentials.routes';
import { createUsersRouter } from './modules/users/users.routes';
import { createVisitorsRouter } from './modules/visitors/visitors.routes';

export type AppOptions = {
  /** express.json limit; scan uploads carry a base64 picture. */
  bodyLimit: string;
  logRequests?: boolean;
};

export function createApp(ctx: AppContext, opts: AppOptions) {
  const app = express();
  const { jwtSecret } = ctx;

  // CORS first and open: the scan page runs on phones and desktop browsers
  app.use(
    cors({
      origin: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization']
    })
  );

  app.use(helmet());
  app.use(express.json({ limit: opts.bodyLimit }));
  if (opts.logRequests ?? true) {
    app.use(morgan('dev'));
  }

  // Healthcheck
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // Auth
  app.use('/api/auth', createAuthRouter({ authService: ctx.authService, jwtSecret }));

  // Admin accounts
  app.use('/api/users', createUsersRouter({ usersService: ctx.usersService, jwtSecret }));

  // Issuance / revocation
  app.use(
    '/api/credentials',
    createCredentialsRouter({ credentialsService: ctx.credentialsService, jwtSecret })
  );

  // Reception
  app.use('/api/visitors', createVisitorsRouter({ visitorsService: ctx.visitorsService, jwtSecret }));

  // Check-in (mobile / browser submissions)
  app.use(
    '/api/checkins',
    createCheckinsRouter({ engine: ctx.engine, imageDecoder: ctx.imageDecoder, jwtSecret })
  );

  // Audit trail
  app.use('/api/attempts', createAttemptsRouter({ attemptsService: ctx.attemptsService, jwtSecret }));

  // Local camera control
  app.use('/api/camera', createCameraRouter({ camera: ctx.camera, jwtSecret }));

  // 404
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Errors
  app.use(errorHandler);

  return app;
}
