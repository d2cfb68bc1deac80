import type { Pool } from 'pg';
import { createFieldCipher } from './core/crypto/fieldCipher';
import { systemClock, type Clock } from './core/ids';
import type { Mailer } from './core/mail';
import { sharpQrDecoder, type QrImageDecoder } from './core/qr/qrImage';
import { createTokenCodec } from './core/qr/tokenCodec';
import { createMemoryAttemptLog } from './modules/attempts/attempts.memory';
import { createPgAttemptLog } from './modules/attempts/attempts.repository';
import { createAttemptsService } from './modules/attempts/attempts.service';
import type { AttemptLog } from './modules/attempts/attempts.store';
import { createAuthService } from './modules/auth/auth.service';
import { createCameraScanner } from './modules/camera/camera.scanner';
import type { FrameSource } from './modules/camera/frameSource';
import { createVerificationEngine } from './modules/checkins/checkins.service';
import { createMemoryCredentialStore } from './modules/credentials/credentials.memory';
import { createPgCredentialStore } from './modules/credentials/credentials.repository';
import { createCredentialsService } from './modules/credentials/credentials.service';
import type { CredentialStore } from './modules/credentials/credentials.store';
import { createMemoryUserStore } from './modules/users/users.memory';
import { createPgUserStore } from './modules/users/users.repository';
import { createUsersService } from './modules/users/users.service';
import type { UserStore } from './modules/users/users.store';
import { createMemoryVisitorStore } from './modules/visitors/visitors.memory';
import { createPgVisitorStore } from './modules/visitors/visitors.repository';
import { createVisitorsService } from './modules/visitors/visitors.service';
import type { VisitorStore } from './modules/visitors/visitors.store';

export type AppStores = {
  credentials: CredentialStore;
  attempts: AttemptLog;
  users: UserStore;
  visitors: VisitorStore;
};

export function createPgStores(pool: Pool): AppStores {
  return {
    credentials: createPgCredentialStore(pool),
    attempts: createPgAttemptLog(pool),
    users: createPgUserStore(pool),
    visitors: createPgVisitorStore(pool)
  };
}

export function createMemoryStores(): AppStores {
  return {
    credentials: createMemoryCredentialStore(),
    attempts: createMemoryAttemptLog(),
    users: createMemoryUserStore(),
    visitors: createMemoryVisitorStore()
  };
}

export type CameraOptions = {
  source: FrameSource;
  frameSkip: number;
  repeatCooldownMs: number;
};

export type ContextOptions = {
  stores: AppStores;
  jwtSecret: string;
  qrSecret: string;
  fieldEncryptionKey: string;
  defaultTtlSeconds: number;
  clock?: Clock;
  imageDecoder?: QrImageDecoder;
  mailer?: Mailer | null;
  /** Absent on hosts without a local camera. */
  camera?: CameraOptions | null;
};

export function createContext(opts: ContextOptions) {
  const { stores } = opts;
  const clock = opts.clock ?? systemClock;
  const codec = createTokenCodec(opts.qrSecret);

  const credentialsService = createCredentialsService({
    store: stores.credentials,
    codec,
    clock,
    defaultTtlSeconds: opts.defaultTtlSeconds
  });

  // single consumer for both scan producers
  const engine = createVerificationEngine({
    codec,
    credentials: stores.credentials,
    attempts: stores.attempts,
    clock
  });

  const camera = opts.camera
    ? createCameraScanner({
        source: opts.camera.source,
        submitter: engine,
        frameSkip: opts.camera.frameSkip,
        repeatCooldownMs: opts.camera.repeatCooldownMs
      })
    : null;

  return {
    jwtSecret: opts.jwtSecret,
    codec,
    engine,
    camera,
    imageDecoder: opts.imageDecoder ?? sharpQrDecoder,
    credentialsService,
    attemptsService: createAttemptsService(stores.attempts),
    usersService: createUsersService(stores.users),
    authService: createAuthService({ users: stores.users, jwtSecret: opts.jwtSecret }),
    visitorsService: createVisitorsService({
      visitors: stores.visitors,
      credentials: stores.credentials,
      credentialsService,
      cipher: createFieldCipher(opts.fieldEncryptionKey),
      mailer: opts.mailer ?? null,
      clock
    })
  };
}

export type AppContext = ReturnType<typeof createContext>;
