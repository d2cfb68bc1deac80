import type { CredentialStatus, VisitorDto } from '@checkpass/types';
import { AppError } from '../../core/errors/AppError';
import type { FieldCipher } from '../../core/crypto/fieldCipher';
import type { Clock } from '../../core/ids';
import { passEmail, type Mailer } from '../../core/mail';
import { renderQrPng } from '../../core/qr/qrImage';
import type { CredentialsService } from '../credentials/credentials.service';
import type { CredentialStore } from '../credentials/credentials.store';
import type { RegisterVisitorInput } from './visitors.schemas';
import type { Visitor, VisitorStore } from './visitors.store';

export type VisitorsServiceDeps = {
  visitors: VisitorStore;
  credentials: CredentialStore;
  credentialsService: CredentialsService;
  cipher: FieldCipher;
  mailer: Mailer | null;
  clock: Clock;
};

const DECRYPT_FAILED = '[decryption error]';

export function createVisitorsService(deps: VisitorsServiceDeps) {
  const { visitors, credentials, credentialsService, cipher, clock } = deps;

  function reveal(stored: string) {
    try {
      return cipher.decrypt(stored);
    } catch (err) {
      console.error('[visitors] could not decrypt field', err);
      return DECRYPT_FAILED;
    }
  }

  function toVisitorDto(v: Visitor, credentialStatus: CredentialStatus | null): VisitorDto {
    return {
      id: v.id,
      name: v.name,
      phone: reveal(v.encryptedPhone),
      purpose: reveal(v.encryptedPurpose),
      credentialId: v.credentialId,
      credentialStatus,
      registeredAt: v.registeredAt.toISOString(),
      checkedOutAt: v.checkedOutAt?.toISOString() ?? null
    };
  }

  async function withStatus(v: Visitor) {
    const credential = await credentials.get(v.credentialId);
    return toVisitorDto(v, credential?.status ?? null);
  }

  async function sendPass(to: string, visitorName: string, qrPayload: string, expiresAt: Date) {
    if (!deps.mailer) return false;

    try {
      const qrPng = await renderQrPng(qrPayload);
      return await deps.mailer.sendMail({ to, ...passEmail({ visitorName, expiresAt, qrPng }) });
    } catch (err) {
      // the pass is already issued and shown at reception; mail is best effort
      console.error('[visitors] pass email failed', err);
      return false;
    }
  }

  /**
   * Reception flow: store the visitor with contact details encrypted and
   * issue their single-use pass.
   */
  async function register(input: RegisterVisitorInput) {
    const { credential, qrPayload } = await credentialsService.issue({
      subject: input.name,
      ttlSeconds: input.ttlSeconds
    });

    const visitor = await visitors.create({
      name: input.name,
      encryptedPhone: cipher.encrypt(input.phone),
      encryptedPurpose: cipher.encrypt(input.purpose),
      credentialId: credential.id,
      registeredAt: credential.issuedAt
    });

    const emailed = input.email
      ? await sendPass(input.email, input.name, qrPayload, credential.expiresAt)
      : false;

    return {
      visitor: toVisitorDto(visitor, credential.status),
      credentialId: credential.id,
      qrPayload,
      expiresAt: credential.expiresAt.toISOString(),
      emailed
    };
  }

  async function getVisitor(id: string) {
    const visitor = await visitors.get(id);

    if (!visitor) {
      throw new AppError(404, 'Visitor not found');
    }

    return withStatus(visitor);
  }

  async function listVisitors(limit: number) {
    const rows = await visitors.list(limit);
    return Promise.all(rows.map(withStatus));
  }

  async function checkout(id: string) {
    const visitor = await visitors.get(id);

    if (!visitor) {
      throw new AppError(404, 'Visitor not found');
    }

    const credential = await credentials.get(visitor.credentialId);

    if (!credential || credential.status !== 'CONSUMED') {
      throw new AppError(409, 'Visitor has not checked in');
    }

    const outcome = await visitors.checkout(id, clock());

    if (outcome.result === 'NOT_FOUND') {
      throw new AppError(404, 'Visitor not found');
    }
    if (outcome.result === 'ALREADY_CHECKED_OUT') {
      throw new AppError(409, 'Visitor already checked out');
    }

    return toVisitorDto(outcome.visitor, credential.status);
  }

  return { register, getVisitor, listVisitors, checkout };
}

export type VisitorsService = ReturnType<typeof createVisitorsService>;
