import type { NextFunction, Request, Response } from 'express';
import type { IssueCredentialResponse } from '@checkpass/types';
import { AppError } from '../../core/errors/AppError';
import { issueCredentialSchema, listCredentialsQuerySchema } from './credentials.schemas';
import { toCredentialDto, type CredentialsService } from './credentials.service';

export function createCredentialsController(credentialsService: CredentialsService) {
  async function issueCredentialHandler(req: Request, res: Response, next: NextFunction) {
    try {
      if (!req.user) {
        throw new AppError(401, 'Unauthorized');
      }

      const parsed = issueCredentialSchema.safeParse(req.body);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const { credential, qrPayload } = await credentialsService.issue(parsed.data);

      console.log(`[credentials] ${req.user.username} issued ${credential.id}`);

      const body: IssueCredentialResponse = {
        credentialId: credential.id,
        qrPayload,
        expiresAt: credential.expiresAt.toISOString()
      };

      return res.status(201).json(body);
    } catch (err) {
      next(err);
    }
  }

  async function listCredentialsHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = listCredentialsQuerySchema.safeParse(req.query);

      if (!parsed.success) {
        throw new AppError(400, 'Validation error', parsed.error.flatten());
      }

      const credentials = await credentialsService.listCredentials(parsed.data);

      return res.status(200).json({ credentials: credentials.map(toCredentialDto) });
    } catch (err) {
      next(err);
    }
  }

  async function getCredentialHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const credential = await credentialsService.getCredential(req.params.id);
      return res.status(200).json({ credential: toCredentialDto(credential) });
    } catch (err) {
      next(err);
    }
  }

  async function credentialQrHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const png = await credentialsService.qrPng(req.params.id);

      res.setHeader('Content-Type', 'image/png');
      res.setHeader('Cache-Control', 'no-store');
      return res.status(200).send(png);
    } catch (err) {
      next(err);
    }
  }

  async function revokeCredentialHandler(req: Request, res: Response, next: NextFunction) {
    try {
      if (!req.user) {
        throw new AppError(401, 'Unauthorized');
      }

      const status = await credentialsService.revoke(req.params.id);

      if (status === 'NOT_FOUND') {
        return res.status(404).json({ status });
      }

      console.log(`[credentials] ${req.user.username} revoke ${req.params.id} -> ${status}`);

      return res.status(200).json({ status });
    } catch (err) {
      next(err);
    }
  }

  async function archiveCredentialHandler(req: Request, res: Response, next: NextFunction) {
    try {
      const credential = await credentialsService.archive(req.params.id);
      return res.status(200).json({ credential: toCredentialDto(credential) });
    } catch (err) {
      next(err);
    }
  }

  return {
    issueCredentialHandler,
    listCredentialsHandler,
    getCredentialHandler,
    credentialQrHandler,
    revokeCredentialHandler,
    archiveCredentialHandler
  };
}
