export type CredentialStatus = 'UNUSED' | 'CONSUMED' | 'REVOKED';

export type ScanSource = 'LOCAL_CAMERA' | 'MOBILE_UPLOAD';

export type DecodeErrorKind = 'MALFORMED' | 'TAG_MISMATCH' | 'UNSUPPORTED';

export type ConsumeResult =
  | 'CONSUMED'
  | 'ALREADY_CONSUMED'
  | 'REVOKED'
  | 'EXPIRED'
  | 'NOT_FOUND';

export type RevokeResult = 'REVOKED' | 'ALREADY_CONSUMED' | 'NOT_FOUND';

export type DenialReason =
  | DecodeErrorKind
  | 'DUPLICATE_SCAN'
  | 'REVOKED'
  | 'EXPIRED'
  | 'UNKNOWN_CREDENTIAL';

export type ScanOutcome = 'ADMITTED' | 'DENIED';

export type AdminRole = 'ADMIN' | 'RECEPTION';

export type CredentialDto = {
  id: string;
  subject: string;
  status: CredentialStatus;
  issuedAt: string;
  expiresAt: string;
  consumedAt: string | null;
  revokedAt: string | null;
  archivedAt: string | null;
};

export type IssueCredentialResponse = {
  credentialId: string;
  qrPayload: string;
  expiresAt: string;
};

/**
 * Visitor-facing scan answer. Never carries the payload or its tag,
 * only what the checkpoint needs to greet (or turn away) the visitor.
 */
export type ScanResponse = {
  outcome: ScanOutcome;
  subject?: string;
  reason?: DenialReason;
  attemptId: string;
  scannedAt: string;
};

export type ScanAttemptDto = {
  id: string;
  credentialId: string | null;
  source: ScanSource;
  occurredAt: string;
  outcome: ScanOutcome;
  reason: DenialReason | null;
  payloadHash: string;
  operator: string | null;
};

export type VisitorDto = {
  id: string;
  name: string;
  phone: string;
  purpose: string;
  credentialId: string;
  credentialStatus: CredentialStatus | null;
  registeredAt: string;
  checkedOutAt: string | null;
};

export type CameraStatusDto = {
  available: boolean;
  running: boolean;
  framesSeen: number;
  payloadsSubmitted: number;
  lastOutcome: ScanOutcome | null;
  lastReason: DenialReason | null;
  lastScanAt: string | null;
  lastError: string | null;
};
