export interface ValidationConfig {
  clientId: string;
  introspectionUrl: string;
  cacheTtlSeconds: number;
  validationTimeoutMs: number;
}

/**
 * Claims returned by the introspection endpoint for a valid credential
 */
export type TokenPayload = Record<string, unknown>;

export type ValidationFailureReason =
  | 'MissingCredential'
  | 'ValidationUnreachable'
  | 'InvalidCredential'
  | 'AudienceMismatch'
  | 'CredentialExpired';

export type ValidationResult =
  | { ok: true; payload: TokenPayload }
  | { ok: false; reason: ValidationFailureReason; message: string };

export interface CredentialValidator {
  validate(credential: string): Promise<ValidationResult>;
}

export interface CacheEntry<V> {
  value: V;
  expiresAt: number; // epoch ms
}
