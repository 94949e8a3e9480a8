import { createHash } from 'crypto';
import { z } from 'zod';
import type { Logger } from 'pino';
import { ConfigurationError } from '../config/index.js';
import { ExpiryCache } from './memory-cache.js';
import type {
  CredentialValidator,
  TokenPayload,
  ValidationConfig,
  ValidationResult,
} from './types.js';

export type {
  CredentialValidator,
  TokenPayload,
  ValidationConfig,
  ValidationFailureReason,
  ValidationResult,
} from './types.js';
export { ExpiryCache } from './memory-cache.js';

export const MIN_CACHE_TTL_SECONDS = 30;

const TokenInfoSchema = z.record(z.unknown());

function shortHash(data: string): string {
  return createHash('sha256').update(data).digest('hex').substring(0, 8);
}

function parseNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Absolute expiry in epoch ms. Prefers `exp` (epoch seconds), then
 * `now + expires_in`. Anything unparseable resolves to `now` so the
 * credential is treated as expired.
 */
export function extractExpiry(payload: TokenPayload, now: number): number {
  if (payload.exp !== undefined && payload.exp !== null) {
    const exp = parseNumeric(payload.exp);
    return exp === undefined ? now : exp * 1000;
  }
  if (payload.expires_in !== undefined && payload.expires_in !== null) {
    const expiresIn = parseNumeric(payload.expires_in);
    return expiresIn === undefined ? now : now + expiresIn * 1000;
  }
  return now;
}

function audienceOf(payload: TokenPayload): unknown {
  const aud = payload.aud;
  if (aud !== undefined && aud !== null && aud !== '') {
    return aud;
  }
  return payload.issued_to;
}

export class TokenValidator implements CredentialValidator {
  private cache: ExpiryCache<string, TokenPayload>;
  private config: ValidationConfig;
  private maxTtlMs: number;
  private logger: Logger;

  constructor(config: ValidationConfig, logger: Logger, cache = new ExpiryCache<string, TokenPayload>()) {
    if (!config.clientId) {
      throw new ConfigurationError('OAuth client id is required (set OAUTH_CLIENT_ID)');
    }
    this.config = config;
    this.logger = logger;
    this.cache = cache;
    this.maxTtlMs = Math.max(MIN_CACHE_TTL_SECONDS, config.cacheTtlSeconds) * 1000;
  }

  async validate(credential: string): Promise<ValidationResult> {
    if (!credential) {
      return { ok: false, reason: 'MissingCredential', message: 'Missing access token' };
    }

    const tokenHash = shortHash(credential);

    const cached = this.cache.get(credential);
    if (cached) {
      this.logger.debug({ tokenHash }, 'Credential validated from cache');
      return { ok: true, payload: structuredClone(cached) };
    }

    const url = new URL(this.config.introspectionUrl);
    url.searchParams.set('access_token', credential);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.validationTimeoutMs),
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.warn({ err, tokenHash }, 'Credential introspection unreachable');
      return {
        ok: false,
        reason: 'ValidationUnreachable',
        message: `Token validation failed: ${detail}`,
      };
    }

    if (!response.ok) {
      this.logger.warn({ tokenHash, status: response.status }, 'Credential rejected by introspection');
      return { ok: false, reason: 'InvalidCredential', message: 'Invalid access token' };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      this.logger.warn({ err, tokenHash }, 'Introspection returned a non-JSON body');
      return { ok: false, reason: 'InvalidCredential', message: 'Invalid access token' };
    }

    const parsed = TokenInfoSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ tokenHash }, 'Introspection returned a non-object body');
      return { ok: false, reason: 'InvalidCredential', message: 'Invalid access token' };
    }
    const payload = parsed.data;

    if (audienceOf(payload) !== this.config.clientId) {
      this.logger.warn({ tokenHash }, 'Credential audience mismatch');
      return { ok: false, reason: 'AudienceMismatch', message: 'Token audience mismatch' };
    }

    const now = Date.now();
    const expiresAt = extractExpiry(payload, now);
    if (expiresAt <= now) {
      this.logger.info({ tokenHash }, 'Credential expired');
      return { ok: false, reason: 'CredentialExpired', message: 'Access token expired' };
    }

    // Never cache beyond the credential's own expiry
    const ttlMs = Math.min(expiresAt - now, this.maxTtlMs);
    // The cache keeps its own copy so callers cannot alter what later hits return
    this.cache.set(credential, structuredClone(payload), now + ttlMs);
    this.logger.info({ tokenHash, ttlSeconds: Math.floor(ttlMs / 1000) }, 'Credential validated by introspection');

    return { ok: true, payload };
  }

  cleanupExpired(): number {
    const removed = this.cache.cleanupExpired();
    if (removed > 0) {
      this.logger.info({ removed }, 'Cleaned up expired validation cache entries');
    }
    return removed;
  }
}
