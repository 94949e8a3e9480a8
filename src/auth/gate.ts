import type { Logger } from 'pino';
import type {
  CredentialValidator,
  TokenPayload,
  ValidationFailureReason,
} from '../validation/index.js';

export interface GateOptions {
  protectedPrefixes: readonly string[];
  discoveryPrefixes: readonly string[];
}

export interface GateRequest {
  method: string;
  path: string;
  authorization?: string;
}

export interface UnauthorizedBody {
  error: 'unauthorized';
  reason: ValidationFailureReason;
  message: string;
}

export type GateDecision =
  | { action: 'forward'; auth: TokenPayload | null }
  | { action: 'reject'; statusCode: 401; body: UnauthorizedBody };

/**
 * Returns the token from "Bearer <token>", or an empty string for anything else
 */
export function extractBearerToken(header: string | undefined): string {
  if (!header) {
    return '';
  }
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return '';
  }
  return parts[1];
}

/**
 * Strip the query string from a request URL
 */
export function pathOf(url: string): string {
  const index = url.indexOf('?');
  return index === -1 ? url : url.slice(0, index);
}

/**
 * Percent-decoded path of a request URL, the way the router sees it.
 * A malformed escape leaves the path as it came in.
 */
export function decodedPathOf(url: string): string {
  const path = pathOf(url);
  try {
    return decodeURIComponent(path);
  } catch {
    return path;
  }
}

export class AuthorizationGate {
  private validator: CredentialValidator;
  private options: GateOptions;
  private logger: Logger;

  constructor(validator: CredentialValidator, options: GateOptions, logger: Logger) {
    this.validator = validator;
    this.options = options;
    this.logger = logger;
  }

  requiresAuthorization(method: string, path: string): boolean {
    // Preflight and discovery metadata stay public
    if (method.toUpperCase() === 'OPTIONS') {
      return false;
    }
    if (this.options.discoveryPrefixes.some((prefix) => path.startsWith(prefix))) {
      return false;
    }
    return this.options.protectedPrefixes.some((prefix) => path.startsWith(prefix));
  }

  async decide(request: GateRequest): Promise<GateDecision> {
    if (!this.requiresAuthorization(request.method, request.path)) {
      return { action: 'forward', auth: null };
    }

    const token = extractBearerToken(request.authorization);
    const result = await this.validator.validate(token);

    if (!result.ok) {
      this.logger.warn(
        { method: request.method, path: request.path, reason: result.reason },
        'Rejected unauthorized request'
      );
      return {
        action: 'reject',
        statusCode: 401,
        body: { error: 'unauthorized', reason: result.reason, message: result.message },
      };
    }

    return { action: 'forward', auth: result.payload };
  }
}
