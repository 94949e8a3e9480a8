import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { AuthorizationGate, decodedPathOf } from '../auth/gate.js';
import type { MemoryService } from '../memory/index.js';
import type { TokenPayload } from '../validation/index.js';

export const SERVICE_NAME = 'fitbridge';
export const SERVICE_VERSION = '1.0.0';

/**
 * Validate CORS origin - must be empty, "*" or a valid http(s) URL
 */
export function validateCorsOrigin(origin: string | undefined): string | false {
  if (!origin) return false;
  if (origin === '*') return origin;

  try {
    const url = new URL(origin);
    // Only allow http/https protocols
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return origin;
  } catch {
    return false;
  }
}

export interface ServerDeps {
  config: Config;
  gate: AuthorizationGate;
  memory: MemoryService;
  logger: Logger;
}

export async function createServer(deps: ServerDeps): Promise<FastifyInstance> {
  const { config, gate, memory, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 1048576, // 1MB max request body
    trustProxy: config.server.trust_proxy,
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  const discoveryPrefixes = config.auth.discovery_prefixes;
  await app.register(rateLimit, {
    max: config.server.rate_limit_max,
    timeWindow: config.server.rate_limit_window_ms,
    allowList: (request) => {
      const path = decodedPathOf(request.url);
      return path === '/health' || discoveryPrefixes.some((prefix) => path.startsWith(prefix));
    },
  });

  const corsOrigin = validateCorsOrigin(config.server.cors_origin);
  if (config.server.cors_origin && !corsOrigin) {
    logger.warn({ corsOrigin: config.server.cors_origin }, 'Ignoring invalid CORS origin');
  }
  if (corsOrigin) {
    await app.register(cors, {
      origin: corsOrigin,
      credentials: corsOrigin !== '*',
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Authorization', 'Content-Type'],
    });
  }

  // Decorate with dependencies
  app.decorate('config', config);
  app.decorate('memory', memory);
  app.decorate('proxyLogger', logger);
  app.decorateRequest('auth', null);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  // Authorization gate - rejects protected paths without a valid bearer credential
  app.addHook('onRequest', async (request, reply) => {
    // Match the route the router resolved, not the still-encoded URL.
    // Unmatched requests have no route path of their own.
    const routeUrl: string | undefined = request.routeOptions.url;
    const decision = await gate.decide({
      method: request.method,
      path: routeUrl?.startsWith('/') ? routeUrl : decodedPathOf(request.url),
      authorization: request.headers.authorization,
    });

    if (decision.action === 'reject') {
      return reply.code(decision.statusCode).send(decision.body);
    }

    request.auth = decision.auth;
    if (decision.auth) {
      // Handlers only ever see the validated payload, never the raw credential
      delete request.headers.authorization;
    }
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Client errors keep their message, everything else stays opaque
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    reply.code(statusCode).send({
      error: statusCode < 500 ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', service: SERVICE_NAME };
  });

  // Server info endpoint
  app.get('/', async () => {
    return {
      name: `${SERVICE_NAME} MCP server`,
      version: SERVICE_VERSION,
      transport: 'sse',
      endpoints: {
        sse: '/sse',
        messages: '/messages/',
        tools: '/tools',
        health: '/health',
      },
    };
  });

  // Register routes
  await app.register(import('./routes/discovery.js'));
  await app.register(import('./routes/tools.js'));

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    memory: MemoryService;
    proxyLogger: Logger;
  }

  interface FastifyRequest {
    auth: TokenPayload | null;
  }
}
