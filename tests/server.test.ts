import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { mkdtempSync, existsSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { pino } from 'pino';
import { AuthorizationGate } from '../src/auth/gate.js';
import { loadConfig, mergeConfig } from '../src/config/index.js';
import { MemoryService, NamespaceStore, WRITE_DISABLED_MESSAGE } from '../src/memory/index.js';
import type { MemoryPolicy } from '../src/memory/index.js';
import { createServer, validateCorsOrigin } from '../src/proxy/server.js';
import type { CredentialValidator, ValidationResult } from '../src/validation/index.js';

const logger = pino({ level: 'silent' });
const AUTH = { authorization: 'Bearer good-token' };

const acceptGoodToken: CredentialValidator = {
  async validate(credential: string): Promise<ValidationResult> {
    if (credential === 'good-token') {
      return { ok: true, payload: { sub: 'user-1', aud: 'test-client' } };
    }
    return { ok: false, reason: 'InvalidCredential', message: 'Invalid access token' };
  },
};

async function buildApp(memoryDir: string, policy: MemoryPolicy): Promise<FastifyInstance> {
  const config = mergeConfig(loadConfig(join(memoryDir, 'missing.yaml')), {
    memory: { dir: memoryDir },
  });
  const gate = new AuthorizationGate(
    acceptGoodToken,
    {
      protectedPrefixes: config.auth.protected_prefixes,
      discoveryPrefixes: config.auth.discovery_prefixes,
    },
    logger
  );
  const memory = new MemoryService(new NamespaceStore(memoryDir, logger), policy, logger);
  return createServer({ config, gate, memory, logger });
}

describe('validateCorsOrigin', () => {
  it('should accept http(s) origins and the wildcard', () => {
    expect(validateCorsOrigin('https://chat.example.test')).toBe('https://chat.example.test');
    expect(validateCorsOrigin('*')).toBe('*');
  });

  it('should reject empty and non-http origins', () => {
    expect(validateCorsOrigin(undefined)).toBe(false);
    expect(validateCorsOrigin('')).toBe(false);
    expect(validateCorsOrigin('ftp://files.example.test')).toBe(false);
    expect(validateCorsOrigin('not a url')).toBe(false);
  });
});

describe('HTTP server', () => {
  let memoryDir: string;
  let app: FastifyInstance;

  beforeEach(async () => {
    memoryDir = mkdtempSync(join(tmpdir(), 'fitbridge-server-'));
    app = await buildApp(memoryDir, { readOnly: true, writeEnabled: true });
  });

  afterEach(async () => {
    await app.close();
    rmSync(memoryDir, { recursive: true, force: true });
  });

  describe('public endpoints', () => {
    it('should serve service info', async () => {
      const res = await app.inject({ method: 'GET', url: '/' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        name: 'fitbridge MCP server',
        version: '1.0.0',
        transport: 'sse',
        endpoints: { sse: '/sse', messages: '/messages/', tools: '/tools', health: '/health' },
      });
    });

    it('should send security headers', async () => {
      const res = await app.inject({ method: 'GET', url: '/health' });

      expect(res.headers['x-content-type-options']).toBe('nosniff');
    });
  });

  describe('discovery', () => {
    it('should serve authorization server metadata', async () => {
      const res = await app.inject({ method: 'GET', url: '/.well-known/oauth-authorization-server' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        issuer: 'https://accounts.google.com',
        authorization_endpoint: 'https://accounts.google.com/o/oauth2/v2/auth',
        token_endpoint: 'https://oauth2.googleapis.com/token',
        jwks_uri: 'https://www.googleapis.com/oauth2/v3/certs',
        response_types_supported: ['code'],
        grant_types_supported: ['authorization_code', 'refresh_token'],
        token_endpoint_auth_methods_supported: ['client_secret_post', 'client_secret_basic'],
        scopes_supported: ['openid', 'email', 'profile'],
      });
    });

    it('should serve the same metadata as openid-configuration with a suffix', async () => {
      const res = await app.inject({ method: 'GET', url: '/.well-known/openid-configuration/sse' });

      expect(res.statusCode).toBe(200);
      expect(res.json().issuer).toBe('https://accounts.google.com');
    });

    it('should derive the protected resource from the request origin', async () => {
      const res = await app.inject({
        method: 'GET',
        url: '/sse/.well-known/oauth-protected-resource',
        headers: { host: 'mcp.example.test' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        resource: 'http://mcp.example.test/sse',
        authorization_servers: ['https://accounts.google.com'],
        scopes_supported: ['openid', 'email', 'profile'],
      });
    });

    it('should answer 404 for unknown documents', async () => {
      const res = await app.inject({ method: 'GET', url: '/.well-known/security.txt' });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'not_found' });
    });
  });

  describe('tools', () => {
    it('should reject tool calls with an invalid token', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/tools/memory_write',
        headers: { authorization: 'Bearer bad-token' },
        payload: { namespace: 'training', data: { a: 1 } },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json().reason).toBe('InvalidCredential');
      expect(existsSync(join(memoryDir, 'training.json'))).toBe(false);
    });

    it('should list the available tools', async () => {
      const res = await app.inject({ method: 'GET', url: '/tools', headers: AUTH });

      expect(res.statusCode).toBe(200);
      expect(res.json().tools.map((tool: { name: string }) => tool.name)).toEqual([
        'memory_get',
        'memory_write',
      ]);
    });

    it('should write and read back memory entries', async () => {
      const write = await app.inject({
        method: 'POST',
        url: '/tools/memory_write',
        headers: AUTH,
        payload: { namespace: 'training', data: { goal: '10k' } },
      });
      expect(write.statusCode).toBe(200);
      expect(write.json().entries).toHaveLength(1);

      await app.inject({
        method: 'POST',
        url: '/tools/memory_write',
        headers: AUTH,
        payload: { namespace: 'training', data: { goal: 'half marathon' }, mode: 'Append' },
      });

      const read = await app.inject({
        method: 'POST',
        url: '/tools/memory_get',
        headers: AUTH,
        payload: { namespace: 'training', limit: 1 },
      });

      expect(read.statusCode).toBe(200);
      const snapshot = read.json();
      expect(snapshot.entries).toHaveLength(1);
      expect(snapshot.entries[0].data).toEqual({ goal: 'half marathon' });
    });

    it('should treat an unknown mode as append', async () => {
      await app.inject({
        method: 'POST',
        url: '/tools/memory_write',
        headers: AUTH,
        payload: { data: { n: 1 } },
      });
      const res = await app.inject({
        method: 'POST',
        url: '/tools/memory_write',
        headers: AUTH,
        payload: { data: { n: 2 }, mode: 'upsert' },
      });

      expect(res.json().entries.map((entry: { data: unknown }) => entry.data)).toEqual([{ n: 1 }, { n: 2 }]);
      expect(existsSync(join(memoryDir, 'default.json'))).toBe(true);
    });

    it('should read the default namespace without a body', async () => {
      const res = await app.inject({ method: 'POST', url: '/tools/memory_get', headers: AUTH });

      expect(res.statusCode).toBe(200);
      expect(res.json().entries).toEqual([]);
    });

    it('should answer 400 for invalid arguments', async () => {
      const res = await app.inject({
        method: 'POST',
        url: '/tools/memory_get',
        headers: AUTH,
        payload: { limit: 'three' },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toBe('Invalid arguments');
    });
  });

  describe('write policy', () => {
    it('should refuse writes when read-only without the memory override', async () => {
      const locked = await buildApp(memoryDir, { readOnly: true, writeEnabled: false });

      try {
        const res = await locked.inject({
          method: 'POST',
          url: '/tools/memory_write',
          headers: AUTH,
          payload: { namespace: 'training', data: { a: 1 } },
        });

        expect(res.statusCode).toBe(403);
        expect(res.json()).toEqual({ error: 'WriteDisabled', message: WRITE_DISABLED_MESSAGE });
        expect(existsSync(join(memoryDir, 'training.json'))).toBe(false);
      } finally {
        await locked.close();
      }
    });
  });
});
