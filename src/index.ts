import { pino } from 'pino';
import { loadConfig, loadConfigFromEnv, mergeConfig } from './config/index.js';
import { TokenValidator } from './validation/index.js';
import { AuthorizationGate } from './auth/gate.js';
import { MemoryService, NamespaceStore } from './memory/index.js';
import { createServer } from './proxy/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/fitbridge.yaml';

async function main() {
  // Load configuration from file, then override with environment variables
  const config = mergeConfig(loadConfig(CONFIG_PATH), loadConfigFromEnv());

  // Initialize logger
  const usePrettyLogs = config.logging.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  logger.info({ configPath: CONFIG_PATH }, 'Configuration loaded');

  // Throws ConfigurationError when no client id is configured
  const validator = new TokenValidator(
    {
      clientId: config.auth.oauth_client_id,
      introspectionUrl: config.auth.introspection_url,
      cacheTtlSeconds: config.auth.cache_ttl_seconds,
      validationTimeoutMs: config.auth.validation_timeout_ms,
    },
    logger
  );

  const gate = new AuthorizationGate(
    validator,
    {
      protectedPrefixes: config.auth.protected_prefixes,
      discoveryPrefixes: config.auth.discovery_prefixes,
    },
    logger
  );
  logger.info({ protectedPrefixes: config.auth.protected_prefixes }, 'Authorization gate enabled');

  const store = new NamespaceStore(config.memory.dir, logger);
  const memory = new MemoryService(
    store,
    { readOnly: config.memory.read_only, writeEnabled: config.memory.write_enabled },
    logger
  );
  logger.info(
    {
      memoryDir: config.memory.dir,
      readOnly: config.memory.read_only,
      writeEnabled: config.memory.write_enabled,
    },
    'Memory store initialized'
  );

  const server = await createServer({ config, gate, memory, logger });

  // Sweep expired validation cache entries (unref to not block process exit)
  const cleanupTimer = setInterval(() => {
    validator.cleanupExpired();
  }, config.auth.cache_cleanup_interval_ms);
  cleanupTimer.unref();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down...');
    clearInterval(cleanupTimer);

    await server.close();
    logger.info('HTTP server closed');

    process.exit(0);
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });

  // Start server
  const { host, port } = config.server;
  await server.listen({ port, host });

  logger.info({ host, port }, 'Server started');
  logger.info(`  - SSE:      http://${host}:${port}/sse`);
  logger.info(`  - Messages: http://${host}:${port}/messages/`);
  logger.info(`  - Tools:    http://${host}:${port}/tools`);
  logger.info(`  - Health:   http://${host}:${port}/health`);
}

// Handle uncaught errors
process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  console.error('Unhandled rejection at:', promise, 'reason:', reason);
});

main().catch((err) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
