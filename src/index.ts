import { applyEnvOverrides, loadConfig } from './config/index.js';
import { closeDatabase, initializeDatabase } from './db/index.js';
import { createLogger } from './logger.js';
import { createSettingsStore } from './settings/index.js';
import { azureClientFactory, createKeyVault } from './azure/index.js';
import { TenantValidationService } from './validation/index.js';
import { createApiServer } from './api/server.js';

const CONFIG_PATH = process.env.CONFIG_PATH || './config/validator.yaml';

async function main() {
  const config = applyEnvOverrides(loadConfig(CONFIG_PATH));
  const logger = createLogger(config.logging);
  logger.info({ configPath: CONFIG_PATH, dbPath: config.storage.path }, 'Starting tenant name validator');

  initializeDatabase(config.storage.path);

  const validator = new TenantValidationService({
    config,
    store: createSettingsStore(),
    clientFactory: azureClientFactory,
    vault: createKeyVault(),
    logger,
  });

  if (!config.validation.enabled) {
    logger.warn('Tenant name validation is globally disabled (TENANT_VALIDATION_ENABLED)');
  }
  if (!config.secrets.encryption_key) {
    logger.warn('No secrets encryption key configured; client secrets are stored as provided');
  }

  const server = await createApiServer({ config, validator, logger });

  const cleanupTimer = setInterval(() => {
    validator.cleanupExpired();
  }, config.validation.cleanup_interval_ms);
  cleanupTimer.unref();

  let stopping = false;
  const stop = async (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Stopping');

    clearInterval(cleanupTimer);
    await server.close();
    closeDatabase();

    logger.info('Stopped');
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      stop(signal).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    });
  }

  const { listen_port: port, host } = config.server;
  await server.listen({ port, host });
  logger.info({ port, host, validationEnabled: config.validation.enabled }, 'Listening');
}

process.on('uncaughtException', (err) => {
  console.error('Uncaught exception:', err);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
});

main().catch((err: unknown) => {
  console.error('Failed to start:', err);
  process.exit(1);
});
