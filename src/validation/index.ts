import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import {
  MASKED_SECRET,
  ValidationSettingsSchema,
  defaultSettings,
  type SettingsStore,
  type ValidationSettings,
} from '../settings/index.js';
import { ValidationCache } from './cache.js';
import { resolveConflict, type ConflictResolution } from './conflict.js';
import { ConnectionTester } from './connection.js';
import { CredentialResolver } from './credentials.js';
import { QueryTimeoutError, SettingsValidationError, errorMessage } from './errors.js';
import { QueryEngine } from './query.js';
import { ENCRYPTED_PREFIX, SecretProvider, encryptSecret } from './secrets.js';
import {
  notPerformed,
  performed,
  type ConnectionTestResult,
  type SecretVault,
  type TenantClientFactory,
  type ValidationRequest,
  type ValidationResult,
} from './types.js';

export * from './types.js';
export * from './errors.js';
export type { ConflictOutcome, ConflictResolution, RejectionReason } from './conflict.js';

export interface TenantValidationDeps {
  config: Config;
  store: SettingsStore;
  clientFactory: TenantClientFactory;
  vault: SecretVault;
  logger: Logger;
  /** Overrides the fixed query budget; tests only */
  queryTimeoutMs?: number;
}

export interface NameResolution {
  validation: ValidationResult;
  resolution: ConflictResolution;
}

/**
 * Answers whether a resource name already exists in the configured tenant.
 *
 * Name validation never throws: failures degrade to an unperformed result
 * with a warning. Settings updates and connection tests are operator
 * actions and report their failures directly.
 */
export class TenantValidationService {
  private config: Config;
  private store: SettingsStore;
  private logger: Logger;
  private cache: ValidationCache;
  private credentials: CredentialResolver;
  private queryEngine: QueryEngine;
  private tester: ConnectionTester;

  constructor(deps: TenantValidationDeps) {
    this.config = deps.config;
    this.store = deps.store;
    this.logger = deps.logger;
    this.cache = new ValidationCache(deps.config.validation.cache_max_entries);

    const secrets = new SecretProvider({
      vault: deps.vault,
      encryptionKey: deps.config.secrets.encryption_key,
      logger: deps.logger,
    });
    this.credentials = new CredentialResolver(deps.clientFactory, secrets, deps.logger);
    this.queryEngine = new QueryEngine(deps.logger, deps.queryTimeoutMs);
    this.tester = new ConnectionTester(this.credentials, this.queryEngine, deps.logger, deps.queryTimeoutMs);
  }

  async getSettings(): Promise<ValidationSettings> {
    try {
      const stored = await this.store.load();
      if (stored) {
        return stored;
      }
    } catch (err) {
      this.logger.error({ err }, 'Error loading validation settings');
    }
    return defaultSettings();
  }

  /**
   * Validate and persist new settings, then drop the authenticated client
   * and every cached result. Throws SettingsValidationError on bad input.
   */
  async updateSettings(input: unknown): Promise<ValidationSettings> {
    const parsed = ValidationSettingsSchema.safeParse(input);
    if (!parsed.success) {
      throw new SettingsValidationError(
        parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        }))
      );
    }

    const settings = await this.prepareForStorage(parsed.data);
    const sp = settings.servicePrincipal;
    if (settings.authMode === 'ServicePrincipal' && !settings.secretStore && !sp?.clientSecret) {
      // A masked secret with nothing stored behind it
      throw new SettingsValidationError([
        {
          path: 'servicePrincipal.clientSecret',
          message: 'a client secret or a secret store entry is required',
        },
      ]);
    }

    await this.store.save(settings);

    // Synchronous from here on: no validation can interleave between the two
    this.credentials.invalidate();
    const removed = this.cache.invalidateAll();

    this.logger.info({ removed }, 'Validation settings updated');
    return settings;
  }

  async isValidationEnabled(): Promise<boolean> {
    if (!this.config.validation.enabled) {
      return false;
    }
    const settings = await this.getSettings();
    return settings.enabled;
  }

  async validateName(resourceName: string, resourceType: string): Promise<ValidationResult> {
    if (!this.config.validation.enabled) {
      return notPerformed();
    }

    // Taken before reading settings: an update landing in between must not
    // let a result computed under the old settings into the cache
    const generation = this.cache.generation;
    const settings = await this.getSettings();
    if (!settings.enabled) {
      return notPerformed();
    }

    return this.validateWithSettings(resourceName, resourceType, settings, generation);
  }

  /**
   * Validate several names with one authentication. Cached names are
   * answered first; the rest are queried one after another.
   */
  async validateBatch(requests: ValidationRequest[]): Promise<Map<string, ValidationResult>> {
    const results = new Map<string, ValidationResult>();

    const generation = this.cache.generation;
    const settings = this.config.validation.enabled ? await this.getSettings() : null;
    if (!settings?.enabled) {
      for (const request of requests) {
        results.set(request.resourceName, notPerformed());
      }
      return results;
    }

    const misses: ValidationRequest[] = [];
    for (const request of requests) {
      const cached = settings.cache.enabled
        ? this.cache.get(request.resourceType, request.resourceName)
        : undefined;
      if (cached) {
        results.set(request.resourceName, cached);
      } else {
        misses.push(request);
      }
    }

    if (misses.length === 0) {
      return results;
    }

    try {
      await this.credentials.ensureAuthenticated(settings);

      for (const request of misses) {
        results.set(
          request.resourceName,
          await this.validateWithSettings(request.resourceName, request.resourceType, settings, generation)
        );
      }
    } catch (err) {
      this.logger.error({ err, pending: misses.length }, 'Error in batch validation');
      for (const request of misses) {
        if (!results.has(request.resourceName)) {
          results.set(request.resourceName, notPerformed(`Batch validation error: ${errorMessage(err)}`));
        }
      }
    }

    this.logger.debug(
      { total: requests.length, queried: misses.length },
      'Batch validation completed'
    );
    return results;
  }

  /**
   * Validate a name and apply the configured conflict strategy.
   */
  async resolveName(resourceName: string, resourceType: string): Promise<NameResolution> {
    const validation = await this.validateName(resourceName, resourceType);
    const settings = await this.getSettings();

    const resolution = await resolveConflict(resourceName, validation, settings.conflictStrategy, {
      validate: (candidate) => this.validateName(candidate, resourceType),
      maxAttempts: this.config.conflict.max_increment_attempts,
      suffixLength: this.config.conflict.random_suffix_length,
    });

    if (resolution.outcome !== 'Accepted') {
      this.logger.info(
        {
          resourceName,
          resourceType,
          strategy: settings.conflictStrategy,
          outcome: resolution.outcome,
          finalName: resolution.finalName,
          reason: resolution.reason,
        },
        'Name conflict handled'
      );
    }

    return { validation, resolution };
  }

  async testConnection(): Promise<ConnectionTestResult> {
    const settings = await this.getSettings();
    return this.tester.testConnection(settings);
  }

  cleanupExpired(): number {
    const removed = this.cache.cleanupExpired();
    if (removed > 0) {
      this.logger.info({ removed }, 'Cleaned up expired validation cache entries');
    }
    return removed;
  }

  private async validateWithSettings(
    resourceName: string,
    resourceType: string,
    settings: ValidationSettings,
    generation: number
  ): Promise<ValidationResult> {
    const excluded = settings.excludedResourceTypes.some(
      (type) => type.toLowerCase() === resourceType.toLowerCase()
    );
    if (excluded) {
      return notPerformed(`Resource type ${resourceType} is excluded from tenant validation`);
    }

    if (settings.cache.enabled) {
      const cached = this.cache.get(resourceType, resourceName);
      if (cached) {
        this.logger.debug({ resourceName, resourceType }, 'Validation cache hit');
        return cached;
      }
    }

    try {
      const client = await this.credentials.ensureAuthenticated(settings);
      const ids = await this.queryEngine.findResourceIds(resourceName, resourceType, settings, client);
      const result = performed(ids);

      if (settings.cache.enabled) {
        this.cache.set(resourceType, resourceName, result, settings.cache.durationMinutes, generation);
      }

      this.logger.info(
        { resourceName, resourceType, exists: result.existsInAzure },
        'Tenant validation completed'
      );
      return result;
    } catch (err) {
      this.logger.error({ err, resourceName, resourceType }, 'Error validating resource name against tenant');
      const warning =
        err instanceof QueryTimeoutError
          ? `Validation timed out: ${err.message}`
          : `Validation error: ${errorMessage(err)}`;
      return notPerformed(warning);
    }
  }

  /**
   * Keep a masked secret's stored value and encrypt plain secrets at rest
   * when an encryption key is configured.
   */
  private async prepareForStorage(settings: ValidationSettings): Promise<ValidationSettings> {
    const sp = settings.servicePrincipal;
    if (!sp?.clientSecret) {
      return settings;
    }

    let clientSecret: string | undefined = sp.clientSecret;
    if (clientSecret === MASKED_SECRET) {
      const current = await this.getSettings();
      clientSecret = current.servicePrincipal?.clientSecret;
    }

    const key = this.config.secrets.encryption_key;
    if (clientSecret && key && !clientSecret.startsWith(ENCRYPTED_PREFIX)) {
      clientSecret = encryptSecret(clientSecret, key);
    }

    return { ...settings, servicePrincipal: { ...sp, clientSecret } };
  }
}
