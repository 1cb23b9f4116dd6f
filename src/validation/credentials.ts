import { createHash } from 'crypto';
import type { TokenCredential } from '@azure/identity';
import type { Logger } from 'pino';
import type { ValidationSettings } from '../settings/schema.js';
import { AuthenticationError, TenantValidationError, errorMessage } from './errors.js';
import type { SecretProvider } from './secrets.js';
import type { AuthenticatedClient, TenantClientFactory } from './types.js';

/**
 * Hash of the settings that shape the credential. The secret itself is not
 * part of the key; a change of secret source or vault entry is.
 */
export function credentialKey(settings: ValidationSettings): string {
  const material = JSON.stringify({
    authMode: settings.authMode,
    tenantId: settings.tenantId ?? null,
    clientId: settings.servicePrincipal?.clientId ?? null,
    clientSecret: settings.servicePrincipal?.clientSecret ?? null,
    vaultEntry: settings.servicePrincipal?.clientSecretVaultEntryName ?? null,
    secretStore: settings.secretStore ?? null,
  });
  return createHash('sha256').update(material).digest('hex');
}

interface PendingAuthentication {
  key: string;
  promise: Promise<AuthenticatedClient>;
}

/**
 * Holds at most one authenticated client per process. Concurrent callers
 * with the same settings share one in-flight authentication; the live
 * client is replaced, never mutated.
 */
export class CredentialResolver {
  private factory: TenantClientFactory;
  private secrets: SecretProvider;
  private logger: Logger;
  private client: AuthenticatedClient | null = null;
  private pending: PendingAuthentication | null = null;

  constructor(factory: TenantClientFactory, secrets: SecretProvider, logger: Logger) {
    this.factory = factory;
    this.secrets = secrets;
    this.logger = logger;
  }

  isAuthenticated(): boolean {
    return this.client !== null;
  }

  async ensureAuthenticated(settings: ValidationSettings): Promise<AuthenticatedClient> {
    const key = credentialKey(settings);

    if (this.client !== null && this.client.key === key) {
      return this.client;
    }
    if (this.pending !== null && this.pending.key === key) {
      return this.pending.promise;
    }

    const pending: PendingAuthentication = { key, promise: this.authenticate(settings, key) };
    this.pending = pending;

    try {
      const client = await pending.promise;
      // A newer authentication or an invalidate() may have superseded this one
      if (this.pending === pending) {
        this.client = client;
      }
      return client;
    } finally {
      if (this.pending === pending) {
        this.pending = null;
      }
    }
  }

  /** Drop the live client so the next call authenticates again. */
  invalidate(): void {
    this.client = null;
    this.pending = null;
  }

  private async authenticate(settings: ValidationSettings, key: string): Promise<AuthenticatedClient> {
    const mode = settings.authMode;

    try {
      const credential = await this.createCredential(settings);
      const gateway = this.factory.createGateway(credential);
      this.logger.info({ authMode: mode }, 'Tenant client authenticated');
      return { key, authMode: mode, credential, gateway };
    } catch (err) {
      this.logger.error({ err, authMode: mode }, 'Failed to authenticate to tenant');
      if (err instanceof AuthenticationError) {
        throw err;
      }
      const reason = err instanceof TenantValidationError ? err.message : errorMessage(err);
      throw new AuthenticationError(mode, reason, { cause: err });
    }
  }

  private async createCredential(settings: ValidationSettings): Promise<TokenCredential> {
    switch (settings.authMode) {
      case 'ManagedIdentity':
        return this.factory.managedIdentityCredential(settings.tenantId);

      case 'ServicePrincipal': {
        const sp = settings.servicePrincipal;
        if (!sp) {
          throw new AuthenticationError(settings.authMode, 'service principal settings are required');
        }
        if (!settings.tenantId) {
          throw new AuthenticationError(settings.authMode, 'tenantId is required');
        }
        const secret = await this.secrets.resolveClientSecret(settings);
        return this.factory.clientSecretCredential(settings.tenantId, sp.clientId, secret);
      }

      default: {
        const mode: string = settings.authMode;
        throw new AuthenticationError(mode, 'unsupported authentication mode');
      }
    }
  }
}
