import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'crypto';
import type { Logger } from 'pino';
import type { ValidationSettings } from '../settings/schema.js';
import { SecretNotFoundError, SecretResolutionError, errorMessage } from './errors.js';
import { withDeadline } from './timeout.js';
import type { SecretVault } from './types.js';

export const ENCRYPTED_PREFIX = 'encrypted:';

const CIPHER = 'aes-256-gcm';
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

export const VAULT_TIMEOUT_MS = 10_000;

function deriveKey(encryptionKey: string): Buffer {
  return createHash('sha256').update(encryptionKey).digest();
}

/**
 * Encrypt a secret into the `encrypted:` form understood by the resolver.
 * Payload is base64(iv || auth tag || ciphertext).
 */
export function encryptSecret(plain: string, encryptionKey: string): string {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(CIPHER, deriveKey(encryptionKey), iv);
  const encrypted = Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]);
  const payload = Buffer.concat([iv, cipher.getAuthTag(), encrypted]);
  return `${ENCRYPTED_PREFIX}${payload.toString('base64')}`;
}

export function decryptSecret(payload: string, encryptionKey: string): string {
  const raw = Buffer.from(payload, 'base64');
  if (raw.length <= IV_LENGTH + TAG_LENGTH) {
    throw new Error('Encrypted payload is too short');
  }
  const decipher = createDecipheriv(CIPHER, deriveKey(encryptionKey), raw.subarray(0, IV_LENGTH));
  decipher.setAuthTag(raw.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH));
  const plain = Buffer.concat([decipher.update(raw.subarray(IV_LENGTH + TAG_LENGTH)), decipher.final()]);
  return plain.toString('utf8');
}

export interface SecretProviderOptions {
  vault: SecretVault;
  encryptionKey?: string;
  logger: Logger;
  /** Budget for one vault fetch */
  timeoutMs?: number;
}

/**
 * Resolves the service principal client secret: vault entry first, then an
 * encrypted local value, then a plain local value. A configured vault that
 * fails is fatal; the local fallbacks only apply when no vault is set.
 */
export class SecretProvider {
  private vault: SecretVault;
  private encryptionKey?: string;
  private logger: Logger;
  private timeoutMs: number;

  constructor(options: SecretProviderOptions) {
    this.vault = options.vault;
    this.encryptionKey = options.encryptionKey;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? VAULT_TIMEOUT_MS;
  }

  async resolveClientSecret(settings: ValidationSettings): Promise<string> {
    const sp = settings.servicePrincipal;

    if (settings.secretStore) {
      const entryName = sp?.clientSecretVaultEntryName ?? settings.secretStore.defaultEntryName;
      this.logger.info({ source: 'vault', entryName }, 'Resolving client secret');

      let value: string | undefined;
      try {
        const { vaultUri } = settings.secretStore;
        value = await withDeadline(
          (signal) => this.vault.getSecret(vaultUri, entryName, signal),
          this.timeoutMs,
          () => new Error(`Vault request timed out after ${this.timeoutMs}ms`)
        );
      } catch (err) {
        this.logger.error({ err, entryName }, 'Failed to retrieve client secret from vault');
        throw new SecretResolutionError(
          `Failed to retrieve client secret '${entryName}' from vault: ${errorMessage(err)}`,
          { cause: err }
        );
      }

      if (!value) {
        throw new SecretResolutionError(`Vault entry '${entryName}' has no value`);
      }
      return value;
    }

    const local = sp?.clientSecret;
    if (local?.startsWith(ENCRYPTED_PREFIX)) {
      this.logger.info({ source: 'decrypted' }, 'Resolving client secret');
      if (!this.encryptionKey) {
        throw new SecretResolutionError('Client secret is encrypted but no encryption key is configured');
      }
      try {
        return decryptSecret(local.slice(ENCRYPTED_PREFIX.length), this.encryptionKey);
      } catch (err) {
        this.logger.error({ err }, 'Failed to decrypt client secret');
        throw new SecretResolutionError('Failed to decrypt client secret', { cause: err });
      }
    }

    if (local) {
      this.logger.info({ source: 'plain' }, 'Resolving client secret');
      return local;
    }

    this.logger.warn({ source: 'none' }, 'No client secret configured');
    throw new SecretNotFoundError();
  }
}
