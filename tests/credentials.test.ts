import { describe, it, expect, beforeEach } from 'vitest';
import { CredentialResolver, credentialKey } from '../src/validation/credentials.js';
import { SecretProvider } from '../src/validation/secrets.js';
import { AuthenticationError } from '../src/validation/errors.js';
import {
  FakeClientFactory,
  FakeVault,
  TEST_TENANT_ID,
  silentLogger,
  testSettings,
} from './helpers/fakes.js';

describe('CredentialResolver', () => {
  let factory: FakeClientFactory;
  let vault: FakeVault;
  let resolver: CredentialResolver;

  beforeEach(() => {
    factory = new FakeClientFactory();
    vault = new FakeVault();
    resolver = new CredentialResolver(
      factory,
      new SecretProvider({ vault, logger: silentLogger }),
      silentLogger
    );
  });

  it('should start unauthenticated', () => {
    expect(resolver.isAuthenticated()).toBe(false);
  });

  it('should use the ambient identity for ManagedIdentity', async () => {
    const client = await resolver.ensureAuthenticated(testSettings());

    expect(client.authMode).toBe('ManagedIdentity');
    expect(client.gateway).toBe(factory.tenant);
    expect(factory.managedIdentityCalls).toBe(1);
    expect(resolver.isAuthenticated()).toBe(true);
  });

  it('should scope the ambient identity to the configured tenant', async () => {
    await resolver.ensureAuthenticated(testSettings());

    expect(factory.managedIdentityTenants).toEqual([TEST_TENANT_ID]);
  });

  it('should leave the ambient identity unscoped without a tenant', async () => {
    await resolver.ensureAuthenticated({ ...testSettings(), tenantId: undefined });

    expect(factory.managedIdentityTenants).toEqual([undefined]);
  });

  it('should return the live client unchanged on repeated calls', async () => {
    const settings = testSettings();
    const first = await resolver.ensureAuthenticated(settings);
    const second = await resolver.ensureAuthenticated(settings);

    expect(second).toBe(first);
    expect(factory.authentications).toBe(1);
  });

  it('should share one in-flight authentication between concurrent callers', async () => {
    const settings = testSettings();
    const [a, b, c] = await Promise.all([
      resolver.ensureAuthenticated(settings),
      resolver.ensureAuthenticated(settings),
      resolver.ensureAuthenticated(settings),
    ]);

    expect(a).toBe(b);
    expect(b).toBe(c);
    expect(factory.authentications).toBe(1);
  });

  it('should build a client secret credential for ServicePrincipal', async () => {
    const settings = testSettings({
      authMode: 'ServicePrincipal',
      servicePrincipal: { clientId: 'test-client', clientSecret: 'test-secret' },
    });

    const client = await resolver.ensureAuthenticated(settings);

    expect(client.authMode).toBe('ServicePrincipal');
    expect(factory.clientSecretCalls).toEqual([
      { tenantId: TEST_TENANT_ID, clientId: 'test-client', clientSecret: 'test-secret' },
    ]);
  });

  it('should rebuild the client when settings change', async () => {
    await resolver.ensureAuthenticated(testSettings());
    await resolver.ensureAuthenticated(testSettings({ tenantId: 'another-tenant' }));

    expect(factory.managedIdentityCalls).toBe(2);
  });

  it('should re-authenticate after invalidate', async () => {
    const settings = testSettings();
    await resolver.ensureAuthenticated(settings);

    resolver.invalidate();
    expect(resolver.isAuthenticated()).toBe(false);

    await resolver.ensureAuthenticated(settings);
    expect(factory.managedIdentityCalls).toBe(2);
  });

  it('should wrap a missing secret in an AuthenticationError naming the mode', async () => {
    const settings = testSettings({
      authMode: 'ServicePrincipal',
      servicePrincipal: { clientId: 'test-client', clientSecret: 'placeholder' },
    });
    const withoutSecret = {
      ...settings,
      servicePrincipal: { clientId: 'test-client' },
    };

    const error = await resolver.ensureAuthenticated(withoutSecret).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({ mode: 'ServicePrincipal' });
    expect(String(error)).toContain('ServicePrincipal authentication failed');
    expect(resolver.isAuthenticated()).toBe(false);
  });

  it('should require a tenant id for ServicePrincipal', async () => {
    const settings = testSettings({
      authMode: 'ServicePrincipal',
      servicePrincipal: { clientId: 'test-client', clientSecret: 'test-secret' },
    });

    await expect(
      resolver.ensureAuthenticated({ ...settings, tenantId: undefined })
    ).rejects.toThrow('ServicePrincipal authentication failed: tenantId is required');
  });

  it('should never include the secret in the error message', async () => {
    factory.failWith = new Error('AADSTS7000215: invalid client secret');
    const settings = testSettings({
      authMode: 'ServicePrincipal',
      servicePrincipal: { clientId: 'test-client', clientSecret: 'test-secret-value' },
    });

    const error = await resolver.ensureAuthenticated(settings).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(String(error)).not.toContain('test-secret-value');
  });

  it('should allow a retry after a failed authentication', async () => {
    factory.failWith = new Error('identity endpoint unavailable');
    const settings = testSettings();

    await expect(resolver.ensureAuthenticated(settings)).rejects.toBeInstanceOf(AuthenticationError);

    factory.failWith = null;
    await expect(resolver.ensureAuthenticated(settings)).resolves.toMatchObject({
      authMode: 'ManagedIdentity',
    });
  });
});

describe('credentialKey', () => {
  it('should be stable for equal settings', () => {
    expect(credentialKey(testSettings())).toBe(credentialKey(testSettings()));
  });

  it('should ignore settings unrelated to authentication', () => {
    expect(credentialKey(testSettings({ cache: { enabled: false, durationMinutes: 5 } }))).toBe(
      credentialKey(testSettings())
    );
  });

  it('should change with the auth mode', () => {
    const sp = testSettings({
      authMode: 'ServicePrincipal',
      servicePrincipal: { clientId: 'test-client', clientSecret: 'test-secret' },
    });
    expect(credentialKey(sp)).not.toBe(credentialKey(testSettings()));
  });
});
