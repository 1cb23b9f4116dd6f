import {
  ClientSecretCredential,
  DefaultAzureCredential,
  type TokenCredential,
} from '@azure/identity';
import { ResourceGraphClient } from '@azure/arm-resourcegraph';
import { SubscriptionClient } from '@azure/arm-subscriptions';
import { SecretClient } from '@azure/keyvault-secrets';
import type {
  ResourceQueryRequest,
  ResourceQueryResponse,
  SecretVault,
  SubscriptionInfo,
  TenantClientFactory,
  TenantGateway,
  TenantInfo,
} from '../validation/types.js';

/**
 * Tenant gateway over Azure Resource Manager. Resource Graph is scoped by
 * the credential, which carries the configured tenant.
 */
class AzureTenantGateway implements TenantGateway {
  private graph: ResourceGraphClient;
  private subscriptions: SubscriptionClient;

  constructor(credential: TokenCredential) {
    this.graph = new ResourceGraphClient(credential);
    this.subscriptions = new SubscriptionClient(credential);
  }

  async *listTenants(signal?: AbortSignal): AsyncIterable<TenantInfo> {
    for await (const tenant of this.subscriptions.tenants.list({ abortSignal: signal })) {
      yield { tenantId: tenant.tenantId, displayName: tenant.displayName };
    }
  }

  async *listSubscriptions(signal?: AbortSignal): AsyncIterable<SubscriptionInfo> {
    for await (const sub of this.subscriptions.subscriptions.list({ abortSignal: signal })) {
      yield { subscriptionId: sub.subscriptionId, displayName: sub.displayName, state: sub.state };
    }
  }

  async queryResources(request: ResourceQueryRequest, signal: AbortSignal): Promise<ResourceQueryResponse> {
    const response = await this.graph.resources(
      {
        query: request.query,
        subscriptions: request.subscriptions.length > 0 ? request.subscriptions : undefined,
        options: { resultFormat: request.resultFormat },
      },
      { abortSignal: signal }
    );
    const data: unknown = response.data;
    return { data, totalRecords: response.totalRecords };
  }
}

export const azureClientFactory: TenantClientFactory = {
  managedIdentityCredential: (tenantId) => new DefaultAzureCredential({ tenantId }),
  clientSecretCredential: (tenantId, clientId, clientSecret) =>
    new ClientSecretCredential(tenantId, clientId, clientSecret),
  createGateway: (credential) => new AzureTenantGateway(credential),
};

/**
 * Key Vault access using the ambient identity of the host.
 */
export function createKeyVault(credential: TokenCredential = new DefaultAzureCredential()): SecretVault {
  const clients = new Map<string, SecretClient>();

  return {
    async getSecret(vaultUri, name, signal) {
      let client = clients.get(vaultUri);
      if (!client) {
        client = new SecretClient(vaultUri, credential);
        clients.set(vaultUri, client);
      }
      const secret = await client.getSecret(name, { abortSignal: signal });
      return secret.value;
    },
  };
}
