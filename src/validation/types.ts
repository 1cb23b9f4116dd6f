import type { TokenCredential } from '@azure/identity';
import type { AuthMode } from '../settings/schema.js';

export interface ValidationRequest {
  readonly resourceName: string;
  readonly resourceType: string;
}

export interface ValidationResult {
  readonly validationPerformed: boolean;
  readonly existsInAzure: boolean;
  readonly conflictingResourceIds: readonly string[];
  readonly warning?: string;
  readonly timestamp: string;
}

export interface SubscriptionAccess {
  id: string;
  displayName: string;
  state: string | null;
  hasReadAccess: boolean;
}

export interface ConnectionTestResult {
  authenticated: boolean;
  authMode: string;
  tenantId?: string;
  accessibleSubscriptions: SubscriptionAccess[];
  queryAccess: boolean;
  querySucceeded: boolean;
  message: string;
  error?: string;
}

export interface TenantInfo {
  tenantId?: string;
  displayName?: string;
}

export interface SubscriptionInfo {
  subscriptionId?: string;
  displayName?: string;
  state?: string;
}

export interface ResourceQueryRequest {
  query: string;
  /** Empty means every subscription visible to the credential */
  subscriptions: string[];
  resultFormat: 'objectArray' | 'table';
}

export interface ResourceQueryResponse {
  data: unknown;
  totalRecords?: number;
}

/**
 * Outbound surface of the tenant used by the query engine and the
 * connection tester. Every call takes an abort signal.
 */
export interface TenantGateway {
  listTenants(signal?: AbortSignal): AsyncIterable<TenantInfo>;
  listSubscriptions(signal?: AbortSignal): AsyncIterable<SubscriptionInfo>;
  queryResources(request: ResourceQueryRequest, signal: AbortSignal): Promise<ResourceQueryResponse>;
}

export interface TenantClientFactory {
  /** Ambient identity, scoped to `tenantId` when one is configured */
  managedIdentityCredential(tenantId?: string): TokenCredential;
  clientSecretCredential(tenantId: string, clientId: string, clientSecret: string): TokenCredential;
  createGateway(credential: TokenCredential): TenantGateway;
}

export interface SecretVault {
  getSecret(vaultUri: string, name: string, signal: AbortSignal): Promise<string | undefined>;
}

export interface AuthenticatedClient {
  /** Hash of the settings the client was built from */
  readonly key: string;
  readonly authMode: AuthMode;
  readonly credential: TokenCredential;
  readonly gateway: TenantGateway;
}

export function notPerformed(warning?: string): ValidationResult {
  return Object.freeze({
    validationPerformed: false,
    existsInAzure: false,
    conflictingResourceIds: Object.freeze([]),
    ...(warning !== undefined ? { warning } : {}),
    timestamp: new Date().toISOString(),
  });
}

export function performed(resourceIds: string[]): ValidationResult {
  return Object.freeze({
    validationPerformed: true,
    existsInAzure: resourceIds.length > 0,
    conflictingResourceIds: Object.freeze([...resourceIds]),
    timestamp: new Date().toISOString(),
  });
}
