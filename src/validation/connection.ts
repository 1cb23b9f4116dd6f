import type { Logger } from 'pino';
import type { ValidationSettings } from '../settings/schema.js';
import type { CredentialResolver } from './credentials.js';
import { errorMessage } from './errors.js';
import { CANARY_QUERY, QUERY_TIMEOUT_MS, type QueryEngine } from './query.js';
import { withDeadline } from './timeout.js';
import type { AuthenticatedClient, ConnectionTestResult, SubscriptionAccess } from './types.js';

export const MANAGEMENT_SCOPE = 'https://management.azure.com/.default';

export class ConnectionTester {
  private credentials: CredentialResolver;
  private queryEngine: QueryEngine;
  private logger: Logger;
  private timeoutMs: number;

  constructor(
    credentials: CredentialResolver,
    queryEngine: QueryEngine,
    logger: Logger,
    timeoutMs: number = QUERY_TIMEOUT_MS
  ) {
    this.credentials = credentials;
    this.queryEngine = queryEngine;
    this.logger = logger;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Diagnose authentication, subscription visibility and query access.
   * Always resolves with a populated result.
   */
  async testConnection(settings: ValidationSettings): Promise<ConnectionTestResult> {
    const result: ConnectionTestResult = {
      authenticated: false,
      authMode: settings.authMode,
      tenantId: settings.tenantId,
      accessibleSubscriptions: [],
      queryAccess: false,
      querySucceeded: false,
      message: '',
    };

    if (!settings.enabled) {
      result.message = 'validation is not enabled';
      return result;
    }

    let client: AuthenticatedClient;
    try {
      client = await this.credentials.ensureAuthenticated(settings);
      // Building a credential acquires nothing; only a token proves the identity works
      await this.acquireToken(client);
    } catch (err) {
      this.logger.error({ err, authMode: settings.authMode }, 'Connection test authentication failed');
      result.message = 'Connection test failed';
      result.error = errorMessage(err);
      return result;
    }
    result.authenticated = true;

    result.accessibleSubscriptions = await this.listSubscriptions(client);

    try {
      const response = await this.queryEngine.executeQuery(CANARY_QUERY, settings, client);
      result.queryAccess = true;
      result.querySucceeded = response.data !== undefined && response.data !== null;
    } catch (err) {
      this.logger.warn({ err }, 'Resource Graph test query failed');
      result.error = errorMessage(err);
    }

    result.message = result.querySucceeded
      ? 'Successfully connected to Azure'
      : 'Authenticated but Resource Graph query failed';
    return result;
  }

  private async acquireToken(client: AuthenticatedClient): Promise<void> {
    const token = await withDeadline(
      (signal) => client.credential.getToken(MANAGEMENT_SCOPE, { abortSignal: signal }),
      this.timeoutMs,
      () => new Error(`Token request timed out after ${this.timeoutMs}ms`)
    );
    if (!token) {
      throw new Error(`${client.authMode} credential returned no access token`);
    }
  }

  private async listSubscriptions(client: AuthenticatedClient): Promise<SubscriptionAccess[]> {
    try {
      return await withDeadline(
        async (signal) => {
          const subscriptions: SubscriptionAccess[] = [];
          for await (const sub of client.gateway.listSubscriptions(signal)) {
            subscriptions.push({
              id: sub.subscriptionId ?? '',
              displayName: sub.displayName ?? '',
              state: sub.state ?? null,
              hasReadAccess: true,
            });
          }
          return subscriptions;
        },
        this.timeoutMs,
        () => new Error(`Subscription listing timed out after ${this.timeoutMs}ms`)
      );
    } catch (err) {
      this.logger.warn({ err }, 'Subscription enumeration failed');
      return [];
    }
  }
}
