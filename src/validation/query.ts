import { z } from 'zod';
import type { Logger } from 'pino';
import type { ValidationSettings } from '../settings/schema.js';
import { QueryExecutionError, QueryTimeoutError, TenantValidationError, errorMessage } from './errors.js';
import { withDeadline } from './timeout.js';
import type { AuthenticatedClient, ResourceQueryResponse } from './types.js';

export const QUERY_TIMEOUT_MS = 5000;

export const CANARY_QUERY = "Resources | where type =~ 'microsoft.resources/subscriptions' | limit 1";

/**
 * Escape a value for use inside a single-quoted KQL string literal.
 */
export function escapeKqlString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function buildResourceQuery(resourceName: string, resourceType: string): string {
  return (
    `Resources | where name =~ '${escapeKqlString(resourceName)}'` +
    ` | where type =~ '${escapeKqlString(resourceType)}'` +
    ' | project id, name, type, resourceGroup'
  );
}

// Rows carry arbitrary projected columns; only a non-empty string id matters
const ResourceRowSchema = z.object({ id: z.string().min(1) }).passthrough();

const TableResultSchema = z.object({
  columns: z.array(z.object({ name: z.string() }).passthrough()),
  rows: z.array(z.array(z.unknown())),
});

/**
 * Extract resource ids from an objectArray or table result. Rows without
 * an id are skipped.
 */
export function parseResourceIds(data: unknown): string[] {
  let rows: unknown[];

  if (Array.isArray(data)) {
    rows = data;
  } else {
    const table = TableResultSchema.safeParse(data);
    if (!table.success) {
      throw new QueryExecutionError('Unexpected Resource Graph response shape');
    }
    const names = table.data.columns.map((c) => c.name);
    rows = table.data.rows.map((row) => Object.fromEntries(names.map((n, i) => [n, row[i]])));
  }

  const ids: string[] = [];
  for (const row of rows) {
    const parsed = ResourceRowSchema.safeParse(row);
    if (parsed.success) {
      ids.push(parsed.data.id);
    }
  }
  return ids;
}

export class QueryEngine {
  private logger: Logger;
  private timeoutMs: number;

  constructor(logger: Logger, timeoutMs: number = QUERY_TIMEOUT_MS) {
    this.logger = logger;
    this.timeoutMs = timeoutMs;
  }

  async findResourceIds(
    resourceName: string,
    resourceType: string,
    settings: ValidationSettings,
    client: AuthenticatedClient
  ): Promise<string[]> {
    const query = buildResourceQuery(resourceName, resourceType);
    const response = await this.executeQuery(query, settings, client);
    const ids = parseResourceIds(response.data);
    this.logger.debug({ resourceName, resourceType, matches: ids.length }, 'Resource Graph query completed');
    return ids;
  }

  /**
   * The configured tenant when set, else the first one the credential can
   * list. Either way the tenant must be visible to the credential.
   */
  async resolveTenant(
    settings: ValidationSettings,
    client: AuthenticatedClient,
    signal?: AbortSignal
  ): Promise<string> {
    const wanted = settings.tenantId;

    for await (const tenant of client.gateway.listTenants(signal)) {
      if (!tenant.tenantId) continue;
      if (!wanted || tenant.tenantId.toLowerCase() === wanted.toLowerCase()) {
        return tenant.tenantId;
      }
    }

    throw new QueryExecutionError(
      wanted ? `Could not access tenant ${wanted}` : 'Could not determine tenant ID'
    );
  }

  /**
   * Tenant resolution and the query share one budget; on expiry both are
   * aborted.
   */
  async executeQuery(
    query: string,
    settings: ValidationSettings,
    client: AuthenticatedClient
  ): Promise<ResourceQueryResponse> {
    try {
      return await withDeadline(
        async (signal) => {
          await this.resolveTenant(settings, client, signal);
          return client.gateway.queryResources(
            {
              query,
              subscriptions: [...settings.subscriptionIds],
              resultFormat: 'objectArray',
            },
            signal
          );
        },
        this.timeoutMs,
        () => new QueryTimeoutError(this.timeoutMs)
      );
    } catch (err) {
      if (err instanceof QueryTimeoutError) {
        this.logger.warn({ timeoutMs: this.timeoutMs }, 'Resource Graph query timed out');
        throw err;
      }
      this.logger.error({ err }, 'Error executing Resource Graph query');
      if (err instanceof TenantValidationError) {
        throw err;
      }
      throw new QueryExecutionError(`Resource Graph query failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
