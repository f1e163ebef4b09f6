// ============================================================================
// TENANT GATEWAY — Tenant Registry
// Read-only point lookups against the tenant registry table
// ============================================================================

import { GetCommand, type DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { log } from './logger';
import { TenantRecordError } from './errors';
import { tenantItemSchema, toTenantRecord } from './tenantSchema';
import type { TenantRecord, TenantStore } from './types';

function parseTenantItem(tenantId: string, item: Record<string, unknown>): TenantRecord {
  const parsed = tenantItemSchema.safeParse(item);
  if (!parsed.success) {
    throw new TenantRecordError(
      tenantId,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return toTenantRecord(parsed.data);
}

export class DynamoTenantStore implements TenantStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tableName: string
  ) {}

  /**
   * Get a single tenant by primary key
   */
  async getTenant(tenantId: string, signal?: AbortSignal): Promise<TenantRecord | null> {
    let item: Record<string, unknown> | undefined;
    try {
      const result = await this.client.send(
        new GetCommand({
          TableName: this.tableName,
          Key: { tenant_id: tenantId },
        }),
        { abortSignal: signal }
      );
      item = result.Item;
    } catch (error) {
      log('error', 'DynamoDB get failed', {
        table: this.tableName,
        tenantId,
        error: String(error),
      });
      throw error;
    }

    if (!item) return null;
    return parseTenantItem(tenantId, item);
  }
}

/**
 * Map-backed store for local runs and tests. Records are parsed from the
 * same item shape the table holds.
 */
export class InMemoryTenantStore implements TenantStore {
  private readonly tenants = new Map<string, Record<string, unknown>>();

  constructor(items: Record<string, unknown>[] = []) {
    for (const item of items) this.put(item);
  }

  put(item: Record<string, unknown>): void {
    const tenantId = item['tenant_id'];
    if (typeof tenantId !== 'string' || !tenantId) {
      throw new TenantRecordError(String(tenantId), ['tenant_id: Required']);
    }
    this.tenants.set(tenantId, item);
  }

  async getTenant(tenantId: string): Promise<TenantRecord | null> {
    const item = this.tenants.get(tenantId);
    if (!item) return null;
    return parseTenantItem(tenantId, item);
  }
}
