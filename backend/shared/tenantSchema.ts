/**
 * Zod schema for tenant registry items
 */

import { z } from 'zod';
import { TENANT_STATUSES, TENANT_TIERS, type TenantRecord } from './types';

export const DEFAULT_RATE_LIMIT_RPS = 10;
export const DEFAULT_CONCURRENT_SESSIONS = 5;
export const DEFAULT_MEMORY_QUOTA_MB = 1024;

const limitSchema = z.number().int().positive();

// DynamoDB NULL attributes arrive as null; treat them like absent ones
function limitOrDefault(fallback: number) {
  return z.preprocess((value) => value ?? undefined, limitSchema.default(fallback));
}

const tenantConfigSchema = z.preprocess(
  (value) => value ?? {},
  z.object({
    rate_limit_rps: limitOrDefault(DEFAULT_RATE_LIMIT_RPS),
    memory_quota_mb: limitOrDefault(DEFAULT_MEMORY_QUOTA_MB),
    concurrent_sessions: limitOrDefault(DEFAULT_CONCURRENT_SESSIONS),
  })
);

// Items are written by the onboarding flow with snake_case attributes
export const tenantItemSchema = z.object({
  tenant_id: z.string().min(1),
  tenant_name: z.string().min(1),
  tier: z.enum(TENANT_TIERS),
  status: z.enum(TENANT_STATUSES),
  execution_role_arn: z.string().min(1),
  memory_namespace: z.string().min(1).optional(),
  config: tenantConfigSchema,
});

export function memoryNamespaceFor(tenantId: string): string {
  return `tenant/${tenantId}`;
}

export function toTenantRecord(item: z.output<typeof tenantItemSchema>): TenantRecord {
  return {
    tenantId: item.tenant_id,
    tenantName: item.tenant_name,
    tier: item.tier,
    status: item.status,
    executionRoleArn: item.execution_role_arn,
    memoryNamespace: item.memory_namespace ?? memoryNamespaceFor(item.tenant_id),
    config: {
      rateLimitRps: item.config.rate_limit_rps,
      memoryQuotaMb: item.config.memory_quota_mb,
      concurrentSessions: item.config.concurrent_sessions,
    },
  };
}
