// ============================================================================
// TENANT GATEWAY — Shared Types & Interfaces
// Tenant registry, token claims and authorization decision types
// ============================================================================

import type { JWTPayload, KeyLike } from 'jose';

// ---------------------------------------------------------------------------
// Tenants
// ---------------------------------------------------------------------------

export const TENANT_TIERS = ['free', 'starter', 'professional', 'enterprise'] as const;
export type TenantTier = (typeof TENANT_TIERS)[number];

export const TENANT_STATUSES = ['active', 'suspended', 'provisioning'] as const;
export type TenantStatus = (typeof TENANT_STATUSES)[number];

export interface TenantLimits {
  rateLimitRps: number;
  memoryQuotaMb: number;
  concurrentSessions: number;
}

export interface TenantRecord {
  tenantId: string;
  tenantName: string;
  tier: TenantTier;
  status: TenantStatus;
  executionRoleArn: string;
  memoryNamespace: string;
  config: TenantLimits;
}

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export interface TokenClaims extends JWTPayload {
  sub: string;
  tenant_id?: unknown;
}

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

export const CONTEXT_KEYS = [
  'tenantId',
  'tenantName',
  'tier',
  'executionRoleArn',
  'memoryNamespace',
  'rateLimitRps',
  'concurrentSessions',
] as const;

export type AuthorizerContextKey = (typeof CONTEXT_KEYS)[number];

/** Flat string map handed to the downstream integration on Allow. */
export type AuthorizerContext = Record<AuthorizerContextKey, string>;

export type DenyReason =
  | 'missing_token'
  | 'invalid_token'
  | 'missing_tenant'
  | 'tenant_not_found'
  | 'tenant_inactive'
  | 'internal_error';

export interface AllowDecision {
  effect: 'Allow';
  principalId: string;
  resource: string;
  context: AuthorizerContext;
}

export interface DenyDecision {
  effect: 'Deny';
  principalId: string;
  resource: string;
  reason: DenyReason;
}

export type AuthorizationDecision = AllowDecision | DenyDecision;

export interface AuthorizationRequest {
  /** Raw Authorization header or token value, untouched. */
  authorization?: string;
  resource: string;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface SigningKeyProvider {
  getKey(keyId: string): Promise<KeyLike | null>;
}

export interface SigningKeySource {
  fetchKey(keyId: string): Promise<KeyLike | null>;
}

export interface TenantStore {
  getTenant(tenantId: string, signal?: AbortSignal): Promise<TenantRecord | null>;
}

// ---------------------------------------------------------------------------
// Config Interface
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AuthorizerConfig {
  region: string;
  tokenIssuer: string;
  expectedAudience: string;
  jwksUri: string;
  tenantRegistryTable: string;
  tenantClaim: string;
  logLevel: LogLevel;
  signingKeyCacheTtlMs: number;
  downstreamTimeoutMs: number;
}
