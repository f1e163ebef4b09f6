/**
 * Shared fixtures: an in-process signing key, token minting and a
 * tenant registry seeded with test tenants.
 */

import { SignJWT, generateKeyPair, type JWTPayload, type KeyLike } from 'jose';
import { InMemoryTenantStore } from '../../shared/tenantRegistry';
import type { AuthorizerConfig, SigningKeyProvider } from '../../shared/types';
import type { AuthorizerDeps } from '../authorize';

export const ISSUER = 'https://idp.example/';
export const AUDIENCE = 'gw-123';
export const KEY_ID = 'test-key-1';
export const RESOURCE = 'arn:aws:execute-api:eu-west-2:123456789012:abc123/prod/POST/invocations';

export function testConfig(overrides: Partial<AuthorizerConfig> = {}): AuthorizerConfig {
  return {
    region: 'eu-west-2',
    tokenIssuer: ISSUER,
    expectedAudience: AUDIENCE,
    jwksUri: 'https://idp.example/.well-known/jwks.json',
    tenantRegistryTable: 'tenant-registry-test',
    tenantClaim: 'custom:tenant_id',
    logLevel: 'info',
    signingKeyCacheTtlMs: 600_000,
    downstreamTimeoutMs: 1_000,
    ...overrides,
  };
}

export function tenantItem(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    tenant_id: 'acme',
    tenant_name: 'Acme Corp',
    tier: 'professional',
    status: 'active',
    execution_role_arn: 'arn:aws:iam::123456789012:role/acme-agent',
    memory_namespace: 'tenant/acme',
    config: { rate_limit_rps: 25, concurrent_sessions: 8, memory_quota_mb: 2048 },
    ...overrides,
  };
}

export class StaticKeyProvider implements SigningKeyProvider {
  calls = 0;

  constructor(private readonly keys: Record<string, KeyLike>) {}

  async getKey(keyId: string): Promise<KeyLike | null> {
    this.calls++;
    return this.keys[keyId] ?? null;
  }
}

export interface TokenOptions {
  kid?: string;
  issuer?: string;
  audience?: string | string[];
  expiresAt?: number;
}

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export async function mintToken(
  privateKey: KeyLike,
  claims: JWTPayload,
  options: TokenOptions = {}
): Promise<string> {
  return new SignJWT(claims)
    .setProtectedHeader({ alg: 'RS256', kid: options.kid ?? KEY_ID })
    .setIssuer(options.issuer ?? ISSUER)
    .setAudience(options.audience ?? [AUDIENCE])
    .setIssuedAt()
    .setExpirationTime(options.expiresAt ?? nowSeconds() + 300)
    .sign(privateKey);
}

export interface TestHarness {
  privateKey: KeyLike;
  keys: StaticKeyProvider;
  tenants: InMemoryTenantStore;
  deps: AuthorizerDeps;
}

export async function createHarness(
  configOverrides: Partial<AuthorizerConfig> = {}
): Promise<TestHarness> {
  const { privateKey, publicKey } = await generateKeyPair('RS256');
  const keys = new StaticKeyProvider({ [KEY_ID]: publicKey });
  const tenants = new InMemoryTenantStore([
    tenantItem(),
    tenantItem({ tenant_id: 'globex', tenant_name: 'Globex', status: 'suspended' }),
    tenantItem({ tenant_id: 'initech', tenant_name: 'Initech', status: 'provisioning' }),
  ]);

  return {
    privateKey,
    keys,
    tenants,
    deps: { config: testConfig(configOverrides), keys, tenants },
  };
}
