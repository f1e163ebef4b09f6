// ============================================================================
// TENANT GATEWAY — Typed Configuration
// All environment variables accessed through this single config object
// ============================================================================

import { ConfigError } from './errors';
import type { AuthorizerConfig, LogLevel } from './types';

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optionalEnv(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function positiveIntEnv(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (!raw) return defaultValue;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function logLevelEnv(env: Env): LogLevel {
  const raw = optionalEnv(env, 'LOG_LEVEL', 'info').toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

/**
 * Build the authorizer configuration from an environment map. Each
 * deployment gets its own EXPECTED_AUDIENCE; that value is what keeps a
 * token minted for one environment out of another.
 */
export function buildConfig(env: Env): AuthorizerConfig {
  return {
    region: optionalEnv(env, 'AWS_REGION', 'eu-west-2'),
    tokenIssuer: requireEnv(env, 'TOKEN_ISSUER'),
    expectedAudience: requireEnv(env, 'EXPECTED_AUDIENCE'),
    jwksUri: requireEnv(env, 'JWKS_URI'),
    tenantRegistryTable: requireEnv(env, 'TENANT_REGISTRY_TABLE'),
    tenantClaim: optionalEnv(env, 'TENANT_CLAIM_NAMESPACE', 'custom:tenant_id'),
    logLevel: logLevelEnv(env),
    signingKeyCacheTtlMs: positiveIntEnv(env, 'SIGNING_KEY_CACHE_TTL_MS', 600_000),
    downstreamTimeoutMs: positiveIntEnv(env, 'DOWNSTREAM_TIMEOUT_MS', 3_000),
  };
}

let _config: AuthorizerConfig | null = null;

export function getConfig(): AuthorizerConfig {
  if (_config) return _config;
  _config = buildConfig(process.env);
  return _config;
}
