// ============================================================================
// TENANT GATEWAY — Authorization Pipeline
// Token → claims → tenant → decision. Every path returns a decision.
// ============================================================================

import { log } from '../shared/logger';
import { TokenVerificationError, describeError } from '../shared/errors';
import { withTimeout } from '../shared/timeout';
import type {
  AuthorizationDecision,
  AuthorizationRequest,
  AuthorizerConfig,
  SigningKeyProvider,
  TenantStore,
  TokenClaims,
} from '../shared/types';
import { allow, deny } from './policy';
import { resolveTenantId } from './tenantResolver';
import { extractBearerToken } from './tokenExtractor';
import { verifyToken } from './tokenVerifier';

export interface AuthorizerDeps {
  config: AuthorizerConfig;
  keys: SigningKeyProvider;
  tenants: TenantStore;
}

export const ANONYMOUS_PRINCIPAL = 'anonymous';
export const ERROR_PRINCIPAL = 'error';

async function decide(
  request: AuthorizationRequest,
  deps: AuthorizerDeps
): Promise<AuthorizationDecision> {
  const { config, keys, tenants } = deps;
  const { resource } = request;

  const token = extractBearerToken(request.authorization);
  if (!token) {
    log('debug', 'No bearer token provided', { resource });
    return deny(ANONYMOUS_PRINCIPAL, resource, 'missing_token');
  }

  let claims: TokenClaims;
  try {
    claims = await verifyToken(token, keys, {
      issuer: config.tokenIssuer,
      audience: config.expectedAudience,
    });
  } catch (error) {
    if (error instanceof TokenVerificationError) {
      // Error class only, never the token or verifier detail
      log('warn', 'Token verification failed', { code: error.code, sub: error.subject });
      return deny(error.subject ?? ANONYMOUS_PRINCIPAL, resource, 'invalid_token');
    }
    throw error;
  }

  log('debug', 'Token verified', { sub: claims.sub, iss: claims.iss });

  const tenantId = resolveTenantId(claims, config.tenantClaim);
  if (!tenantId) {
    log('warn', 'No tenant ID in token claims', { sub: claims.sub });
    return deny(claims.sub, resource, 'missing_tenant');
  }

  const tenant = await withTimeout('tenant lookup', config.downstreamTimeoutMs, (signal) =>
    tenants.getTenant(tenantId, signal)
  );

  if (!tenant) {
    log('warn', 'Tenant not found', { tenantId, sub: claims.sub });
    return deny(claims.sub, resource, 'tenant_not_found');
  }

  if (tenant.status !== 'active') {
    log('warn', 'Tenant not active', { tenantId, status: tenant.status, sub: claims.sub });
    return deny(claims.sub, resource, 'tenant_inactive');
  }

  log('info', 'Request authorized', { tenantId, tier: tenant.tier, sub: claims.sub });
  return allow(claims.sub, resource, tenant);
}

/**
 * Never rejects. Anything that is not a definite Allow is a Deny, and
 * operational faults deny with the `error` principal.
 */
export async function authorize(
  request: AuthorizationRequest,
  deps: AuthorizerDeps
): Promise<AuthorizationDecision> {
  try {
    return await decide(request, deps);
  } catch (error) {
    log('error', 'Authorizer error', { resource: request.resource, ...describeError(error) });
    return deny(ERROR_PRINCIPAL, request.resource, 'internal_error');
  }
}
