// ============================================================================
// TENANT GATEWAY — Lambda Authorizer
// Validates tenant JWTs for the gateway and returns an IAM policy
// ============================================================================

import type { APIGatewayAuthorizerResult } from 'aws-lambda';
import { getConfig } from '../shared/config';
import { getDynamoClient } from '../shared/aws-clients';
import { describeError } from '../shared/errors';
import { log, setLogLevel } from '../shared/logger';
import { CachedSigningKeyProvider, JwksSigningKeySource } from '../shared/signingKeys';
import { DynamoTenantStore } from '../shared/tenantRegistry';
import { authorize, ERROR_PRINCIPAL, type AuthorizerDeps } from './authorize';
import { deny, toAuthorizerResult } from './policy';
import {
  readAuthorization,
  resolveResource,
  type GatewayAuthorizerEvent,
} from './tokenExtractor';

export type AuthorizerHandler = (
  event: GatewayAuthorizerEvent
) => Promise<APIGatewayAuthorizerResult>;

/**
 * Wire the pipeline from environment configuration. Runs once per
 * execution environment; the key cache lives as long as it does.
 */
export function createDefaultDeps(): AuthorizerDeps {
  const config = getConfig();
  setLogLevel(config.logLevel);

  const keys = new CachedSigningKeyProvider(
    new JwksSigningKeySource(config.jwksUri, config.downstreamTimeoutMs),
    { ttlMs: config.signingKeyCacheTtlMs, timeoutMs: config.downstreamTimeoutMs }
  );
  const tenants = new DynamoTenantStore(
    getDynamoClient(config.region),
    config.tenantRegistryTable
  );

  return { config, keys, tenants };
}

export function createHandler(loadDeps: () => AuthorizerDeps): AuthorizerHandler {
  let loaded: AuthorizerDeps | null = null;

  return async (event) => {
    const resource = resolveResource(event);

    let deps = loaded;
    if (!deps) {
      try {
        deps = loadDeps();
        loaded = deps;
      } catch (error) {
        log('error', 'Authorizer initialisation failed', describeError(error));
        return toAuthorizerResult(deny(ERROR_PRINCIPAL, resource, 'internal_error'));
      }
    }

    log('debug', 'Authorizer invoked', { resource, type: event.type });

    const decision = await authorize(
      { authorization: readAuthorization(event), resource },
      deps
    );
    return toAuthorizerResult(decision);
  };
}

export const handler: AuthorizerHandler = createHandler(createDefaultDeps);
