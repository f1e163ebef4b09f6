// ============================================================================
// TENANT GATEWAY — Decisions & IAM Policy Documents
// ============================================================================

import type { APIGatewayAuthorizerResult } from 'aws-lambda';
import type {
  AllowDecision,
  AuthorizationDecision,
  AuthorizerContext,
  DenyDecision,
  DenyReason,
  TenantRecord,
} from '../shared/types';

export function buildContext(tenant: TenantRecord): AuthorizerContext {
  return {
    tenantId: tenant.tenantId,
    tenantName: tenant.tenantName,
    tier: tenant.tier,
    executionRoleArn: tenant.executionRoleArn,
    memoryNamespace: tenant.memoryNamespace,
    rateLimitRps: String(tenant.config.rateLimitRps),
    concurrentSessions: String(tenant.config.concurrentSessions),
  };
}

export function allow(principalId: string, resource: string, tenant: TenantRecord): AllowDecision {
  return { effect: 'Allow', principalId, resource, context: buildContext(tenant) };
}

export function deny(principalId: string, resource: string, reason: DenyReason): DenyDecision {
  return { effect: 'Deny', principalId, resource, reason };
}

/**
 * Gateway response. The deny reason stays internal; only Allow carries
 * context.
 */
export function toAuthorizerResult(decision: AuthorizationDecision): APIGatewayAuthorizerResult {
  const result: APIGatewayAuthorizerResult = {
    principalId: decision.principalId,
    policyDocument: {
      Version: '2012-10-17',
      Statement: [{
        Action: 'execute-api:Invoke',
        Effect: decision.effect,
        Resource: decision.resource,
      }],
    },
  };

  if (decision.effect === 'Allow') {
    result.context = { ...decision.context };
  }
  return result;
}
