import type { TokenClaims } from '../shared/types';

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Tenant id from verified claims, in order: `tenant_id`, the namespaced
 * custom claim, then the subject up to its first colon (all of it when
 * there is none).
 *
 * TODO: collapse to the `tenant_id` claim once every issuer in front of
 * the gateway emits it.
 */
export function resolveTenantId(claims: TokenClaims, namespacedClaim: string): string | null {
  const direct = nonEmptyString(claims.tenant_id);
  if (direct) return direct;

  const namespaced = nonEmptyString(claims[namespacedClaim]);
  if (namespaced) return namespaced;

  // A subject without a colon is the tenant id itself
  return claims.sub.split(':')[0] || null;
}
