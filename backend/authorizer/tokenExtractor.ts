// ============================================================================
// TENANT GATEWAY — Bearer Token Extraction
// ============================================================================

/**
 * `Bearer <token>`: exactly two space-separated parts, scheme compared
 * case-insensitively.
 */
export function extractBearerToken(value: string | undefined): string | null {
  if (!value) return null;

  const parts = value.split(' ');
  if (parts.length !== 2) return null;

  const [scheme, token] = parts;
  if (scheme.toLowerCase() !== 'bearer' || !token) return null;

  return token;
}

/** Token events carry the raw value; request events carry headers. */
export type AuthorizationSource =
  | { authorizationToken: string }
  | { headers?: Record<string, string | undefined> | null };

export function readAuthorization(event: AuthorizationSource): string | undefined {
  if ('authorizationToken' in event) {
    return event.authorizationToken;
  }

  const headers = event.headers ?? {};
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === 'authorization' && value) {
      return value;
    }
  }
  return undefined;
}

export type ResourceSource = { routeArn: string } | { methodArn: string };

/**
 * The parts of a REST token, REST request or HTTP API v2 request
 * authorizer event the handler reads. The `aws-lambda` event types are
 * all assignable to it.
 */
export type GatewayAuthorizerEvent = AuthorizationSource & ResourceSource & { type: string };

export function resolveResource(event: ResourceSource): string {
  return 'routeArn' in event ? event.routeArn : event.methodArn;
}
