// ============================================================================
// TENANT GATEWAY — Error Types
// ============================================================================

export class ConfigError extends Error {
  readonly name = 'ConfigError';
}

/**
 * The token failed signature or claim checks. The only error class the
 * pipeline treats as a client problem rather than an operational one.
 */
export class TokenVerificationError extends Error {
  readonly name = 'TokenVerificationError';

  constructor(
    readonly code: string,
    readonly subject?: string
  ) {
    super(`Token verification failed: ${code}`);
  }
}

export class SigningKeyRetrievalError extends Error {
  readonly name = 'SigningKeyRetrievalError';

  constructor(
    readonly keyId: string,
    options?: { cause?: unknown }
  ) {
    super(`Signing key retrieval failed for kid ${keyId}`, options);
  }
}

export class TimeoutError extends Error {
  readonly name = 'TimeoutError';

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class TenantRecordError extends Error {
  readonly name = 'TenantRecordError';

  constructor(
    readonly tenantId: string,
    readonly issues: string[]
  ) {
    super(`Malformed tenant record ${tenantId}: ${issues.join('; ')}`);
  }
}

export function describeError(error: unknown): {
  error: string;
  errorName: string;
  stack?: string;
} {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error), errorName: 'UnknownError' };
}
