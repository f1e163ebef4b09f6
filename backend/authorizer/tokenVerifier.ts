// ============================================================================
// TENANT GATEWAY — Token Verification
// Signature, issuer, audience and expiry checks against the JWKS key
// ============================================================================

import { decodeJwt, errors, jwtVerify, type JWTHeaderParameters, type KeyLike } from 'jose';
import { TokenVerificationError } from '../shared/errors';
import { SIGNING_ALGORITHM } from '../shared/signingKeys';
import type { SigningKeyProvider, TokenClaims } from '../shared/types';

export interface VerifyOptions {
  issuer: string;
  audience: string;
}

/** Best-effort read of `sub` from an unverified token, for deny principals. */
export function peekSubject(token: string): string | undefined {
  try {
    const { sub } = decodeJwt(token);
    return typeof sub === 'string' && sub ? sub : undefined;
  } catch {
    return undefined;
  }
}

export async function verifyToken(
  token: string,
  keys: SigningKeyProvider,
  options: VerifyOptions
): Promise<TokenClaims> {
  const resolveKey = async (header: JWTHeaderParameters): Promise<KeyLike> => {
    if (!header.kid) {
      throw new TokenVerificationError('ERR_JWS_MISSING_KID', peekSubject(token));
    }
    const key = await keys.getKey(header.kid);
    if (!key) {
      throw new TokenVerificationError('ERR_JWKS_NO_MATCHING_KEY', peekSubject(token));
    }
    return key;
  };

  try {
    const { payload } = await jwtVerify(token, resolveKey, {
      algorithms: [SIGNING_ALGORITHM],
      issuer: options.issuer,
      audience: options.audience,
      requiredClaims: ['exp', 'sub'],
    });

    const { sub } = payload;
    if (typeof sub !== 'string' || !sub) {
      throw new TokenVerificationError('ERR_JWT_CLAIM_VALIDATION_FAILED');
    }
    return { ...payload, sub };
  } catch (error) {
    if (error instanceof errors.JOSEError) {
      throw new TokenVerificationError(error.code, peekSubject(token));
    }
    // Key retrieval faults and anything unexpected stay internal
    throw error;
  }
}
