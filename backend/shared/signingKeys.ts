// ============================================================================
// TENANT GATEWAY — Signing Key Retrieval
// JWKS-backed key source with a per-kid in-memory TTL cache
// ============================================================================

import { createRemoteJWKSet, errors, type KeyLike } from 'jose';
import { log } from './logger';
import { SigningKeyRetrievalError } from './errors';
import { withTimeout } from './timeout';
import type { SigningKeyProvider, SigningKeySource } from './types';

export const SIGNING_ALGORITHM = 'RS256';

interface CachedKey {
  key: KeyLike;
  cachedAt: number;
}

const PRUNE_THRESHOLD = 32;

export class JwksSigningKeySource implements SigningKeySource {
  private readonly jwks: ReturnType<typeof createRemoteJWKSet>;

  constructor(jwksUri: string, timeoutMs: number) {
    this.jwks = createRemoteJWKSet(new URL(jwksUri), {
      timeoutDuration: timeoutMs,
    });
  }

  /**
   * Resolve a key by kid. Unknown kids resolve to null; anything that
   * stops the key set from being read is a retrieval error.
   */
  async fetchKey(keyId: string): Promise<KeyLike | null> {
    try {
      return await this.jwks({ alg: SIGNING_ALGORITHM, kid: keyId });
    } catch (error) {
      if (
        error instanceof errors.JWKSNoMatchingKey ||
        error instanceof errors.JWKSMultipleMatchingKeys
      ) {
        return null;
      }
      throw new SigningKeyRetrievalError(keyId, { cause: error });
    }
  }
}

export interface SigningKeyCacheOptions {
  ttlMs: number;
  timeoutMs: number;
  now?: () => number;
}

/**
 * Keys are cached per kid for a fixed TTL and never invalidated early.
 * Concurrent misses for the same kid may both fetch; the last write wins.
 */
export class CachedSigningKeyProvider implements SigningKeyProvider {
  private cache: Map<string, CachedKey> = new Map();
  private readonly now: () => number;

  constructor(
    private readonly source: SigningKeySource,
    private readonly options: SigningKeyCacheOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async getKey(keyId: string): Promise<KeyLike | null> {
    const cached = this.cache.get(keyId);
    if (cached && this.now() - cached.cachedAt < this.options.ttlMs) {
      return cached.key;
    }

    const key = await withTimeout(
      'signing key retrieval',
      this.options.timeoutMs,
      () => this.source.fetchKey(keyId)
    );

    if (!key) {
      log('debug', 'Signing key not found', { kid: keyId });
      return null;
    }

    this.cache.set(keyId, { key, cachedAt: this.now() });
    this.prune();
    return key;
  }

  size(): number {
    return this.cache.size;
  }

  private prune(): void {
    if (this.cache.size <= PRUNE_THRESHOLD) return;

    const now = this.now();
    for (const [kid, entry] of this.cache.entries()) {
      if (now - entry.cachedAt >= this.options.ttlMs) {
        this.cache.delete(kid);
      }
    }
  }
}
