/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key header, scoped to
 * the caller's identity. A repeated key within the TTL replays the
 * cached response instead of minting or transferring twice.
 *
 * A key is reserved while its first request runs: a duplicate that
 * arrives meanwhile waits for that request, then replays its response
 * or, if it failed, runs on its own.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

interface StoredResponse {
  readonly response: CachedResponse;
  readonly cachedAt: number;
}

export interface IdempotencyStoreOptions {
  readonly ttlMs?: number | undefined;
  /** Most responses held; expired ones go first, then the oldest */
  readonly maxEntries?: number | undefined;
  readonly now?: (() => number) | undefined;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, StoredResponse>();
  private readonly _ttlMs: number;
  private readonly _maxEntries: number;
  private readonly _now: () => number;

  constructor(options: IdempotencyStoreOptions = {}) {
    this._ttlMs = options.ttlMs ?? 86400000;
    this._maxEntries = options.maxEntries ?? 10000;
    this._now = options.now ?? Date.now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry.response;
  }

  set(key: string, response: CachedResponse): void {
    this._cache.delete(key);
    if (this._cache.size >= this._maxEntries) {
      this.evictExpired();
    }
    // Map order is insertion order, so the first key is the oldest
    for (const oldest of this._cache.keys()) {
      if (this._cache.size < this._maxEntries) break;
      this._cache.delete(oldest);
    }
    this._cache.set(key, { response, cachedAt: this._now() });
  }

  /**
   * Drop every entry past its TTL.
   *
   * @returns Number of entries removed
   */
  evictExpired(): number {
    const now = this._now();
    let removed = 0;
    for (const [key, entry] of this._cache) {
      if (now - entry.cachedAt > this._ttlMs) {
        this._cache.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this._cache.size;
  }

  clear(): void {
    this._cache.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  const inFlight = new Map<string, Promise<void>>();

  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const scopedKey = `${c.get("auth").identity}:${idempotencyKey}`;
    for (;;) {
      const cached = store.get(scopedKey);
      if (cached !== undefined) {
        return new Response(cached.body, {
          status: cached.status,
          headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
        });
      }

      const pending = inFlight.get(scopedKey);
      if (pending === undefined) break;
      await pending;
    }

    let release = (): void => undefined;
    inFlight.set(
      scopedKey,
      new Promise<void>((resolve) => {
        release = resolve;
      }),
    );

    try {
      await next();

      if (c.res.status >= 200 && c.res.status < 300) {
        const cloned = c.res.clone();
        const body = await cloned.text();
        const headers: Record<string, string> = {};
        cloned.headers.forEach((value, key) => {
          headers[key] = value;
        });

        store.set(scopedKey, {
          status: cloned.status,
          body,
          headers,
        });
      }
    } finally {
      inFlight.delete(scopedKey);
      release();
    }
  };
}
