/**
 * Veilpost - Prekey Bundle Cache
 *
 * Short-lived cache of recipients' public bundles.
 *
 * A one-time prekey is handed out at most once: the entry is stored without
 * it, so later hits yield a bundle with no one-time prekey and X3DH omits
 * DH4 instead of reusing a consumed id. Concurrent callers for the same
 * recipient share one fetch.
 */

import { CRYPTO, type ServerPrekeyBundle } from '@veilpost/shared';
import type { KeyDirectoryClient, RequestOptions } from '../lib/api.js';
import type { Logger } from '../lib/logger.js';
import type { Clock } from './types.js';

interface CacheEntry {
  bundle: ServerPrekeyBundle;
  fetchedAt: number;
}

export interface PreKeyBundleCacheOptions {
  ttlMs?: number;
  clock?: Clock;
  logger?: Logger;
}

function withoutOneTimePreKey(bundle: ServerPrekeyBundle): ServerPrekeyBundle {
  const { one_time_prekey: _key, one_time_prekey_id: _id, ...rest } = bundle;
  return rest;
}

export class PreKeyBundleCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly pendingFetches = new Map<string, Promise<ServerPrekeyBundle>>();
  /** Bumped by clear(); a fetch started before it does not fill the cache. */
  private generation = 0;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(
    private readonly directory: KeyDirectoryClient,
    options: PreKeyBundleCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? CRYPTO.BUNDLE_CACHE_TTL_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  /**
   * Bundle for encrypting to `recipientId`.
   * Only the call that fetched it receives the one-time prekey.
   */
  async getRecipientBundle(
    recipientId: string,
    options: RequestOptions = {}
  ): Promise<ServerPrekeyBundle> {
    const cached = this.fresh(recipientId);
    if (cached) {
      this.logger?.debug(`Bundle cache hit for ${recipientId}`);
      return cached;
    }

    const pending = this.pendingFetches.get(recipientId);
    if (pending) {
      return withoutOneTimePreKey(await pending);
    }
    return this.fetch(recipientId, options);
  }

  /**
   * Bundle for reading the identity key. Never returns a one-time prekey.
   */
  async peekRecipientBundle(
    recipientId: string,
    options: RequestOptions = {}
  ): Promise<ServerPrekeyBundle> {
    const cached = this.fresh(recipientId);
    if (cached) return cached;

    const pending = this.pendingFetches.get(recipientId) ?? this.fetch(recipientId, options);
    return withoutOneTimePreKey(await pending);
  }

  invalidate(recipientId: string): void {
    this.entries.delete(recipientId);
  }

  /** Forget every entry, including fetches still in flight. */
  clear(): void {
    this.generation++;
    this.entries.clear();
    this.pendingFetches.clear();
  }

  /** Entry fetched less than `ttlMs` ago, if any. */
  private fresh(recipientId: string): ServerPrekeyBundle | null {
    const entry = this.entries.get(recipientId);
    if (!entry) return null;
    if (this.clock() - entry.fetchedAt >= this.ttlMs) {
      this.entries.delete(recipientId);
      return null;
    }
    return entry.bundle;
  }

  /**
   * Fetch and cache without the one-time prekey. Registered as pending
   * before the first await so concurrent callers find it.
   */
  private async fetch(
    recipientId: string,
    options: RequestOptions
  ): Promise<ServerPrekeyBundle> {
    const generation = this.generation;
    const request = this.directory.getPreKeyBundle(recipientId, options).then((bundle) => {
      if (generation === this.generation) {
        this.entries.set(recipientId, {
          bundle: withoutOneTimePreKey(bundle),
          fetchedAt: this.clock(),
        });
      }
      return bundle;
    });
    this.pendingFetches.set(recipientId, request);
    try {
      return await request;
    } finally {
      if (this.pendingFetches.get(recipientId) === request) {
        this.pendingFetches.delete(recipientId);
      }
    }
  }
}
