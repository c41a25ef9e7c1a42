/**
 * Customer Snapshot Cache: Persistence with Expiration
 *
 * Mirrors the last known snapshot into key-value storage with a TTL.
 * Best effort throughout: every failure is logged and reads become misses.
 */

import type { Logger } from '../logging/logger';
import { customerSnapshotSchema, type CustomerSnapshot } from './CustomerSnapshot';
import type { KeyValueStorage } from './KeyValueStorage';

export const SNAPSHOT_CACHE_KEY = 'entitlement_sync.customer_info';
export const SNAPSHOT_EXPIRY_KEY = 'entitlement_sync.customer_info.expiry';
export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;

export interface CustomerSnapshotCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

export class CustomerSnapshotCache {
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(
    private readonly storage: KeyValueStorage,
    private readonly logger: Logger,
    options: CustomerSnapshotCacheOptions = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Store the snapshot with an expiry of now + TTL.
   */
  async save(snapshot: CustomerSnapshot): Promise<void> {
    try {
      const serialized = JSON.stringify(snapshot);
      const expiresAt = this.now() + this.ttlMs;
      await this.storage.setItem(SNAPSHOT_CACHE_KEY, serialized);
      await this.storage.setItem(SNAPSHOT_EXPIRY_KEY, String(expiresAt));
    } catch (error) {
      this.logger.warn('Failed to cache customer info:', error);
    }
  }

  /**
   * Cached snapshot while it is still fresh; null on expiry, absence or bad data.
   */
  async load(): Promise<CustomerSnapshot | null> {
    try {
      const rawExpiry = await this.storage.getItem(SNAPSHOT_EXPIRY_KEY);
      if (!rawExpiry) {
        return null;
      }

      const expiresAt = Number(rawExpiry);
      if (!Number.isFinite(expiresAt) || this.now() >= expiresAt) {
        return null;
      }

      const raw = await this.storage.getItem(SNAPSHOT_CACHE_KEY);
      if (!raw) {
        return null;
      }

      const parsed = customerSnapshotSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        this.logger.warn('Discarding undecodable cached customer info:', parsed.error.message);
        return null;
      }
      return parsed.data;
    } catch (error) {
      this.logger.warn('Failed to load cached customer info:', error);
      return null;
    }
  }

  /**
   * Remove snapshot and expiry. Both removals are attempted.
   */
  async clear(): Promise<void> {
    const results = await Promise.allSettled([
      this.storage.removeItem(SNAPSHOT_CACHE_KEY),
      this.storage.removeItem(SNAPSHOT_EXPIRY_KEY),
    ]);
    results.forEach((result) => {
      if (result.status === 'rejected') {
        this.logger.warn('Failed to clear cached customer info:', result.reason);
      }
    });
  }
}
