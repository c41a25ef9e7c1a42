/**
 * Identity Manager
 *
 * Owns the anonymous user id: resolves the persisted one on start-up and
 * mints fresh ones on logout.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../logging/logger';
import type { KeyValueStorage } from './KeyValueStorage';

export const ANONYMOUS_ID_KEY = 'entitlement_sync.anonymous_id';
export const ANONYMOUS_ID_PREFIX = '$anonymous_';

export function isAnonymousId(appUserId: string): boolean {
  return appUserId.startsWith(ANONYMOUS_ID_PREFIX);
}

export class IdentityManager {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly logger: Logger,
    private readonly generateId: () => string = randomUUID
  ) {}

  /**
   * Persisted anonymous id, or a newly minted one that is persisted first.
   * A storage failure still yields a usable (unpersisted) id.
   */
  async resolveAnonymousId(): Promise<string> {
    try {
      const existing = await this.storage.getItem(ANONYMOUS_ID_KEY);
      if (existing) {
        return existing;
      }
    } catch (error) {
      this.logger.warn('Failed to read persisted anonymous id:', error);
    }

    const anonymousId = this.mintFreshAnonymousId();
    try {
      await this.storage.setItem(ANONYMOUS_ID_KEY, anonymousId);
      this.logger.debug(`Persisted anonymous id ${anonymousId}`);
    } catch (error) {
      this.logger.warn('Failed to persist anonymous id:', error);
    }
    return anonymousId;
  }

  /**
   * Brand-new anonymous id. Storage is neither read nor written.
   */
  mintFreshAnonymousId(): string {
    return `${ANONYMOUS_ID_PREFIX}${this.generateId().toLowerCase()}`;
  }
}
