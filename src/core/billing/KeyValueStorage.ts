/**
 * Key-Value Storage: Persistence Interface
 *
 * The AsyncStorage-shaped contract the cache and identity manager persist
 * through. Any store with string get/set/remove fits (AsyncStorage,
 * localStorage wrappers, a file-backed map).
 */

export interface KeyValueStorage {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
}

/**
 * Map-backed storage. Does not persist across process restarts.
 */
export class InMemoryStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    Object.entries(initial).forEach(([key, value]) => this.items.set(key, value));
  }

  async getItem(key: string): Promise<string | null> {
    return this.items.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.items.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.items.delete(key);
  }

  has(key: string): boolean {
    return this.items.has(key);
  }
}
