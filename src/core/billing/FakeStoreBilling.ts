/**
 * Fake Store Billing: Test Double
 *
 * In-memory implementation of StoreBilling for testing.
 * Allows simulating various purchase scenarios without real store.
 */

import type {
  PurchaseResult,
  StoreBilling,
  StoreProduct,
  StoreTransaction,
  TransactionVerification,
} from './StoreBilling';

export type FakePurchaseOutcome = 'verified' | 'unverified' | 'cancelled' | 'pending' | 'unknown' | 'error';

/**
 * Fake Store Billing Implementation
 *
 * Useful for:
 * - Unit tests
 * - Local development without a real store
 * - Simulating error conditions
 */
export class FakeStoreBilling implements StoreBilling {
  private readonly products: Map<string, StoreProduct>;
  private purchaseOutcome: FakePurchaseOutcome = 'verified';
  private entitled: TransactionVerification[] = [];
  private shouldFailSync = false;
  private transactionCounter = 0;
  private closed = false;
  private readonly queuedUpdates: TransactionVerification[] = [];
  private waiters: Array<(result: IteratorResult<TransactionVerification, undefined>) => void> = [];

  /** Transaction ids passed to finish(), in call order */
  readonly finishedTransactionIds: string[] = [];
  syncCount = 0;

  constructor(products: StoreProduct[] = []) {
    this.products = new Map(products.map((product) => [product.id, product]));
  }

  /**
   * Configure how the next purchases resolve.
   */
  setPurchaseOutcome(outcome: FakePurchaseOutcome): void {
    this.purchaseOutcome = outcome;
  }

  /**
   * Set the transactions reported by currentEntitlements() (for restore testing).
   */
  setCurrentEntitlements(entitled: TransactionVerification[]): void {
    this.entitled = entitled;
  }

  setSyncFailure(shouldFail: boolean): void {
    this.shouldFailSync = shouldFail;
  }

  /**
   * Push an update onto transactionUpdates(). Ignored after shutdown.
   */
  emitTransactionUpdate(update: TransactionVerification): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: update, done: false });
    } else {
      this.queuedUpdates.push(update);
    }
  }

  async getProducts(productIds: string[]): Promise<StoreProduct[]> {
    return productIds.flatMap((id) => {
      const product = this.products.get(id);
      return product ? [product] : [];
    });
  }

  async purchase(product: StoreProduct): Promise<PurchaseResult> {
    const transaction = this.nextTransaction(product.id);

    switch (this.purchaseOutcome) {
      case 'verified':
        return { ok: true, verification: { verified: true, transaction } };
      case 'unverified':
        return {
          ok: true,
          verification: { verified: false, transaction, reason: 'Fake signature mismatch' },
        };
      case 'cancelled':
        return { ok: false, code: 'cancelled' };
      case 'pending':
        return { ok: false, code: 'pending' };
      case 'unknown':
        return { ok: false, code: 'unknown', message: 'Fake unknown outcome' };
      case 'error':
        throw new Error('Fake purchase failure');
    }
  }

  transactionUpdates(): AsyncIterable<TransactionVerification> {
    return {
      [Symbol.asyncIterator]: (): AsyncIterator<TransactionVerification, undefined> => ({
        next: async (): Promise<IteratorResult<TransactionVerification, undefined>> => {
          const queued = this.queuedUpdates.shift();
          if (queued) {
            return { value: queued, done: false };
          }
          if (this.closed) {
            return { value: undefined, done: true };
          }
          return new Promise<IteratorResult<TransactionVerification, undefined>>((resolve) => {
            this.waiters.push(resolve);
          });
        },
        return: async (): Promise<IteratorResult<TransactionVerification, undefined>> => ({
          value: undefined,
          done: true,
        }),
      }),
    };
  }

  async sync(): Promise<void> {
    if (this.shouldFailSync) {
      throw new Error('Fake sync failure');
    }
    this.syncCount += 1;
  }

  async currentEntitlements(): Promise<TransactionVerification[]> {
    return [...this.entitled];
  }

  async finish(transaction: StoreTransaction): Promise<void> {
    this.finishedTransactionIds.push(transaction.id);
  }

  async shutdown(): Promise<void> {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((resolve) => resolve({ value: undefined, done: true }));
  }

  private nextTransaction(productId: string): StoreTransaction {
    this.transactionCounter += 1;
    return {
      id: `fake_txn_${this.transactionCounter}`,
      productId,
      purchaseDate: Date.now(),
    };
  }
}
