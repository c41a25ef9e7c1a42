/**
 * Store Billing Interface
 *
 * Abstract interface for the platform purchase mechanism.
 * Implemented by platform-specific adapters (App Store, Google Play).
 */

export type SubscriptionPeriodUnit = 'day' | 'week' | 'month' | 'year';

export interface SubscriptionPeriod {
  unit: SubscriptionPeriodUnit;
  value: number;
}

/**
 * A purchasable product as the store describes it.
 */
export interface StoreProduct {
  id: string;
  displayName: string;
  /** Localized price string, e.g. "$4.99" */
  displayPrice: string;
  price: number;
  currencyCode: string;
  /** null for non-subscription products */
  subscriptionPeriod: SubscriptionPeriod | null;
}

export interface StoreTransaction {
  id: string;
  productId: string;
  /** ms since epoch */
  purchaseDate?: number;
}

/**
 * A transaction together with the platform's own signature check.
 * Only verified transactions are ever sent to the server.
 */
export type TransactionVerification =
  | { verified: true; transaction: StoreTransaction }
  | { verified: false; transaction: StoreTransaction; reason?: string };

export type PurchaseResult =
  | { ok: true; verification: TransactionVerification }
  | { ok: false; code: 'cancelled' | 'pending' | 'unknown'; message?: string };

/**
 * Store Billing Interface
 *
 * Implementations resolve every purchase to a PurchaseResult
 * and reserve rejections for real platform faults.
 */
export interface StoreBilling {
  /**
   * Look up products by identifier. Unknown identifiers are left out.
   */
  getProducts(productIds: string[]): Promise<StoreProduct[]>;

  /**
   * Run the platform purchase flow for one product.
   */
  purchase(product: StoreProduct): Promise<PurchaseResult>;

  /**
   * Continuous stream of transaction updates (renewals, purchases made
   * elsewhere, approvals of pending purchases). Ends on shutdown().
   */
  transactionUpdates(): AsyncIterable<TransactionVerification>;

  /**
   * Ask the platform to resynchronize its purchase records.
   */
  sync(): Promise<void>;

  /**
   * Transactions currently granting access on this device.
   */
  currentEntitlements(): Promise<TransactionVerification[]>;

  /**
   * Finish/acknowledge a transaction. Unfinished transactions are
   * redelivered through transactionUpdates().
   */
  finish(transaction: StoreTransaction): Promise<void>;

  /**
   * Shutdown/cleanup store connection.
   */
  shutdown(): Promise<void>;
}
