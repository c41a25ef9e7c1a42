/**
 * entitlement-sync
 *
 * Client-side entitlement synchronization over a store and a verifying backend.
 */

export { EntitlementSynchronizer } from './core/billing/EntitlementSynchronizer';
export type {
  EntitlementSynchronizerOptions,
  RemoteClientFactory,
} from './core/billing/EntitlementSynchronizer';

export {
  activeEntitlementIds,
  customerSnapshotSchema,
  emptySnapshot,
  hasActiveSubscription,
  hasAnyEntitlement,
  isEntitled,
  isExpiringSoon,
  subscriptionStatusGrantsAccess,
  timeRemaining,
  wireCustomerSnapshotSchema,
} from './core/billing/CustomerSnapshot';
export type {
  CustomerSnapshot,
  Entitlement,
  Store,
  SubscriptionInfo,
  SubscriptionStatus,
  TransactionDetails,
} from './core/billing/CustomerSnapshot';

export {
  SubscriptionError,
  isCancellation,
  isSubscriptionError,
  toSubscriptionError,
} from './core/billing/SubscriptionError';
export type { SubscriptionErrorCode } from './core/billing/SubscriptionError';

export {
  createOffering,
  createPackage,
  currentOffering,
  mainPackage,
  packageOfType,
  packageTypeOf,
  pricePerMonth,
} from './core/billing/Offerings';
export type { Offering, Offerings, Package, PackageType } from './core/billing/Offerings';

export type {
  PurchaseResult,
  StoreBilling,
  StoreProduct,
  StoreTransaction,
  SubscriptionPeriod,
  SubscriptionPeriodUnit,
  TransactionVerification,
} from './core/billing/StoreBilling';
export { FakeStoreBilling } from './core/billing/FakeStoreBilling';
export type { FakePurchaseOutcome } from './core/billing/FakeStoreBilling';

export { InMemoryStorage } from './core/billing/KeyValueStorage';
export type { KeyValueStorage } from './core/billing/KeyValueStorage';

export {
  CustomerSnapshotCache,
  DEFAULT_CACHE_TTL_MS,
  SNAPSHOT_CACHE_KEY,
  SNAPSHOT_EXPIRY_KEY,
} from './core/billing/CustomerSnapshotCache';
export { ANONYMOUS_ID_KEY, ANONYMOUS_ID_PREFIX, IdentityManager, isAnonymousId } from './core/billing/IdentityManager';
export { RemoteSyncClient } from './core/billing/RemoteSyncClient';
export type { RemoteSync, RemoteSyncConfig, VerificationOutcome } from './core/billing/RemoteSyncClient';
export type { Readable, Subscriber } from './core/billing/ObservableValue';
export { entitlementGate } from './core/billing/entitlementGate';

export { DEFAULT_BASE_URL, configureOptionsSchema, defaultBaseUrl } from './core/config';
export type { ConfigureOptions } from './core/config';
export { createLogger, logLevelFromEnv, silentLogger } from './core/logging/logger';
export type { LogLevel, LogSink, Logger, LoggerOptions } from './core/logging/logger';
