/**
 * Customer Snapshot: Data Model
 *
 * Server-verified view of a customer's entitlements at a point in time.
 * Snapshots are immutable and always replaced as a whole.
 *
 * Two zod schemas describe the same snapshot:
 * - the wire schema decodes the remote API's JSON (its own key names)
 * - the cache schema decodes the model form written by the local cache
 */

import { addHours, isAfter, isBefore, parseISO } from 'date-fns';
import { z } from 'zod';

export type Store = 'app_store' | 'play_store' | 'stripe' | 'promotional';

export type SubscriptionStatus =
  | 'active'
  | 'cancelled'
  | 'expired'
  | 'billing_retry'
  | 'grace_period'
  | 'paused'
  | 'pending';

export interface Entitlement {
  readonly isActive: boolean;
  readonly productId: string;
  /** ISO timestamp; null for lifetime access */
  readonly expiresAt: string | null;
  readonly willRenew: boolean;
  readonly store: Store | null;
}

export interface SubscriptionInfo {
  readonly productId: string;
  readonly status: SubscriptionStatus;
  readonly store: Store;
  readonly purchaseDate: string | null;
  readonly expiresDate: string | null;
  readonly willRenew: boolean;
  readonly price: number | null;
  readonly currency: string | null;
}

export interface CustomerSnapshot {
  readonly userId: string;
  /** Identifier before an account transfer, if any */
  readonly originalUserId: string | null;
  /** Keyed by entitlement identifier */
  readonly entitlements: Readonly<Record<string, Entitlement>>;
  readonly activeSubscriptionIds: readonly string[];
  readonly allPurchasedProductIds: readonly string[];
  readonly latestExpiration: string | null;
  readonly managementUrl: string | null;
  readonly firstSeen: string | null;
  readonly lastSeen: string | null;
  readonly subscriptionDetails: readonly SubscriptionInfo[] | null;
}

/**
 * Extra transaction metadata returned by receipt verification.
 * Informational only.
 */
export interface TransactionDetails {
  readonly transactionId: string;
  readonly originalTransactionId: string;
  readonly productId: string;
  readonly purchaseDate: string | null;
  readonly expiresDate: string | null;
  readonly environment: string | null;
}

const ACCESS_GRANTING_STATUSES: ReadonlySet<SubscriptionStatus> = new Set<SubscriptionStatus>([
  'active',
  'grace_period',
]);

// Elapsed hours, not calendar days
const EXPIRING_SOON_HOURS = 7 * 24;

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const timestampSchema = z.string().datetime({ offset: true });

const storeSchema = z.enum(['app_store', 'play_store', 'stripe', 'promotional']);

const subscriptionStatusSchema = z.enum([
  'active',
  'cancelled',
  'expired',
  'billing_retry',
  'grace_period',
  'paused',
  'pending',
]);

const STORE_FROM_WIRE = {
  APP_STORE: 'app_store',
  PLAY_STORE: 'play_store',
  STRIPE: 'stripe',
  PROMOTIONAL: 'promotional',
} as const satisfies Record<string, Store>;

const wireStoreSchema = z
  .enum(['APP_STORE', 'PLAY_STORE', 'STRIPE', 'PROMOTIONAL'])
  .transform((value) => STORE_FROM_WIRE[value]);

const wireEntitlementSchema = z
  .object({
    isActive: z.boolean(),
    productId: z.string(),
    expiresDate: timestampSchema.nullish(),
    willRenew: z.boolean().nullish(),
    store: wireStoreSchema.nullish(),
  })
  .transform(
    (wire): Entitlement => ({
      isActive: wire.isActive,
      productId: wire.productId,
      expiresAt: wire.expiresDate ?? null,
      willRenew: wire.willRenew ?? false,
      store: wire.store ?? null,
    })
  );

const wireSubscriptionSchema = z
  .object({
    productId: z.string(),
    status: subscriptionStatusSchema,
    store: wireStoreSchema,
    purchaseDate: timestampSchema.nullish(),
    expiresDate: timestampSchema.nullish(),
    willRenew: z.boolean().nullish(),
    price: z.number().nullish(),
    currency: z.string().nullish(),
  })
  .transform(
    (wire): SubscriptionInfo => ({
      productId: wire.productId,
      status: wire.status,
      store: wire.store,
      purchaseDate: wire.purchaseDate ?? null,
      expiresDate: wire.expiresDate ?? null,
      willRenew: wire.willRenew ?? false,
      price: wire.price ?? null,
      currency: wire.currency ?? null,
    })
  );

/**
 * Snapshot as the remote API sends it.
 */
export const wireCustomerSnapshotSchema = z
  .object({
    userId: z.string(),
    originalAppUserId: z.string().nullish(),
    entitlements: z.record(wireEntitlementSchema),
    activeSubscriptions: z.array(z.string()),
    allPurchasedProductIds: z.array(z.string()),
    latestExpirationDate: timestampSchema.nullish(),
    managementURL: z.string().url().nullish(),
    firstSeen: timestampSchema.nullish(),
    lastSeen: timestampSchema.nullish(),
    subscriptions: z.array(wireSubscriptionSchema).nullish(),
  })
  .transform(
    (wire): CustomerSnapshot => ({
      userId: wire.userId,
      originalUserId: wire.originalAppUserId ?? null,
      entitlements: wire.entitlements,
      activeSubscriptionIds: wire.activeSubscriptions,
      allPurchasedProductIds: wire.allPurchasedProductIds,
      latestExpiration: wire.latestExpirationDate ?? null,
      managementUrl: wire.managementURL ?? null,
      firstSeen: wire.firstSeen ?? null,
      lastSeen: wire.lastSeen ?? null,
      subscriptionDetails: wire.subscriptions ?? null,
    })
  );

export const wireTransactionDetailsSchema = z
  .object({
    transactionId: z.string(),
    originalTransactionId: z.string(),
    productId: z.string(),
    purchaseDate: timestampSchema.nullish(),
    expiresDate: timestampSchema.nullish(),
    environment: z.string().nullish(),
  })
  .transform(
    (wire): TransactionDetails => ({
      transactionId: wire.transactionId,
      originalTransactionId: wire.originalTransactionId,
      productId: wire.productId,
      purchaseDate: wire.purchaseDate ?? null,
      expiresDate: wire.expiresDate ?? null,
      environment: wire.environment ?? null,
    })
  );

const entitlementSchema = z.object({
  isActive: z.boolean(),
  productId: z.string(),
  expiresAt: timestampSchema.nullable(),
  willRenew: z.boolean(),
  store: storeSchema.nullable(),
});

const subscriptionInfoSchema = z.object({
  productId: z.string(),
  status: subscriptionStatusSchema,
  store: storeSchema,
  purchaseDate: timestampSchema.nullable(),
  expiresDate: timestampSchema.nullable(),
  willRenew: z.boolean(),
  price: z.number().nullable(),
  currency: z.string().nullable(),
});

/**
 * Snapshot in model form, as persisted by the local cache.
 */
export const customerSnapshotSchema: z.ZodType<CustomerSnapshot, z.ZodTypeDef, unknown> = z.object({
  userId: z.string(),
  originalUserId: z.string().nullable(),
  entitlements: z.record(entitlementSchema),
  activeSubscriptionIds: z.array(z.string()),
  allPurchasedProductIds: z.array(z.string()),
  latestExpiration: timestampSchema.nullable(),
  managementUrl: z.string().nullable(),
  firstSeen: timestampSchema.nullable(),
  lastSeen: timestampSchema.nullable(),
  subscriptionDetails: z.array(subscriptionInfoSchema).nullable(),
});

// ---------------------------------------------------------------------------
// Derived values
// ---------------------------------------------------------------------------

/**
 * Snapshot for a user the server does not know yet.
 */
export function emptySnapshot(userId: string): CustomerSnapshot {
  return {
    userId,
    originalUserId: null,
    entitlements: {},
    activeSubscriptionIds: [],
    allPurchasedProductIds: [],
    latestExpiration: null,
    managementUrl: null,
    firstSeen: null,
    lastSeen: null,
    subscriptionDetails: null,
  };
}

export function isEntitled(snapshot: CustomerSnapshot, entitlementId: string): boolean {
  return Object.prototype.hasOwnProperty.call(snapshot.entitlements, entitlementId)
    ? snapshot.entitlements[entitlementId].isActive
    : false;
}

export function hasActiveSubscription(snapshot: CustomerSnapshot): boolean {
  return snapshot.activeSubscriptionIds.length > 0;
}

/**
 * True when any entitlement is active, whatever `activeSubscriptionIds` says.
 */
export function hasAnyEntitlement(snapshot: CustomerSnapshot): boolean {
  return Object.values(snapshot.entitlements).some((entitlement) => entitlement.isActive);
}

export function activeEntitlementIds(snapshot: CustomerSnapshot): string[] {
  return Object.entries(snapshot.entitlements)
    .filter(([, entitlement]) => entitlement.isActive)
    .map(([id]) => id);
}

/**
 * Expiry is set, still in the future, and less than 7 × 24 hours away.
 */
export function isExpiringSoon(entitlement: Entitlement, now: number = Date.now()): boolean {
  if (!entitlement.expiresAt) {
    return false;
  }
  const expiresAt = parseISO(entitlement.expiresAt);
  const current = new Date(now);
  return isAfter(expiresAt, current) && isBefore(expiresAt, addHours(current, EXPIRING_SOON_HOURS));
}

/**
 * Milliseconds until expiry (negative once past), or null for lifetime access.
 */
export function timeRemaining(entitlement: Entitlement, now: number = Date.now()): number | null {
  if (!entitlement.expiresAt) {
    return null;
  }
  return parseISO(entitlement.expiresAt).getTime() - now;
}

export function subscriptionStatusGrantsAccess(status: SubscriptionStatus): boolean {
  return ACCESS_GRANTING_STATUSES.has(status);
}
