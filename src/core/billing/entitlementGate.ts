import { isEntitled, type CustomerSnapshot } from './CustomerSnapshot';
import { SubscriptionError } from './SubscriptionError';

/**
 * Entitlement Gate
 *
 * Guards execution of premium features behind entitlement checks.
 * Pure function with no side effects (caller must handle the error).
 *
 * Usage:
 * ```ts
 * const report = entitlementGate(sync.customerInfo.get(), 'premium', () => {
 *   return buildReport(params);
 * });
 * ```
 *
 * @param snapshot Current customer snapshot, or null before the first sync
 * @param entitlementId Entitlement being accessed
 * @param block Function to execute if entitled
 * @returns Result of block execution
 * @throws SubscriptionError `no_active_subscription` if the entitlement is not active
 */
export function entitlementGate<T>(
  snapshot: CustomerSnapshot | null,
  entitlementId: string,
  block: () => T
): T {
  if (!snapshot || !isEntitled(snapshot, entitlementId)) {
    throw SubscriptionError.noActiveSubscription();
  }

  return block();
}
