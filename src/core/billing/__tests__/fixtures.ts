import type { CustomerSnapshot } from '../CustomerSnapshot';
import type { StoreProduct } from '../StoreBilling';

export function buildSnapshot(overrides: Partial<CustomerSnapshot> = {}): CustomerSnapshot {
  return {
    userId: 'user_123',
    originalUserId: null,
    entitlements: {
      premium: {
        isActive: true,
        productId: 'com.example.premium.monthly',
        expiresAt: '2026-02-01T00:00:00.000Z',
        willRenew: true,
        store: 'app_store',
      },
    },
    activeSubscriptionIds: ['com.example.premium.monthly'],
    allPurchasedProductIds: ['com.example.premium.monthly'],
    latestExpiration: '2026-02-01T00:00:00.000Z',
    managementUrl: null,
    firstSeen: '2025-12-01T00:00:00.000Z',
    lastSeen: '2026-01-01T00:00:00.000Z',
    subscriptionDetails: null,
    ...overrides,
  };
}

/**
 * Snapshot JSON as the backend sends it.
 */
export function wireSnapshot(userId = 'user_123'): Record<string, unknown> {
  return {
    userId,
    originalAppUserId: null,
    entitlements: {
      premium: {
        isActive: true,
        productId: 'com.example.premium.monthly',
        expiresDate: '2026-02-01T00:00:00.000Z',
        willRenew: true,
        store: 'APP_STORE',
      },
    },
    activeSubscriptions: ['com.example.premium.monthly'],
    allPurchasedProductIds: ['com.example.premium.monthly'],
    latestExpirationDate: '2026-02-01T00:00:00.000Z',
    managementURL: 'https://apps.example.com/account/subscriptions',
    firstSeen: '2025-12-01T00:00:00.000Z',
    lastSeen: '2026-01-01T00:00:00.000Z',
    subscriptions: [
      {
        productId: 'com.example.premium.monthly',
        status: 'active',
        store: 'APP_STORE',
        purchaseDate: '2026-01-01T00:00:00.000Z',
        expiresDate: '2026-02-01T00:00:00.000Z',
        willRenew: true,
        price: 4.99,
        currency: 'USD',
      },
    ],
  };
}

export const monthlyProduct: StoreProduct = {
  id: 'com.example.premium.monthly',
  displayName: 'Premium Monthly',
  displayPrice: '$4.99',
  price: 4.99,
  currencyCode: 'USD',
  subscriptionPeriod: { unit: 'month', value: 1 },
};

export const annualProduct: StoreProduct = {
  id: 'com.example.premium.annual',
  displayName: 'Premium Annual',
  displayPrice: '$48.00',
  price: 48,
  currencyCode: 'USD',
  subscriptionPeriod: { unit: 'year', value: 1 },
};

export const lifetimeProduct: StoreProduct = {
  id: 'com.example.premium.lifetime',
  displayName: 'Premium Lifetime',
  displayPrice: '$99.00',
  price: 99,
  currencyCode: 'USD',
  subscriptionPeriod: null,
};
