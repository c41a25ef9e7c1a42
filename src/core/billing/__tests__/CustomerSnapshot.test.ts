import {
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
  type Entitlement,
} from '../CustomerSnapshot';
import { buildSnapshot, wireSnapshot } from './fixtures';

const NOW = Date.parse('2026-01-15T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

function entitlementExpiringAt(expiresAt: string | null): Entitlement {
  return {
    isActive: true,
    productId: 'com.example.premium.monthly',
    expiresAt,
    willRenew: false,
    store: null,
  };
}

describe('CustomerSnapshot', () => {
  describe('entitlement checks', () => {
    const snapshot = buildSnapshot({
      entitlements: {
        premium: { ...entitlementExpiringAt(null), productId: 'com.example.premium' },
        pro: { ...entitlementExpiringAt(null), isActive: false, productId: 'com.example.pro' },
      },
      activeSubscriptionIds: ['com.example.premium'],
      allPurchasedProductIds: ['com.example.premium', 'com.example.pro'],
    });

    it('is entitled only to active entitlements', () => {
      expect(isEntitled(snapshot, 'premium')).toBe(true);
      expect(isEntitled(snapshot, 'pro')).toBe(false);
      expect(isEntitled(snapshot, 'nonexistent')).toBe(false);
    });

    it('does not treat inherited object keys as entitlements', () => {
      expect(isEntitled(snapshot, 'constructor')).toBe(false);
    });

    it('reports active subscriptions and entitlements', () => {
      expect(hasActiveSubscription(snapshot)).toBe(true);
      expect(hasAnyEntitlement(snapshot)).toBe(true);
      expect(activeEntitlementIds(snapshot)).toEqual(['premium']);
    });

    it('reports nothing for an empty snapshot', () => {
      const empty = emptySnapshot('user_123');

      expect(hasActiveSubscription(empty)).toBe(false);
      expect(hasAnyEntitlement(empty)).toBe(false);
      expect(activeEntitlementIds(empty)).toEqual([]);
    });

    it('evaluates active subscriptions independently of entitlements', () => {
      const subscriptionsOnly = buildSnapshot({ entitlements: {}, activeSubscriptionIds: ['com.example.premium'] });
      const entitlementsOnly = buildSnapshot({ activeSubscriptionIds: [] });

      expect(hasActiveSubscription(subscriptionsOnly)).toBe(true);
      expect(hasAnyEntitlement(subscriptionsOnly)).toBe(false);
      expect(hasActiveSubscription(entitlementsOnly)).toBe(false);
      expect(hasAnyEntitlement(entitlementsOnly)).toBe(true);
    });
  });

  describe('isExpiringSoon', () => {
    it('is true three days before expiry', () => {
      const entitlement = entitlementExpiringAt(new Date(NOW + 3 * DAY).toISOString());
      expect(isExpiringSoon(entitlement, NOW)).toBe(true);
    });

    it('is false thirty days before expiry', () => {
      const entitlement = entitlementExpiringAt(new Date(NOW + 30 * DAY).toISOString());
      expect(isExpiringSoon(entitlement, NOW)).toBe(false);
    });

    it('is false once expired', () => {
      const entitlement = entitlementExpiringAt(new Date(NOW - HOUR).toISOString());
      expect(isExpiringSoon(entitlement, NOW)).toBe(false);
    });

    it('is false without an expiry', () => {
      expect(isExpiringSoon(entitlementExpiringAt(null), NOW)).toBe(false);
    });

    it('excludes both boundaries', () => {
      expect(isExpiringSoon(entitlementExpiringAt(new Date(NOW).toISOString()), NOW)).toBe(false);
      expect(isExpiringSoon(entitlementExpiringAt(new Date(NOW + 7 * DAY).toISOString()), NOW)).toBe(false);
      expect(isExpiringSoon(entitlementExpiringAt(new Date(NOW + 7 * DAY - 1).toISOString()), NOW)).toBe(true);
    });

    it('measures the window in elapsed hours across a daylight saving change', () => {
      const previousTz = process.env.TZ;
      process.env.TZ = 'America/New_York';
      try {
        // US clocks move forward on 2026-03-08
        const beforeChange = Date.parse('2026-03-05T12:00:00.000Z');
        const justInside = new Date(beforeChange + 7 * DAY - 30 * 60 * 1000).toISOString();
        const justOutside = new Date(beforeChange + 7 * DAY + 60 * 1000).toISOString();

        expect(isExpiringSoon(entitlementExpiringAt(justInside), beforeChange)).toBe(true);
        expect(isExpiringSoon(entitlementExpiringAt(justOutside), beforeChange)).toBe(false);
      } finally {
        if (previousTz === undefined) {
          delete process.env.TZ;
        } else {
          process.env.TZ = previousTz;
        }
      }
    });
  });

  describe('timeRemaining', () => {
    it('returns milliseconds until expiry', () => {
      const entitlement = entitlementExpiringAt(new Date(NOW + 2 * HOUR).toISOString());
      expect(timeRemaining(entitlement, NOW)).toBe(2 * HOUR);
    });

    it('is negative after expiry and null for lifetime access', () => {
      expect(timeRemaining(entitlementExpiringAt(new Date(NOW - HOUR).toISOString()), NOW)).toBe(-HOUR);
      expect(timeRemaining(entitlementExpiringAt(null), NOW)).toBeNull();
    });
  });

  describe('subscriptionStatusGrantsAccess', () => {
    it('grants access for active and grace period only', () => {
      expect(subscriptionStatusGrantsAccess('active')).toBe(true);
      expect(subscriptionStatusGrantsAccess('grace_period')).toBe(true);
      expect(subscriptionStatusGrantsAccess('cancelled')).toBe(false);
      expect(subscriptionStatusGrantsAccess('expired')).toBe(false);
      expect(subscriptionStatusGrantsAccess('billing_retry')).toBe(false);
      expect(subscriptionStatusGrantsAccess('paused')).toBe(false);
      expect(subscriptionStatusGrantsAccess('pending')).toBe(false);
    });
  });

  describe('emptySnapshot', () => {
    it('is well formed for the requested user', () => {
      expect(emptySnapshot('$anonymous_abc')).toEqual({
        userId: '$anonymous_abc',
        originalUserId: null,
        entitlements: {},
        activeSubscriptionIds: [],
        allPurchasedProductIds: [],
        latestExpiration: null,
        managementUrl: null,
        firstSeen: null,
        lastSeen: null,
        subscriptionDetails: null,
      });
    });
  });

  describe('wire schema', () => {
    it('translates server keys and store names into the model', () => {
      const parsed = wireCustomerSnapshotSchema.parse(wireSnapshot('user_42'));

      expect(parsed).toEqual({
        userId: 'user_42',
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
        managementUrl: 'https://apps.example.com/account/subscriptions',
        firstSeen: '2025-12-01T00:00:00.000Z',
        lastSeen: '2026-01-01T00:00:00.000Z',
        subscriptionDetails: [
          {
            productId: 'com.example.premium.monthly',
            status: 'active',
            store: 'app_store',
            purchaseDate: '2026-01-01T00:00:00.000Z',
            expiresDate: '2026-02-01T00:00:00.000Z',
            willRenew: true,
            price: 4.99,
            currency: 'USD',
          },
        ],
      });
    });

    it('fills absent optional fields with defaults', () => {
      const parsed = wireCustomerSnapshotSchema.parse({
        userId: 'user_1',
        entitlements: { basic: { isActive: false, productId: 'com.example.basic' } },
        activeSubscriptions: [],
        allPurchasedProductIds: [],
      });

      expect(parsed.entitlements.basic).toEqual({
        isActive: false,
        productId: 'com.example.basic',
        expiresAt: null,
        willRenew: false,
        store: null,
      });
      expect(parsed.originalUserId).toBeNull();
      expect(parsed.subscriptionDetails).toBeNull();
    });

    it('rejects unknown stores and statuses', () => {
      const badStore = { ...wireSnapshot(), entitlements: { premium: { isActive: true, productId: 'p', store: 'MARS' } } };
      expect(wireCustomerSnapshotSchema.safeParse(badStore).success).toBe(false);

      const badStatus = {
        ...wireSnapshot(),
        subscriptions: [{ productId: 'p', status: 'frozen', store: 'STRIPE' }],
      };
      expect(wireCustomerSnapshotSchema.safeParse(badStatus).success).toBe(false);
    });
  });

  describe('cache schema', () => {
    it('accepts the model form', () => {
      const snapshot = buildSnapshot();
      expect(customerSnapshotSchema.parse(JSON.parse(JSON.stringify(snapshot)))).toEqual(snapshot);
    });

    it('rejects the wire form', () => {
      expect(customerSnapshotSchema.safeParse(wireSnapshot()).success).toBe(false);
    });
  });
});
