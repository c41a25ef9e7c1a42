/**
 * Offerings
 *
 * Named groups of purchasable packages, e.g. the product set of one paywall.
 */

import type { StoreProduct, SubscriptionPeriod } from './StoreBilling';

export type PackageType =
  | 'weekly'
  | 'monthly'
  | 'three_month'
  | 'six_month'
  | 'annual'
  | 'lifetime'
  | 'custom';

export interface Package {
  readonly product: StoreProduct;
  readonly packageType: PackageType;
}

export interface Offering {
  readonly identifier: string;
  readonly packages: readonly Package[];
}

export interface Offerings {
  /** Keyed by offering identifier, in load order */
  readonly all: Readonly<Record<string, Offering>>;
}

/**
 * Infer the package type from the product's subscription period.
 */
export function packageTypeOf(product: StoreProduct): PackageType {
  const period = product.subscriptionPeriod;
  if (!period) {
    return 'lifetime';
  }

  switch (period.unit) {
    case 'day':
      return period.value === 7 ? 'weekly' : 'custom';
    case 'week':
      return 'weekly';
    case 'month':
      if (period.value === 1) return 'monthly';
      if (period.value === 3) return 'three_month';
      if (period.value === 6) return 'six_month';
      return 'custom';
    case 'year':
      return 'annual';
  }
}

export function createPackage(product: StoreProduct): Package {
  return { product, packageType: packageTypeOf(product) };
}

export function createOffering(identifier: string, products: StoreProduct[]): Offering {
  return { identifier, packages: products.map(createPackage) };
}

function periodInMonths(period: SubscriptionPeriod): number {
  switch (period.unit) {
    case 'day':
      return period.value / 30;
    case 'week':
      return period.value / 4;
    case 'month':
      return period.value;
    case 'year':
      return period.value * 12;
  }
}

/**
 * Price normalised to one month, for comparing plans.
 * Days count as 1/30 month and weeks as 1/4.
 */
export function pricePerMonth(pkg: Package): number | null {
  const period = pkg.product.subscriptionPeriod;
  if (!period) {
    return null;
  }
  const months = periodInMonths(period);
  if (months <= 0) {
    return null;
  }
  return pkg.product.price / months;
}

/**
 * The monthly package if there is one, otherwise the first.
 */
export function mainPackage(offering: Offering): Package | null {
  return (
    offering.packages.find((pkg) => pkg.packageType === 'monthly') ?? offering.packages[0] ?? null
  );
}

export function packageOfType(offering: Offering, type: PackageType): Package | null {
  return offering.packages.find((pkg) => pkg.packageType === type) ?? null;
}

/**
 * The "default" offering if present, otherwise the first one loaded.
 */
export function currentOffering(offerings: Offerings): Offering | null {
  if (Object.prototype.hasOwnProperty.call(offerings.all, 'default')) {
    return offerings.all.default;
  }
  return Object.values(offerings.all)[0] ?? null;
}
