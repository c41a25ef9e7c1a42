/**
 * Subscription Error
 *
 * The one error type public synchronizer operations reject with.
 * UI layers switch on `code`; `purchase_cancelled` is normally swallowed.
 */

export type SubscriptionErrorCode =
  | 'not_configured'
  | 'invalid_configuration'
  | 'purchase_cancelled'
  | 'purchase_pending'
  | 'verification_failed'
  | 'network_error'
  | 'server_error'
  | 'product_not_found'
  | 'no_active_subscription'
  | 'unknown';

interface SubscriptionErrorInit {
  statusCode?: number;
  productId?: string;
  cause?: unknown;
}

const RECOVERY_SUGGESTIONS: Record<SubscriptionErrorCode, string | null> = {
  not_configured: 'Call configure() during application start-up.',
  invalid_configuration: 'Check the options passed to configure().',
  purchase_cancelled: null,
  purchase_pending: 'The purchase requires approval. Please try again later.',
  verification_failed: 'Please try the purchase again or contact support.',
  network_error: 'Check your internet connection and try again.',
  server_error: 'Please try again later.',
  product_not_found: 'Ensure the product is configured in the store.',
  no_active_subscription: 'Subscribe to access this feature.',
  unknown: 'Please try again or contact support.',
};

export class SubscriptionError extends Error {
  public readonly code: SubscriptionErrorCode;
  public readonly statusCode: number | null;
  public readonly productId: string | null;

  constructor(code: SubscriptionErrorCode, message: string, init: SubscriptionErrorInit = {}) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'SubscriptionError';
    this.code = code;
    this.statusCode = init.statusCode ?? null;
    this.productId = init.productId ?? null;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SubscriptionError);
    }
  }

  get recoverySuggestion(): string | null {
    return RECOVERY_SUGGESTIONS[this.code];
  }

  static notConfigured(): SubscriptionError {
    return new SubscriptionError(
      'not_configured',
      'Entitlement sync has not been configured. Call configure() first.'
    );
  }

  static invalidConfiguration(cause?: unknown): SubscriptionError {
    return new SubscriptionError('invalid_configuration', 'Invalid configure() options.', { cause });
  }

  static purchaseCancelled(): SubscriptionError {
    return new SubscriptionError('purchase_cancelled', 'Purchase was cancelled.');
  }

  static purchasePending(): SubscriptionError {
    return new SubscriptionError('purchase_pending', 'Purchase is pending approval.');
  }

  static verificationFailed(cause?: unknown): SubscriptionError {
    return new SubscriptionError('verification_failed', 'Transaction verification failed.', { cause });
  }

  static networkError(cause?: unknown): SubscriptionError {
    return new SubscriptionError(
      'network_error',
      'Network request failed. Please check your connection.',
      { cause }
    );
  }

  static serverError(statusCode: number): SubscriptionError {
    return new SubscriptionError(
      'server_error',
      `Server error occurred (status: ${statusCode}).`,
      { statusCode }
    );
  }

  static productNotFound(productId: string): SubscriptionError {
    return new SubscriptionError('product_not_found', `Product not found: ${productId}`, { productId });
  }

  static noActiveSubscription(): SubscriptionError {
    return new SubscriptionError('no_active_subscription', 'No active subscription found.');
  }

  static unknown(cause?: unknown): SubscriptionError {
    return new SubscriptionError('unknown', 'An unknown error occurred.', { cause });
  }
}

export function isSubscriptionError(value: unknown): value is SubscriptionError {
  return value instanceof SubscriptionError;
}

/**
 * Pass a SubscriptionError through; wrap anything else as `unknown`.
 */
export function toSubscriptionError(value: unknown): SubscriptionError {
  return isSubscriptionError(value) ? value : SubscriptionError.unknown(value);
}

export function isCancellation(value: unknown): boolean {
  return isSubscriptionError(value) && value.code === 'purchase_cancelled';
}
