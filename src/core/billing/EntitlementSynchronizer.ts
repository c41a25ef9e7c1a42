/**
 * Entitlement Synchronizer
 *
 * Owns the in-memory customer snapshot and keeps it in step with the store
 * and the backend across configure, purchase, restore, login/logout and
 * refresh. The application constructs one instance and shares it.
 *
 * Rules:
 * - every operation but configure() rejects with `not_configured` until configured
 * - every successful fetch or verification replaces the snapshot and the cache
 *   (last completed response wins); responses for a replaced identity are dropped
 * - identity changes clear the cache before fetching
 * - forced operations (login, logout, restore, purchase) are awaited by the
 *   caller one at a time; nothing here serializes them
 */

import { createLogger, type Logger } from '../logging/logger';
import { resolveConfiguration, type ConfigureOptions, type ResolvedConfiguration } from '../config';
import { BackgroundTasks } from './BackgroundTasks';
import type { CustomerSnapshot } from './CustomerSnapshot';
import { CustomerSnapshotCache } from './CustomerSnapshotCache';
import { IdentityManager, isAnonymousId } from './IdentityManager';
import type { KeyValueStorage } from './KeyValueStorage';
import { ObservableValue, type Readable } from './ObservableValue';
import { createOffering, type Offering, type Offerings } from './Offerings';
import {
  RemoteSyncClient,
  type RemoteSync,
  type RemoteSyncConfig,
} from './RemoteSyncClient';
import type { PurchaseResult, StoreBilling, StoreProduct, StoreTransaction } from './StoreBilling';
import { SubscriptionError, toSubscriptionError } from './SubscriptionError';
import { TransactionListener } from './TransactionListener';

export type RemoteClientFactory = (config: RemoteSyncConfig, logger: Logger) => RemoteSync;

export interface EntitlementSynchronizerOptions {
  billing: StoreBilling;
  storage: KeyValueStorage;
  logger?: Logger;
  /** Time source for cache expiry (ms since epoch) */
  now?: () => number;
  /** Cache time-to-live; defaults to 5 minutes */
  cacheTtlMs?: number;
  /** Backend client factory; defaults to the axios RemoteSyncClient */
  createRemoteClient?: RemoteClientFactory;
  /** Source of the random part of anonymous ids */
  generateId?: () => string;
  env?: NodeJS.ProcessEnv;
}

interface Session {
  readonly remote: RemoteSync;
  appUserId: string;
}

const defaultRemoteClientFactory: RemoteClientFactory = (config, logger) =>
  new RemoteSyncClient(config, logger);

type FailedPurchase = Extract<PurchaseResult, { ok: false }>;

function purchaseFailure(result: FailedPurchase): SubscriptionError {
  switch (result.code) {
    case 'cancelled':
      return SubscriptionError.purchaseCancelled();
    case 'pending':
      return SubscriptionError.purchasePending();
    case 'unknown':
      return SubscriptionError.unknown(result.message);
  }
}

export class EntitlementSynchronizer {
  private readonly logger: Logger;
  private readonly remoteLogger: Logger;
  private readonly billing: StoreBilling;
  private readonly cache: CustomerSnapshotCache;
  private readonly identity: IdentityManager;
  private readonly tasks: BackgroundTasks;
  private readonly listener: TransactionListener;
  private readonly createRemoteClient: RemoteClientFactory;
  private readonly env: NodeJS.ProcessEnv;

  private readonly customerInfoState: ObservableValue<CustomerSnapshot | null>;
  private readonly isLoadingState: ObservableValue<boolean>;
  private readonly offeringsState: ObservableValue<Offerings | null>;

  private session: Session | null = null;
  private configuring: Promise<void> | null = null;

  constructor(options: EntitlementSynchronizerOptions) {
    const baseLogger = options.logger ?? createLogger();
    this.logger = baseLogger.withTag('EntitlementSync');
    this.remoteLogger = baseLogger.withTag('RemoteSync');
    this.billing = options.billing;
    this.createRemoteClient = options.createRemoteClient ?? defaultRemoteClientFactory;
    this.env = options.env ?? process.env;

    this.cache = new CustomerSnapshotCache(options.storage, baseLogger.withTag('SnapshotCache'), {
      ttlMs: options.cacheTtlMs,
      now: options.now,
    });
    this.identity = new IdentityManager(options.storage, baseLogger.withTag('Identity'), options.generateId);
    this.tasks = new BackgroundTasks(baseLogger.withTag('Tasks'));
    this.listener = new TransactionListener(
      this.billing,
      (transaction) => this.verifyForCurrentUser(transaction),
      baseLogger.withTag('TransactionListener')
    );

    const reportSubscriberError = (error: unknown): void => {
      this.logger.error('State subscriber threw:', error);
    };
    this.customerInfoState = new ObservableValue<CustomerSnapshot | null>(null, reportSubscriberError);
    this.isLoadingState = new ObservableValue(false, reportSubscriberError);
    this.offeringsState = new ObservableValue<Offerings | null>(null, reportSubscriberError);
  }

  // MARK: published state

  /** Latest snapshot, or null before the first cache hit / fetch */
  get customerInfo(): Readable<CustomerSnapshot | null> {
    return this.customerInfoState;
  }

  /** True while a purchase or restore is in flight */
  get isLoading(): Readable<boolean> {
    return this.isLoadingState;
  }

  get offerings(): Readable<Offerings | null> {
    return this.offeringsState;
  }

  get isConfigured(): boolean {
    return this.session !== null;
  }

  get appUserId(): string | null {
    return this.session?.appUserId ?? null;
  }

  get isAnonymous(): boolean {
    return this.session !== null && isAnonymousId(this.session.appUserId);
  }

  // MARK: configuration

  /**
   * Configure once. Seeds the snapshot from a fresh cache entry, starts the
   * transaction listener and schedules a background refresh, so subscribers
   * may see two updates. Later calls log a warning and change nothing.
   * Invalid options reject with `invalid_configuration`.
   */
  async configure(options: ConfigureOptions): Promise<void> {
    if (this.configuring) {
      this.logger.warn('Entitlement sync is already configured; ignoring configure()');
      return this.configuring;
    }

    let config: ResolvedConfiguration;
    try {
      config = resolveConfiguration(options, this.env);
    } catch (error) {
      throw SubscriptionError.invalidConfiguration(error);
    }
    this.configuring = this.applyConfiguration(config);
    return this.configuring;
  }

  private async applyConfiguration(config: ResolvedConfiguration): Promise<void> {
    const appUserId = config.appUserId ?? (await this.identity.resolveAnonymousId());
    const remote = this.createRemoteClient(
      { apiKey: config.apiKey, baseUrl: config.baseUrl, timeoutMs: config.timeoutMs },
      this.remoteLogger
    );
    const session: Session = { remote, appUserId };
    this.session = session;
    this.logger.info(`Configured for user: ${appUserId}`);

    this.listener.start();

    const cached = await this.cache.load();
    if (cached && cached.userId === session.appUserId) {
      this.customerInfoState.set(cached);
    } else if (cached) {
      this.logger.info(`Ignoring cached customer info of ${cached.userId}`);
      await this.cache.clear();
    }

    this.tasks.run('initial-refresh', () => this.fetchAndApply(session));
  }

  // MARK: identity

  /**
   * Switch to an application user id. Clears the cache and fetches.
   */
  async logIn(appUserId: string): Promise<CustomerSnapshot> {
    return this.run(async (session) => {
      await this.switchIdentity(session, appUserId);
      return this.fetchAndApply(session);
    });
  }

  /**
   * Switch to a brand-new anonymous id (never the persisted one).
   */
  async logOut(): Promise<CustomerSnapshot> {
    return this.run(async (session) => {
      await this.switchIdentity(session, this.identity.mintFreshAnonymousId());
      return this.fetchAndApply(session);
    });
  }

  // MARK: purchases

  async purchase(product: StoreProduct): Promise<CustomerSnapshot> {
    return this.run((session) =>
      this.withLoading(async () => {
        this.logger.info(`Starting purchase for product: ${product.id}`);

        const result = await this.billing.purchase(product);
        if (!result.ok) {
          this.logger.info(`Purchase of ${product.id} ended: ${result.code}`);
          throw purchaseFailure(result);
        }

        const { verification } = result;
        if (!verification.verified) {
          // Left unfinished so the store redelivers it
          this.logger.error(
            `Transaction ${verification.transaction.id} failed store verification: ${verification.reason ?? 'no reason given'}`
          );
          throw SubscriptionError.verificationFailed(verification.reason);
        }

        const snapshot = await this.verifyAndApply(session, verification.transaction);
        await this.finishTransaction(verification.transaction);

        this.logger.info(`Purchase successful for product: ${product.id}`);
        return snapshot;
      })
    );
  }

  /**
   * Look the product up in the store, then purchase it.
   */
  async purchaseProduct(productId: string): Promise<CustomerSnapshot> {
    return this.run(async () => {
      const products = await this.billing.getProducts([productId]);
      const product = products.find((candidate) => candidate.id === productId);
      if (!product) {
        throw SubscriptionError.productNotFound(productId);
      }
      return this.purchase(product);
    });
  }

  /**
   * Re-verify every transaction the store still considers entitling, then
   * fetch. Individual verification failures do not abort the restore.
   */
  async restorePurchases(): Promise<CustomerSnapshot> {
    return this.run((session) =>
      this.withLoading(async () => {
        this.logger.info('Restoring purchases...');

        await this.billing.sync();
        const entitled = await this.billing.currentEntitlements();

        for (const entry of entitled) {
          if (!entry.verified) {
            this.logger.warn(`Skipping unverified transaction ${entry.transaction.id} during restore`);
            continue;
          }
          try {
            await this.verifyAndApply(session, entry.transaction);
          } catch (error) {
            this.logger.warn(`Restore could not verify transaction ${entry.transaction.id}:`, error);
          }
        }

        const snapshot = await this.fetchAndApply(session);
        this.logger.info('Restore complete');
        return snapshot;
      })
    );
  }

  // MARK: customer info

  /**
   * With a snapshot in memory and no `forceNetwork`, return it at once and
   * refresh in the background. Otherwise fetch before returning.
   */
  async refresh(forceNetwork = false): Promise<CustomerSnapshot> {
    return this.run(async (session) => {
      const current = this.customerInfoState.get();
      if (current && !forceNetwork) {
        this.tasks.run('background-refresh', () => this.fetchAndApply(session));
        return current;
      }
      return this.fetchAndApply(session);
    });
  }

  async getCustomerInfo(): Promise<CustomerSnapshot> {
    return this.refresh(false);
  }

  // MARK: products & offerings

  async getProducts(productIds: string[]): Promise<StoreProduct[]> {
    return this.run(() => this.billing.getProducts(productIds));
  }

  /**
   * Build one offering per group. An empty group yields an empty offering.
   */
  async loadOfferings(groups: Record<string, string[]>): Promise<Offerings> {
    return this.run(async () => {
      const all: Record<string, Offering> = {};
      for (const [identifier, productIds] of Object.entries(groups)) {
        const products = productIds.length > 0 ? await this.billing.getProducts(productIds) : [];
        all[identifier] = createOffering(identifier, products);
      }

      const offerings: Offerings = { all };
      this.offeringsState.set(offerings);
      return offerings;
    });
  }

  // MARK: teardown

  /**
   * Resolves once no background refresh is pending.
   */
  whenIdle(): Promise<void> {
    return this.tasks.whenIdle();
  }

  /**
   * Close the store connection, then wait for the listener and background work.
   * When the store fails to close, only background work is awaited.
   */
  async shutdown(): Promise<void> {
    try {
      await this.billing.shutdown();
      await this.listener.stop();
    } catch (error) {
      // The update stream is still open, so the listener cannot end
      this.logger.error('Store shutdown failed; not waiting for the transaction listener:', error);
    }
    await this.tasks.whenIdle();
  }

  // MARK: internals

  private requireSession(): Session {
    if (!this.session) {
      throw SubscriptionError.notConfigured();
    }
    return this.session;
  }

  private async run<T>(work: (session: Session) => Promise<T>): Promise<T> {
    const session = this.requireSession();
    try {
      return await work(session);
    } catch (error) {
      throw toSubscriptionError(error);
    }
  }

  private async withLoading<T>(work: () => Promise<T>): Promise<T> {
    this.isLoadingState.set(true);
    try {
      return await work();
    } finally {
      this.isLoadingState.set(false);
    }
  }

  private async switchIdentity(session: Session, appUserId: string): Promise<void> {
    session.appUserId = appUserId;
    this.customerInfoState.set(null);
    await this.cache.clear();
    this.logger.info(`Switched user to ${appUserId}`);
  }

  private async fetchAndApply(session: Session): Promise<CustomerSnapshot> {
    const appUserId = session.appUserId;
    const snapshot = await session.remote.fetchSnapshot(appUserId);
    await this.applyFor(session, appUserId, snapshot);
    return snapshot;
  }

  private async verifyAndApply(session: Session, transaction: StoreTransaction): Promise<CustomerSnapshot> {
    const appUserId = session.appUserId;
    const outcome = await session.remote.verifyTransaction(transaction.id, appUserId);
    await this.applyFor(session, appUserId, outcome.snapshot);
    return outcome.snapshot;
  }

  /**
   * Apply a response only while the identity it was requested for is current.
   */
  private async applyFor(session: Session, requestedFor: string, snapshot: CustomerSnapshot): Promise<void> {
    if (session.appUserId !== requestedFor) {
      this.logger.debug(`Discarding customer info of ${requestedFor}; current user is ${session.appUserId}`);
      return;
    }
    await this.apply(snapshot);
  }

  private async verifyForCurrentUser(transaction: StoreTransaction): Promise<CustomerSnapshot> {
    return this.verifyAndApply(this.requireSession(), transaction);
  }

  private async apply(snapshot: CustomerSnapshot): Promise<void> {
    this.customerInfoState.set(snapshot);
    await this.cache.save(snapshot);
  }

  private async finishTransaction(transaction: StoreTransaction): Promise<void> {
    try {
      await this.billing.finish(transaction);
    } catch (error) {
      this.logger.warn(`Failed to finish transaction ${transaction.id}; the store will redeliver it:`, error);
    }
  }
}
