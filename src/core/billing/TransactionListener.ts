/**
 * Transaction Listener
 *
 * Long-lived loop over the store's transaction updates. Each verified
 * transaction is sent to the backend and finished only once the backend
 * accepted it; a failing update is logged and the loop moves on.
 */

import type { Logger } from '../logging/logger';
import type { StoreBilling, StoreTransaction, TransactionVerification } from './StoreBilling';

export type TransactionHandler = (transaction: StoreTransaction) => Promise<unknown>;

export class TransactionListener {
  private loop: Promise<void> | null = null;

  constructor(
    private readonly billing: StoreBilling,
    private readonly verify: TransactionHandler,
    private readonly logger: Logger
  ) {}

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Start listening. Later calls are ignored.
   */
  start(): void {
    if (this.loop) {
      this.logger.debug('Transaction listener already running');
      return;
    }
    this.loop = this.listen();
  }

  /**
   * Wait for the loop to end. The store must close the stream first
   * (StoreBilling.shutdown()).
   */
  async stop(): Promise<void> {
    await this.loop;
  }

  private async listen(): Promise<void> {
    this.logger.debug('Listening for transaction updates');
    try {
      for await (const update of this.billing.transactionUpdates()) {
        await this.process(update);
      }
      this.logger.debug('Transaction update stream closed');
    } catch (error) {
      this.logger.error('Transaction update stream failed:', error);
    }
  }

  private async process(update: TransactionVerification): Promise<void> {
    if (!update.verified) {
      this.logger.warn(
        `Dropping unverified transaction ${update.transaction.id}: ${update.reason ?? 'no reason given'}`
      );
      return;
    }

    const { transaction } = update;
    try {
      await this.verify(transaction);
      await this.billing.finish(transaction);
      this.logger.info(`Processed transaction update: ${transaction.id}`);
    } catch (error) {
      this.logger.error(`Failed to process transaction update ${transaction.id}:`, error);
    }
  }
}
