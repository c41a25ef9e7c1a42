/**
 * Remote Sync Client
 *
 * Talks to the entitlement backend over axios:
 * - GET  /api/v1/customers/{userId}  → customer snapshot
 * - POST /api/v1/receipts/verify     → verify a store transaction
 *
 * Every transport or HTTP outcome is translated into a SubscriptionError.
 * No retries; callers own retry policy.
 */

import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { Logger } from '../logging/logger';
import {
  emptySnapshot,
  wireCustomerSnapshotSchema,
  wireTransactionDetailsSchema,
  type CustomerSnapshot,
  type TransactionDetails,
} from './CustomerSnapshot';
import { SubscriptionError } from './SubscriptionError';

export interface RemoteSyncConfig {
  apiKey: string;
  baseUrl: string;
  /** Request timeout in ms; 0 or unset leaves requests unbounded */
  timeoutMs?: number;
  /** Swap the transport, e.g. an in-process adapter in tests */
  adapter?: AxiosAdapter;
}

export interface VerificationOutcome {
  snapshot: CustomerSnapshot;
  transaction: TransactionDetails | null;
}

/**
 * The two calls the synchronizer needs from the backend.
 */
export interface RemoteSync {
  fetchSnapshot(userId: string): Promise<CustomerSnapshot>;
  verifyTransaction(transactionId: string, userId: string): Promise<VerificationOutcome>;
}

export const verifyReceiptRequestSchema = z.object({
  transactionId: z.string().min(1),
  appUserId: z.string().min(1),
});
export type VerifyReceiptRequest = z.infer<typeof verifyReceiptRequestSchema>;

export const customerInfoResponseSchema = z.object({
  customerInfo: wireCustomerSnapshotSchema,
});

export const verifyReceiptResponseSchema = z.object({
  success: z.boolean(),
  customerInfo: wireCustomerSnapshotSchema,
  transaction: wireTransactionDetailsSchema.nullish(),
});

export class RemoteSyncClient implements RemoteSync {
  private readonly http: AxiosInstance;

  constructor(config: RemoteSyncConfig, private readonly logger: Logger) {
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs ?? 0,
      headers: { Authorization: `Bearer ${config.apiKey}` },
      // Status codes are classified below, not by axios
      validateStatus: () => true,
      ...(config.adapter ? { adapter: config.adapter } : {}),
    });
  }

  async fetchSnapshot(userId: string): Promise<CustomerSnapshot> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(`/api/v1/customers/${encodeURIComponent(userId)}`);
    } catch (error) {
      this.logger.error(`Customer info request failed for ${userId}:`, error);
      throw SubscriptionError.networkError(error);
    }

    if (response.status === 404) {
      // Not-yet-known user
      return emptySnapshot(userId);
    }

    if (response.status !== 200) {
      this.logger.error(`Failed to fetch customer info: ${response.status}`);
      throw SubscriptionError.serverError(response.status);
    }

    const parsed = customerInfoResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.error('Malformed customer info payload:', parsed.error.message);
      throw SubscriptionError.networkError(parsed.error);
    }
    return parsed.data.customerInfo;
  }

  async verifyTransaction(transactionId: string, userId: string): Promise<VerificationOutcome> {
    const request = verifyReceiptRequestSchema.safeParse({ transactionId, appUserId: userId });
    if (!request.success) {
      throw SubscriptionError.verificationFailed(request.error);
    }
    const body: VerifyReceiptRequest = request.data;

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>('/api/v1/receipts/verify', body);
    } catch (error) {
      this.logger.error(`Verification request failed for transaction ${transactionId}:`, error);
      throw SubscriptionError.verificationFailed(error);
    }

    if (response.status !== 200) {
      this.logger.error(`Verification rejected for transaction ${transactionId}: ${response.status}`);
      throw SubscriptionError.verificationFailed();
    }

    const parsed = verifyReceiptResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.error('Malformed verification payload:', parsed.error.message);
      throw SubscriptionError.networkError(parsed.error);
    }

    if (!parsed.data.success) {
      this.logger.warn(`Server reported unsuccessful verification for ${transactionId}`);
      throw SubscriptionError.verificationFailed();
    }

    return {
      snapshot: parsed.data.customerInfo,
      transaction: parsed.data.transaction ?? null,
    };
  }
}
