/**
 * Configuration
 *
 * Options accepted by EntitlementSynchronizer.configure(), validated with zod.
 */

import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.entitlement-sync.dev';

/**
 * Backend base URL: `ENTITLEMENT_SYNC_BASE_URL` when set, else production.
 */
export function defaultBaseUrl(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.ENTITLEMENT_SYNC_BASE_URL?.trim();
  return fromEnv ? fromEnv : DEFAULT_BASE_URL;
}

export const configureOptionsSchema = z.object({
  apiKey: z.string().trim().min(1, 'apiKey is required'),
  /** Application user id; omitted means anonymous */
  appUserId: z.string().trim().min(1).optional(),
  baseUrl: z.string().url().optional(),
  /** No value means no timeout beyond the transport's own */
  timeoutMs: z.number().int().nonnegative().optional(),
});

export type ConfigureOptions = z.input<typeof configureOptionsSchema>;

export interface ResolvedConfiguration {
  apiKey: string;
  appUserId: string | undefined;
  baseUrl: string;
  timeoutMs: number | undefined;
}

export function resolveConfiguration(
  options: ConfigureOptions,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfiguration {
  const parsed = configureOptionsSchema.parse(options);
  return {
    apiKey: parsed.apiKey,
    appUserId: parsed.appUserId,
    baseUrl: parsed.baseUrl ?? defaultBaseUrl(env),
    timeoutMs: parsed.timeoutMs,
  };
}
