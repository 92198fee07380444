import type {StructuredLogger} from '@hostplane/logging';
import {z} from 'zod';

export const DEFAULT_REDIRECT_TTL_SECONDS = 120;

export const RedirectTableSettingsSchema = z
  .object({
    ttlSeconds: z.number().int().min(1).max(86_400).default(DEFAULT_REDIRECT_TTL_SECONDS),
    shardCount: z.number().int().min(1).max(1_024).default(16),
    sweepIntervalMs: z.number().int().min(0).max(3_600_000).default(1_000)
  })
  .strict();

export type RedirectTableSettings = z.infer<typeof RedirectTableSettingsSchema>;

export type RedirectTableOptions = Partial<RedirectTableSettings> & {
  now?: () => number;
  generateId?: () => string;
  logger?: StructuredLogger;
};

export type RedirectEntry = {
  key: string;
  upstreamPrefix: string;
  expiresAtMs: number;
};

/** Static routing answer used when no live redirect covers a path. */
export type RedirectFallback = {
  upstream: string | null;
  remainder: string;
};

export type RedirectResolution = RedirectFallback & {
  key: string | null;
};
