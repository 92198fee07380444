import {z} from 'zod';

import {ContentHostingConfigurationSchema} from './contentHosting';

export const ApiErrorSchema = z
  .object({
    error: z.string().min(1),
    message: z.string().min(1),
    correlation_id: z.string().min(1)
  })
  .strict();

export const ResourceListResponseSchema = z.array(z.string().min(1));

export const ContentHostingConfigurationResponseSchema = ContentHostingConfigurationSchema;

export const PurgeRequestSchema = z
  .object({
    pattern: z.string().min(1).optional()
  })
  .strict();

export const PurgeResponseSchema = z
  .object({
    purged: z.number().int().gte(0)
  })
  .strict();

const RedirectPrefixSchema = z
  .string()
  .min(2)
  .refine(value => value.startsWith('/') && value.endsWith('/'), {
    message: 'Prefix must start and end with "/"'
  });

export const CertificateResponseSchema = z
  .object({
    certificate_id: z.string().min(1)
  })
  .strict();

export const RedirectAllocateRequestSchema = z
  .object({
    session_prefix: RedirectPrefixSchema,
    upstream_prefix: z.string().min(1).refine(value => value.endsWith('/'), {
      message: 'upstream_prefix must end with "/"'
    })
  })
  .strict();

export const RedirectAllocateResponseSchema = z
  .object({
    key: z.string().min(1)
  })
  .strict();

export const RedirectResolveQuerySchema = z
  .object({
    path: z.string().min(1).refine(value => value.startsWith('/'), {message: 'path must start with "/"'}),
    host: z.string().min(1).optional()
  })
  .strict();

export const RedirectResolveResponseSchema = z
  .object({
    upstream: z.string().nullable(),
    remainder: z.string(),
    redirected: z.boolean()
  })
  .strict();

export const HealthResponseSchema = z
  .object({
    status: z.enum(['ok', 'degraded']),
    proxy: z
      .object({
        state: z.enum(['stopped', 'starting', 'running', 'reloading', 'failed']),
        pid: z.number().int().nullable(),
        applied_version: z.string().nullable()
      })
      .strict()
  })
  .strict();

export type ApiError = z.infer<typeof ApiErrorSchema>;
export type CertificateResponse = z.infer<typeof CertificateResponseSchema>;
export type PurgeRequest = z.infer<typeof PurgeRequestSchema>;
export type PurgeResponse = z.infer<typeof PurgeResponseSchema>;
export type RedirectAllocateRequest = z.infer<typeof RedirectAllocateRequestSchema>;
export type RedirectAllocateResponse = z.infer<typeof RedirectAllocateResponseSchema>;
export type RedirectResolveQuery = z.infer<typeof RedirectResolveQuerySchema>;
export type RedirectResolveResponse = z.infer<typeof RedirectResolveResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
