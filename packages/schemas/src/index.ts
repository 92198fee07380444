export {
  ApiErrorSchema,
  CertificateResponseSchema,
  ContentHostingConfigurationResponseSchema,
  HealthResponseSchema,
  PurgeRequestSchema,
  PurgeResponseSchema,
  RedirectAllocateRequestSchema,
  RedirectAllocateResponseSchema,
  RedirectResolveQuerySchema,
  RedirectResolveResponseSchema,
  ResourceListResponseSchema,
  type ApiError,
  type CertificateResponse,
  type HealthResponse,
  type PurgeRequest,
  type PurgeResponse,
  type RedirectAllocateRequest,
  type RedirectAllocateResponse,
  type RedirectResolveQuery,
  type RedirectResolveResponse
} from './api';
export {
  CertificateMaterialSchema,
  type CertificateMaterial,
  type CertificateReference
} from './certificates';
export {
  CertificateIdSchema,
  ContentHostingConfigurationSchema,
  DistributionConfigurationSchema,
  HTTP_PULL_INGEST_PROTOCOL,
  IngestConfigurationSchema,
  normalizePathPrefix,
  PathPrefixSchema,
  PathRewriteRuleSchema,
  ProvisioningSessionIdSchema,
  type ContentHostingConfiguration,
  type ContentHostingConfigurationInput,
  type DistributionConfiguration,
  type IngestConfiguration,
  type PathRewriteRule,
  type ProvisioningSession
} from './contentHosting';
export {LogEventSchema, type LogEvent} from './logEvent';
