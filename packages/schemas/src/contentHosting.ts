import {z} from 'zod';

export const HTTP_PULL_INGEST_PROTOCOL = 'urn:3gpp:5gms:content-protocol:http-pull-ingest';

const NonEmptyStringSchema = z.string().trim().min(1);

const UNSAFE_DIRECTIVE_CHARACTERS = /["\n\r;{}]/u;

const isSafeDirectiveValue = (value: string) => !UNSAFE_DIRECTIVE_CHARACTERS.test(value);

const compilesAsRegex = (pattern: string) => {
  try {
    new RegExp(pattern, 'u');
    return true;
  } catch {
    return false;
  }
};

export const normalizePathPrefix = (value: string) => {
  const withLeading = value.startsWith('/') ? value : `/${value}`;
  return withLeading.endsWith('/') ? withLeading : `${withLeading}/`;
};

export const PathPrefixSchema = NonEmptyStringSchema.refine(value => !/\s/u.test(value), {
  message: 'Path prefix must not contain whitespace'
})
  .refine(isSafeDirectiveValue, {message: 'Path prefix contains unsupported characters'})
  .transform(normalizePathPrefix);

const HttpUrlSchema = z.url().refine(
  value => {
    const protocol = new URL(value).protocol;
    return protocol === 'http:' || protocol === 'https:';
  },
  {message: 'URL must use http or https'}
);

const DomainNameSchema = NonEmptyStringSchema.regex(/^[A-Za-z0-9*](?:[A-Za-z0-9.-]*[A-Za-z0-9])?$/u, {
  message: 'Invalid domain name'
});

export const IngestConfigurationSchema = z
  .object({
    ingestId: NonEmptyStringSchema,
    pull: z.literal(true),
    protocol: z.literal(HTTP_PULL_INGEST_PROTOCOL),
    baseURL: HttpUrlSchema.refine(isSafeDirectiveValue, {message: 'Ingest baseURL contains unsupported characters'})
  })
  .strict();

export const PathRewriteRuleSchema = z
  .object({
    requestPattern: NonEmptyStringSchema.refine(compilesAsRegex, {message: 'requestPattern is not a valid regular expression'})
      .refine(isSafeDirectiveValue, {message: 'requestPattern contains unsupported characters'}),
    mappedPath: z.string().refine(isSafeDirectiveValue, {message: 'mappedPath contains unsupported characters'})
  })
  .strict();

export const DistributionConfigurationSchema = z
  .object({
    pathPrefix: PathPrefixSchema,
    canonicalDomainName: DomainNameSchema.optional(),
    domainNameAlias: DomainNameSchema.optional(),
    certificateId: NonEmptyStringSchema.optional(),
    ingestId: NonEmptyStringSchema.optional(),
    documentRoot: NonEmptyStringSchema.refine(value => value.startsWith('/'), {
      message: 'documentRoot must be an absolute path'
    })
      .refine(isSafeDirectiveValue, {message: 'documentRoot contains unsupported characters'})
      .optional(),
    pathRewriteRules: z.array(PathRewriteRuleSchema).optional()
  })
  .strict()
  .refine(value => !(value.ingestId && value.documentRoot), {
    message: 'A distribution configuration takes either ingestId or documentRoot, not both'
  });

export const ContentHostingConfigurationSchema = z
  .object({
    name: NonEmptyStringSchema,
    ingestConfigurations: z.array(IngestConfigurationSchema).default([]),
    distributionConfigurations: z.array(DistributionConfigurationSchema).min(1)
  })
  .strict();

export const ProvisioningSessionIdSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._~-]+$/u, {
    message: 'Provisioning session id may only contain unreserved URL characters'
  });

export const CertificateIdSchema = z
  .string()
  .min(1)
  .max(256)
  .regex(/^[A-Za-z0-9._~:-]+$/u, {
    message: 'Certificate id may only contain unreserved URL characters and ":"'
  });

export type IngestConfiguration = z.infer<typeof IngestConfigurationSchema>;
export type PathRewriteRule = z.infer<typeof PathRewriteRuleSchema>;
export type DistributionConfiguration = z.infer<typeof DistributionConfigurationSchema>;
export type ContentHostingConfiguration = z.infer<typeof ContentHostingConfigurationSchema>;
export type ContentHostingConfigurationInput = z.input<typeof ContentHostingConfigurationSchema>;

export type ProvisioningSession = {
  sessionId: string;
  configuration: ContentHostingConfiguration;
};
