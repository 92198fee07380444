import type {ProvisioningSession} from '@hostplane/schemas';
import {z} from 'zod';

const NonEmptyStringSchema = z.string().trim().min(1);

const AbsolutePathSchema = NonEmptyStringSchema.refine(value => value.startsWith('/'), {
  message: 'Path must be absolute'
});

const ZoneNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/u);

const PortSchema = z.number().int().min(1).max(65_535);

/**
 * Per-request lookup of the redirect table. Proxy locations ask `resolveUrl`
 * where to send each request, which needs a Lua-capable build such as
 * OpenResty and a DNS `resolver` for origins named at run time.
 */
export const RedirectHookSchema = z
  .object({
    resolveUrl: z.url({protocol: /^https?$/u}),
    resolver: NonEmptyStringSchema
  })
  .strict();

export const GeneratorOptionsSchema = z
  .object({
    listenAddress: NonEmptyStringSchema.default('[::]'),
    httpPort: PortSchema.default(80),
    httpsPort: PortSchema.default(443),
    workDir: AbsolutePathSchema.default('/var/cache/hostplane/proxy'),
    errorLogPath: AbsolutePathSchema.default('/var/log/hostplane/error.log'),
    accessLogPath: AbsolutePathSchema.default('/var/log/hostplane/access.log'),
    cacheDir: AbsolutePathSchema.optional(),
    cacheZoneName: ZoneNameSchema.default('hostplane_cache'),
    redirectHook: RedirectHookSchema.optional()
  })
  .strict();

export type RedirectHook = z.infer<typeof RedirectHookSchema>;
export type GeneratorOptions = z.infer<typeof GeneratorOptionsSchema>;
export type GeneratorOptionsInput = z.input<typeof GeneratorOptionsSchema>;

export type RouteTarget =
  | {kind: 'proxy'; origin: string}
  | {kind: 'static'; documentRoot: string};

/** One location of the generated configuration, in match order. */
export type StaticRoute = {
  sessionId: string;
  pathPrefix: string;
  certificateId: string | null;
  domainNames: string[];
  target: RouteTarget;
};

export type StaticRouteMatch = {
  sessionId: string;
  pathPrefix: string;
  upstream: string;
  remainder: string;
};

export type GeneratorInput = {
  sessions: readonly ProvisioningSession[];
  certificatePaths: Readonly<Record<string, string>>;
  options?: GeneratorOptionsInput;
};

export type ProxyConfigurationArtifact = {
  text: string;
  version: string;
  routes: StaticRoute[];
};
