export {
  GeneratorOptionsSchema,
  RedirectHookSchema,
  type GeneratorInput,
  type GeneratorOptions,
  type GeneratorOptionsInput,
  type ProxyConfigurationArtifact,
  type RedirectHook,
  type RouteTarget,
  type StaticRoute,
  type StaticRouteMatch
} from './contracts';
export {ConfigGenerationError, type ConfigGenerationErrorCode} from './errors';
export {artifactVersion, generateProxyConfiguration} from './generate';
export {buildRoutingTable, matchStaticRoute, tlsGroupOf} from './routing';
export {countCaptureGroups, transformRewriteRule, type NginxRewrite} from './rewrite';
