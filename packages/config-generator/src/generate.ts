import {createHash} from 'node:crypto';
import {posix} from 'node:path';

import {
  GeneratorOptionsSchema,
  type GeneratorInput,
  type GeneratorOptions,
  type ProxyConfigurationArtifact,
  type StaticRoute
} from './contracts';
import {ConfigGenerationError} from './errors';
import {bare, blank, block, directive, quoted, renderLines, type Line} from './render';
import {transformRewriteRule} from './rewrite';
import {buildRoutingTable} from './routing';

type ServerGroup = {
  certificateId: string | null;
  routes: StaticRoute[];
};

type RewriteRules = ReadonlyMap<string, readonly {requestPattern: string; mappedPath: string}[]>;

export const artifactVersion = (text: string) => createHash('sha256').update(text).digest('hex').slice(0, 16);

const REDIRECT_RESOLVE_LOCATION = '/_hostplane/redirects/resolve';

const redirectLookup = (depth: number): Line[] =>
  block(depth, 'rewrite_by_lua_block', [
    {depth: depth + 1, text: 'local cjson = require "cjson.safe"'},
    {
      depth: depth + 1,
      text: `local response = ngx.location.capture("${REDIRECT_RESOLVE_LOCATION}", {args = {path = ngx.var.uri, host = ngx.var.host}})`
    },
    {depth: depth + 1, text: 'local route = response.status == 200 and cjson.decode(response.body) or nil'},
    {depth: depth + 1, text: 'if not route or type(route.upstream) ~= "string" then'},
    {depth: depth + 2, text: 'return ngx.exit(ngx.HTTP_BAD_GATEWAY)'},
    {depth: depth + 1, text: 'end'},
    {depth: depth + 1, text: 'local upstream = string.gsub(route.upstream, "/$", "")'},
    {depth: depth + 1, text: 'ngx.var.proxy_target = upstream .. route.remainder .. ngx.var.is_args .. (ngx.var.args or "")'}
  ]);

const routeKey = (sessionId: string, pathPrefix: string) => `${sessionId}\n${pathPrefix}`;

const groupByTlsBundle = (routes: readonly StaticRoute[]): ServerGroup[] => {
  const groups = new Map<string | null, StaticRoute[]>([[null, []]]);
  for (const route of routes) {
    const group = groups.get(route.certificateId);
    if (group) {
      group.push(route);
    } else {
      groups.set(route.certificateId, [route]);
    }
  }

  return [...groups.entries()]
    .map(([certificateId, groupRoutes]) => ({certificateId, routes: groupRoutes}))
    .sort((left, right) => {
      if (left.certificateId === right.certificateId) return 0;
      if (left.certificateId === null) return -1;
      if (right.certificateId === null) return 1;
      return left.certificateId < right.certificateId ? -1 : 1;
    });
};

const renderLocation = ({
  route,
  rewrites,
  options
}: {
  route: StaticRoute;
  rewrites: RewriteRules;
  options: GeneratorOptions;
}): Line[] => {
  const body: Line[] = [];
  const hooked = route.target.kind === 'proxy' && options.redirectHook !== undefined;

  if (hooked) {
    body.push(directive(3, 'set $proxy_target ""'));
  }

  for (const rule of rewrites.get(routeKey(route.sessionId, route.pathPrefix)) ?? []) {
    const rewrite = transformRewriteRule(rule.requestPattern, rule.mappedPath);
    body.push(directive(3, `rewrite ${quoted('rewrite pattern', rewrite.regex)} ${quoted('rewrite replacement', rewrite.replacement)} break`));
  }

  if (route.target.kind === 'proxy') {
    if (hooked) {
      body.push(...redirectLookup(3), directive(3, 'proxy_pass $proxy_target'));
    } else {
      body.push(directive(3, `proxy_pass ${bare('origin', route.target.origin)}`));
    }
    if (options.cacheDir) {
      body.push(directive(3, `proxy_cache ${options.cacheZoneName}`));
      body.push(directive(3, `proxy_cache_key ${quoted('cache key', `${route.sessionId}:u=$uri`)}`));
    }
  } else {
    body.push(directive(3, `alias ${bare('document root', route.target.documentRoot)}`));
  }

  return block(2, `location ${bare('path prefix', route.pathPrefix)}`, body);
};

const renderServer = ({
  group,
  certificatePaths,
  rewrites,
  options
}: {
  group: ServerGroup;
  certificatePaths: Readonly<Record<string, string>>;
  rewrites: RewriteRules;
  options: GeneratorOptions;
}): Line[] => {
  const domainNames = [...new Set(group.routes.flatMap(route => route.domainNames))].sort();
  const body: Line[] = [];

  if (group.certificateId === null) {
    body.push(directive(2, `listen ${options.listenAddress}:${options.httpPort}`));
  } else {
    body.push(directive(2, `listen ${options.listenAddress}:${options.httpsPort} ssl`));
  }
  body.push(directive(2, `server_name ${domainNames.length > 0 ? domainNames.map(name => bare('domain name', name)).join(' ') : '_'}`));

  if (group.certificateId !== null) {
    const certificatePath = certificatePaths[group.certificateId];
    if (!certificatePath) {
      throw new ConfigGenerationError('certificate_path_missing', `No cached file for certificate ${group.certificateId}`);
    }
    body.push(directive(2, `ssl_certificate ${bare('certificate path', certificatePath)}`));
    body.push(directive(2, `ssl_certificate_key ${bare('certificate path', certificatePath)}`));
  }

  if (options.redirectHook && group.routes.some(route => route.target.kind === 'proxy')) {
    body.push(
      blank(),
      ...block(2, `location = ${REDIRECT_RESOLVE_LOCATION}`, [
        directive(3, 'internal'),
        directive(3, `proxy_pass ${bare('redirect resolve URL', options.redirectHook.resolveUrl)}`)
      ])
    );
  }

  const seenPrefixes = new Set<string>();
  for (const route of group.routes) {
    if (seenPrefixes.has(route.pathPrefix)) {
      throw new ConfigGenerationError(
        'duplicate_location',
        `Path prefix ${route.pathPrefix} is routed twice on the same server`
      );
    }
    seenPrefixes.add(route.pathPrefix);
    body.push(blank(), ...renderLocation({route, rewrites, options}));
  }

  if (!seenPrefixes.has('/')) {
    body.push(blank(), ...block(2, 'location /', [directive(3, 'return 404')]));
  }

  return block(1, 'server', body);
};

const collectRewrites = (input: GeneratorInput): RewriteRules => {
  const rewrites = new Map<string, readonly {requestPattern: string; mappedPath: string}[]>();
  for (const session of input.sessions) {
    for (const distribution of session.configuration.distributionConfigurations) {
      if (distribution.pathRewriteRules && distribution.pathRewriteRules.length > 0) {
        rewrites.set(routeKey(session.sessionId, distribution.pathPrefix), distribution.pathRewriteRules);
      }
    }
  }
  return rewrites;
};

/**
 * Renders the complete proxy configuration for a set of provisioning sessions.
 * Output depends only on the input, so identical state yields identical text
 * and version.
 */
export const generateProxyConfiguration = (input: GeneratorInput): ProxyConfigurationArtifact => {
  const options = GeneratorOptionsSchema.parse(input.options ?? {});
  const routes = buildRoutingTable(input.sessions);
  const rewrites = collectRewrites(input);
  const tempPath = (name: string) => bare('work directory', posix.join(options.workDir, name));

  const httpBody: Line[] = [
    directive(1, `access_log ${bare('access log path', options.accessLogPath)}`),
    directive(1, `client_body_temp_path ${tempPath('client_body_temp')}`),
    directive(1, `proxy_temp_path ${tempPath('proxy_temp')}`),
    directive(1, `fastcgi_temp_path ${tempPath('fastcgi_temp')}`),
    directive(1, `uwsgi_temp_path ${tempPath('uwsgi_temp')}`),
    directive(1, `scgi_temp_path ${tempPath('scgi_temp')}`)
  ];

  if (options.redirectHook) {
    httpBody.push(directive(1, `resolver ${bare('resolver', options.redirectHook.resolver)}`));
  }

  if (options.cacheDir) {
    httpBody.push(
      directive(
        1,
        `proxy_cache_path ${bare('cache directory', options.cacheDir)} levels=1:2 use_temp_path=on keys_zone=${options.cacheZoneName}:10m`
      )
    );
  }

  for (const group of groupByTlsBundle(routes)) {
    httpBody.push(blank(), ...renderServer({group, certificatePaths: input.certificatePaths, rewrites, options}));
  }

  const text = renderLines([
    {depth: 0, text: '# hostplane proxy configuration, generated'},
    directive(0, `pid ${tempPath('nginx.pid')}`),
    directive(0, `error_log ${bare('error log path', options.errorLogPath)}`),
    blank(),
    ...block(0, 'events', [directive(1, 'worker_connections 1024')]),
    blank(),
    ...block(0, 'http', httpBody)
  ]);

  return {text, version: artifactVersion(text), routes};
};
