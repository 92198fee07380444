import {
  ContentHostingConfigurationSchema,
  HTTP_PULL_INGEST_PROTOCOL,
  type ContentHostingConfigurationInput,
  type IngestConfiguration,
  type ProvisioningSession
} from '@hostplane/schemas';
import {describe, expect, it} from 'vitest';

import {ConfigGenerationError, generateProxyConfiguration} from '../index';

const session = (sessionId: string, input: ContentHostingConfigurationInput): ProvisioningSession => ({
  sessionId,
  configuration: ContentHostingConfigurationSchema.parse(input)
});

const pullIngest = (baseURL: string): IngestConfiguration => ({
  ingestId: 'origin',
  pull: true as const,
  protocol: HTTP_PULL_INGEST_PROTOCOL,
  baseURL
});

const s1 = session('S1', {
  name: 'S1',
  ingestConfigurations: [pullIngest('https://origin.example/')],
  distributionConfigurations: [{pathPrefix: '/m4d/S1/', ingestId: 'origin'}]
});

describe('generateProxyConfiguration', () => {
  it('renders a proxy location for a pull-ingest distribution', () => {
    const artifact = generateProxyConfiguration({sessions: [s1], certificatePaths: {}});

    expect(artifact.text).toBe(
      [
        '# hostplane proxy configuration, generated',
        'pid /var/cache/hostplane/proxy/nginx.pid;',
        'error_log /var/log/hostplane/error.log;',
        '',
        'events {',
        '  worker_connections 1024;',
        '}',
        '',
        'http {',
        '  access_log /var/log/hostplane/access.log;',
        '  client_body_temp_path /var/cache/hostplane/proxy/client_body_temp;',
        '  proxy_temp_path /var/cache/hostplane/proxy/proxy_temp;',
        '  fastcgi_temp_path /var/cache/hostplane/proxy/fastcgi_temp;',
        '  uwsgi_temp_path /var/cache/hostplane/proxy/uwsgi_temp;',
        '  scgi_temp_path /var/cache/hostplane/proxy/scgi_temp;',
        '',
        '  server {',
        '    listen [::]:80;',
        '    server_name _;',
        '',
        '    location /m4d/S1/ {',
        '      proxy_pass https://origin.example/;',
        '    }',
        '',
        '    location / {',
        '      return 404;',
        '    }',
        '  }',
        '}',
        ''
      ].join('\n')
    );
    expect(artifact.version).toMatch(/^[0-9a-f]{16}$/u);
  });

  it('is byte-identical for identical state regardless of session order', () => {
    const s2 = session('S2', {
      name: 'S2',
      ingestConfigurations: [pullIngest('https://other.example/base')],
      distributionConfigurations: [{pathPrefix: '/m4d/S2/', canonicalDomainName: 'cdn.example'}]
    });

    const first = generateProxyConfiguration({sessions: [s1, s2], certificatePaths: {}});
    const second = generateProxyConfiguration({sessions: [s2, s1], certificatePaths: {}});

    expect(second.text).toBe(first.text);
    expect(second.version).toBe(first.version);
  });

  it('orders locations longest prefix first', () => {
    const nested = session('N', {
      name: 'nested',
      ingestConfigurations: [pullIngest('https://origin.example/')],
      distributionConfigurations: [
        {pathPrefix: '/a/', ingestId: 'origin'},
        {pathPrefix: '/a/b/', ingestId: 'origin'}
      ]
    });

    const {text, routes} = generateProxyConfiguration({sessions: [nested], certificatePaths: {}});

    expect(routes.map(route => route.pathPrefix)).toEqual(['/a/b/', '/a/']);
    expect(text.indexOf('location /a/b/ {')).toBeLessThan(text.indexOf('location /a/ {'));
  });

  it('groups TLS distributions into a server per certificate', () => {
    const secure = session('T1', {
      name: 'secure',
      ingestConfigurations: [pullIngest('https://origin.example/')],
      distributionConfigurations: [
        {pathPrefix: '/t/', canonicalDomainName: 'media.example', domainNameAlias: 'alt.example', certificateId: 'cert-1'}
      ]
    });

    const {text} = generateProxyConfiguration({
      sessions: [secure],
      certificatePaths: {'cert-1': '/var/cache/hostplane/certificates/cert-1.pem'},
      options: {httpsPort: 8443}
    });

    expect(text).toContain(
      [
        '  server {',
        '    listen [::]:8443 ssl;',
        '    server_name alt.example media.example;',
        '    ssl_certificate /var/cache/hostplane/certificates/cert-1.pem;',
        '    ssl_certificate_key /var/cache/hostplane/certificates/cert-1.pem;',
        '',
        '    location /t/ {',
        '      proxy_pass https://origin.example/;',
        '    }'
      ].join('\n')
    );
  });

  it('adds cache directives keyed by session when a cache directory is configured', () => {
    const {text} = generateProxyConfiguration({
      sessions: [s1],
      certificatePaths: {},
      options: {cacheDir: '/var/cache/hostplane/content'}
    });

    expect(text).toContain(
      '  proxy_cache_path /var/cache/hostplane/content levels=1:2 use_temp_path=on keys_zone=hostplane_cache:10m;\n'
    );
    expect(text).toContain(
      [
        '    location /m4d/S1/ {',
        '      proxy_pass https://origin.example/;',
        '      proxy_cache hostplane_cache;',
        '      proxy_cache_key "S1:u=$uri";',
        '    }'
      ].join('\n')
    );
  });

  it('routes proxy locations through the redirect lookup when a hook is configured', () => {
    const {text} = generateProxyConfiguration({
      sessions: [s1],
      certificatePaths: {},
      options: {
        redirectHook: {resolveUrl: 'http://127.0.0.1:7777/internal/v1/redirects/resolve', resolver: '127.0.0.53'}
      }
    });

    expect(text).toContain('  scgi_temp_path /var/cache/hostplane/proxy/scgi_temp;\n  resolver 127.0.0.53;\n');
    expect(text).toContain(
      [
        '    server_name _;',
        '',
        '    location = /_hostplane/redirects/resolve {',
        '      internal;',
        '      proxy_pass http://127.0.0.1:7777/internal/v1/redirects/resolve;',
        '    }',
        '',
        '    location /m4d/S1/ {',
        '      set $proxy_target "";',
        '      rewrite_by_lua_block {',
        '        local cjson = require "cjson.safe"',
        '        local response = ngx.location.capture("/_hostplane/redirects/resolve", {args = {path = ngx.var.uri, host = ngx.var.host}})',
        '        local route = response.status == 200 and cjson.decode(response.body) or nil',
        '        if not route or type(route.upstream) ~= "string" then',
        '          return ngx.exit(ngx.HTTP_BAD_GATEWAY)',
        '        end',
        '        local upstream = string.gsub(route.upstream, "/$", "")',
        '        ngx.var.proxy_target = upstream .. route.remainder .. ngx.var.is_args .. (ngx.var.args or "")',
        '      }',
        '      proxy_pass $proxy_target;',
        '    }'
      ].join('\n')
    );
    expect(text).not.toContain('proxy_pass https://origin.example/;');
  });

  it('leaves static locations and hookless configurations free of lookup directives', () => {
    const statics = session('D1', {
      name: 'static',
      distributionConfigurations: [{pathPrefix: '/', documentRoot: '/srv/www'}]
    });

    const hooked = generateProxyConfiguration({
      sessions: [statics],
      certificatePaths: {},
      options: {redirectHook: {resolveUrl: 'http://127.0.0.1:7777/internal/v1/redirects/resolve', resolver: '127.0.0.53'}}
    });
    const plain = generateProxyConfiguration({sessions: [s1], certificatePaths: {}});

    expect(hooked.text).toContain('    location / {\n      alias /srv/www/;\n    }');
    expect(hooked.text).not.toContain('rewrite_by_lua_block');
    expect(hooked.text).not.toContain('location = /_hostplane/redirects/resolve');
    expect(plain.text).not.toContain('lua');
    expect(plain.text).not.toContain('resolver');
  });

  it('rejects a redirect hook that is not an http URL', () => {
    expect(() =>
      generateProxyConfiguration({
        sessions: [s1],
        certificatePaths: {},
        options: {redirectHook: {resolveUrl: 'ftp://127.0.0.1/resolve', resolver: '127.0.0.53'}}
      })
    ).toThrow();
  });

  it('serves document roots statically and emits rewrite rules', () => {
    const statics = session('D1', {
      name: 'static',
      distributionConfigurations: [
        {pathPrefix: '/', documentRoot: '/srv/www', pathRewriteRules: [{requestPattern: '/low/', mappedPath: '/high/'}]}
      ]
    });

    const {text} = generateProxyConfiguration({sessions: [statics], certificatePaths: {}});

    expect(text).toContain(
      [
        '    location / {',
        '      rewrite "^(.*)/low/([^?#]*/)?([^/]*(?:#[^?/]*)?(?:\\?.*)?)$" "${1}/high/$2$3" break;',
        '      alias /srv/www/;',
        '    }'
      ].join('\n')
    );
    expect(text).not.toContain('return 404;');
  });

  it('rejects a TLS distribution without a cached certificate', () => {
    const secure = session('T1', {
      name: 'secure',
      ingestConfigurations: [pullIngest('https://origin.example/')],
      distributionConfigurations: [{pathPrefix: '/t/', certificateId: 'cert-9'}]
    });

    expect(() => generateProxyConfiguration({sessions: [secure], certificatePaths: {}})).toThrow(ConfigGenerationError);
  });

  it('rejects the same prefix twice on one server', () => {
    const other = session('S9', {
      name: 'clash',
      ingestConfigurations: [pullIngest('https://other.example/')],
      distributionConfigurations: [{pathPrefix: '/m4d/S1/'}]
    });

    expect(() => generateProxyConfiguration({sessions: [s1, other], certificatePaths: {}})).toThrow(
      /routed twice/u
    );
  });
});
