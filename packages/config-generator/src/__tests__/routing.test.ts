import {
  ContentHostingConfigurationSchema,
  HTTP_PULL_INGEST_PROTOCOL,
  type ProvisioningSession
} from '@hostplane/schemas';
import {describe, expect, it} from 'vitest';

import {
  buildRoutingTable,
  ConfigGenerationError,
  countCaptureGroups,
  matchStaticRoute,
  transformRewriteRule
} from '../index';

const sessions: ProvisioningSession[] = [
  {
    sessionId: 'A',
    configuration: ContentHostingConfigurationSchema.parse({
      name: 'outer',
      ingestConfigurations: [
        {ingestId: 'one', pull: true, protocol: HTTP_PULL_INGEST_PROTOCOL, baseURL: 'https://one.example'},
        {ingestId: 'two', pull: true, protocol: HTTP_PULL_INGEST_PROTOCOL, baseURL: 'https://two.example/x/'}
      ],
      distributionConfigurations: [
        {pathPrefix: '/a/', ingestId: 'one'},
        {pathPrefix: '/c/', ingestId: 'two', canonicalDomainName: 'Media.Example'}
      ]
    })
  },
  {
    sessionId: 'B',
    configuration: ContentHostingConfigurationSchema.parse({
      name: 'inner',
      distributionConfigurations: [{pathPrefix: '/a/b/', documentRoot: '/srv/b'}]
    })
  }
];

describe('buildRoutingTable', () => {
  it('orders routes by descending prefix length then lexically', () => {
    expect(buildRoutingTable(sessions).map(route => route.pathPrefix)).toEqual(['/a/b/', '/a/', '/c/']);
  });

  it('resolves targets and lowercases domain names', () => {
    const [inner, outer, named] = buildRoutingTable(sessions);
    expect(inner?.target).toEqual({kind: 'static', documentRoot: '/srv/b/'});
    expect(outer?.target).toEqual({kind: 'proxy', origin: 'https://one.example/'});
    expect(named?.domainNames).toEqual(['media.example']);
  });

  it('rejects a distribution that names no ingest among several', () => {
    const ambiguous: ProvisioningSession = {
      sessionId: 'Z',
      configuration: ContentHostingConfigurationSchema.parse({
        name: 'ambiguous',
        ingestConfigurations: [
          {ingestId: 'one', pull: true, protocol: HTTP_PULL_INGEST_PROTOCOL, baseURL: 'https://one.example/'},
          {ingestId: 'two', pull: true, protocol: HTTP_PULL_INGEST_PROTOCOL, baseURL: 'https://two.example/'}
        ],
        distributionConfigurations: [{pathPrefix: '/z/'}]
      })
    };

    expect(() => buildRoutingTable([ambiguous])).toThrow(ConfigGenerationError);
  });
});

describe('matchStaticRoute', () => {
  const routes = buildRoutingTable(sessions);

  it('routes through the longest matching prefix', () => {
    expect(matchStaticRoute(routes, '/a/b/c')).toEqual({
      sessionId: 'B',
      pathPrefix: '/a/b/',
      upstream: '/srv/b/',
      remainder: '/c'
    });
    expect(matchStaticRoute(routes, '/a/x/y.mp4')).toEqual({
      sessionId: 'A',
      pathPrefix: '/a/',
      upstream: 'https://one.example/',
      remainder: '/x/y.mp4'
    });
  });

  it('honours domain names when a host is given', () => {
    expect(matchStaticRoute(routes, '/c/file', {host: 'media.example'})?.upstream).toBe('https://two.example/x/');
    expect(matchStaticRoute(routes, '/c/file', {host: 'other.example'})).toBeNull();
  });

  it('returns null when nothing matches', () => {
    expect(matchStaticRoute(routes, '/missing/file')).toBeNull();
  });
});

describe('transformRewriteRule', () => {
  it('counts capture groups', () => {
    expect(countCaptureGroups('/a/(b)/(?:c)/(d)')).toBe(2);
    expect(countCaptureGroups('/plain/')).toBe(0);
  });

  it('keeps anchored patterns anchored and captures the final segment', () => {
    expect(transformRewriteRule('^/v1/(.*)/$', '/v2/$1/')).toEqual({
      regex: '^/v1/(.*)/([^/]*(?:#[^?/]*)?(?:\\?.*)?)$',
      replacement: '/v2/$1/$2'
    });
  });

  it('captures the leading and intermediate path for unanchored patterns', () => {
    expect(transformRewriteRule('/(low)/', '/high/')).toEqual({
      regex: '^(.*)/(low)/([^?#]*/)?([^/]*(?:#[^?/]*)?(?:\\?.*)?)$',
      replacement: '${1}/high/$3$4'
    });
  });

  it('rejects patterns that do not compile', () => {
    expect(() => transformRewriteRule('([a-z', '/x/')).toThrow(ConfigGenerationError);
  });
});
