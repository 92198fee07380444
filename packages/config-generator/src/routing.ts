import type {DistributionConfiguration, ProvisioningSession} from '@hostplane/schemas';

import type {RouteTarget, StaticRoute, StaticRouteMatch} from './contracts';
import {ConfigGenerationError} from './errors';

const withTrailingSlash = (value: string) => (value.endsWith('/') ? value : `${value}/`);

const compareText = (left: string, right: string) => (left < right ? -1 : left > right ? 1 : 0);

export const compareRoutes = (left: StaticRoute, right: StaticRoute) =>
  right.pathPrefix.length - left.pathPrefix.length ||
  compareText(left.pathPrefix, right.pathPrefix) ||
  compareText(left.sessionId, right.sessionId);

/** Virtual server a distribution lands on: its TLS bundle, or null for plain HTTP. */
export const tlsGroupOf = (distribution: Pick<DistributionConfiguration, 'certificateId'>): string | null =>
  distribution.certificateId ?? null;

const resolveTarget = (session: ProvisioningSession, distribution: DistributionConfiguration): RouteTarget => {
  if (distribution.documentRoot) {
    return {kind: 'static', documentRoot: withTrailingSlash(distribution.documentRoot)};
  }

  const ingests = session.configuration.ingestConfigurations;
  const ingest = distribution.ingestId
    ? ingests.find(candidate => candidate.ingestId === distribution.ingestId)
    : ingests.length === 1
      ? ingests[0]
      : undefined;

  if (!ingest) {
    throw new ConfigGenerationError(
      'ingest_unresolved',
      `Distribution ${distribution.pathPrefix} of session ${session.sessionId} has no ingest configuration or document root`
    );
  }

  return {kind: 'proxy', origin: withTrailingSlash(ingest.baseURL)};
};

const domainNamesOf = (distribution: DistributionConfiguration) =>
  [distribution.canonicalDomainName, distribution.domainNameAlias]
    .filter((name): name is string => typeof name === 'string')
    .map(name => name.toLowerCase());

export const buildRoutingTable = (sessions: readonly ProvisioningSession[]): StaticRoute[] => {
  const ordered = [...sessions].sort((left, right) => compareText(left.sessionId, right.sessionId));

  const routes = ordered.flatMap(session =>
    session.configuration.distributionConfigurations.map(
      (distribution): StaticRoute => ({
        sessionId: session.sessionId,
        pathPrefix: distribution.pathPrefix,
        certificateId: tlsGroupOf(distribution),
        domainNames: domainNamesOf(distribution),
        target: resolveTarget(session, distribution)
      })
    )
  );

  return routes.sort(compareRoutes);
};

/**
 * Longest-prefix match over a table from `buildRoutingTable`. When `host` is
 * given, routes bound to other domain names are skipped.
 */
export const matchStaticRoute = (
  routes: readonly StaticRoute[],
  path: string,
  {host}: {host?: string} = {}
): StaticRouteMatch | null => {
  const normalizedHost = host?.toLowerCase();
  const route = routes.find(
    candidate =>
      path.startsWith(candidate.pathPrefix) &&
      (normalizedHost === undefined ||
        candidate.domainNames.length === 0 ||
        candidate.domainNames.includes(normalizedHost))
  );

  if (!route) {
    return null;
  }

  return {
    sessionId: route.sessionId,
    pathPrefix: route.pathPrefix,
    upstream: route.target.kind === 'proxy' ? route.target.origin : route.target.documentRoot,
    remainder: path.slice(route.pathPrefix.length - 1)
  };
};
