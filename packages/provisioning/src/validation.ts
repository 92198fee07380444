import {tlsGroupOf} from '@hostplane/config-generator';
import type {ContentHostingConfiguration} from '@hostplane/schemas';

export const findRecordIssues = (configuration: ContentHostingConfiguration): string[] => {
  const issues: string[] = [];
  const ingestIds = new Set<string>();

  configuration.ingestConfigurations.forEach((ingest, index) => {
    if (ingestIds.has(ingest.ingestId)) {
      issues.push(`ingestConfigurations.${index}.ingestId: duplicate ingest id ${ingest.ingestId}`);
    }
    ingestIds.add(ingest.ingestId);
  });

  const prefixes = new Set<string>();
  configuration.distributionConfigurations.forEach((distribution, index) => {
    const location = `distributionConfigurations.${index}`;
    if (prefixes.has(distribution.pathPrefix)) {
      issues.push(`${location}.pathPrefix: duplicate path prefix ${distribution.pathPrefix}`);
    }
    prefixes.add(distribution.pathPrefix);

    if (distribution.documentRoot) {
      return;
    }
    if (distribution.ingestId !== undefined) {
      if (!ingestIds.has(distribution.ingestId)) {
        issues.push(`${location}.ingestId: unknown ingest id ${distribution.ingestId}`);
      }
      return;
    }
    if (ingestIds.size !== 1) {
      issues.push(
        `${location}: names neither ingestId nor documentRoot and the record has ${ingestIds.size} ingest configurations`
      );
    }
  });

  return issues;
};

/**
 * Checks one session against the rest of the candidate state: certificate
 * references, prefixes shared on one virtual server, and domain names split
 * across TLS bundles.
 */
export const findStateIssues = ({
  sessions,
  sessionId,
  hasCertificate
}: {
  sessions: ReadonlyMap<string, ContentHostingConfiguration>;
  sessionId: string;
  hasCertificate: (certificateId: string) => boolean;
}): string[] => {
  const configuration = sessions.get(sessionId);
  if (!configuration) {
    return [];
  }

  const issues: string[] = [];
  const bundlesByDomain = new Map<string, Set<string>>();
  for (const other of sessions.values()) {
    for (const distribution of other.distributionConfigurations) {
      if (!distribution.certificateId) {
        continue;
      }
      for (const domain of [distribution.canonicalDomainName, distribution.domainNameAlias]) {
        if (domain === undefined) {
          continue;
        }
        const normalized = domain.toLowerCase();
        const bundles = bundlesByDomain.get(normalized) ?? new Set<string>();
        bundles.add(distribution.certificateId);
        bundlesByDomain.set(normalized, bundles);
      }
    }
  }

  configuration.distributionConfigurations.forEach((distribution, index) => {
    const location = `distributionConfigurations.${index}`;

    if (distribution.certificateId && !hasCertificate(distribution.certificateId)) {
      issues.push(`${location}.certificateId: unknown certificate ${distribution.certificateId}`);
    }

    for (const [otherId, other] of sessions) {
      if (otherId === sessionId) {
        continue;
      }
      const clash = other.distributionConfigurations.some(
        candidate =>
          candidate.pathPrefix === distribution.pathPrefix && tlsGroupOf(candidate) === tlsGroupOf(distribution)
      );
      if (clash) {
        issues.push(`${location}.pathPrefix: ${distribution.pathPrefix} is already served by session ${otherId}`);
      }
    }

    if (distribution.certificateId) {
      for (const domain of [distribution.canonicalDomainName, distribution.domainNameAlias]) {
        const bundles = domain === undefined ? undefined : bundlesByDomain.get(domain.toLowerCase());
        if (domain !== undefined && bundles && bundles.size > 1) {
          issues.push(`${location}: domain ${domain} would be served by certificates ${[...bundles].sort().join(', ')}`);
        }
      }
    }
  });

  return issues;
};
