import {mkdir, readdir, readFile, rm, writeFile} from 'node:fs/promises';
import {join} from 'node:path';

const CERTIFICATE_SUFFIX = '.pem';

export type CertificateCache = {
  load: () => Promise<void>;
  has: (certificateId: string) => boolean;
  ids: () => string[];
  pathOf: (certificateId: string) => string | null;
  paths: () => Record<string, string>;
  read: (certificateId: string) => Promise<string | null>;
  write: (certificateId: string, material: string) => Promise<void>;
  remove: (certificateId: string) => Promise<void>;
};

const fileNameFor = (certificateId: string) => `${encodeURIComponent(certificateId)}${CERTIFICATE_SUFFIX}`;

const certificateIdFrom = (fileName: string) => {
  if (!fileName.endsWith(CERTIFICATE_SUFFIX)) {
    return null;
  }
  try {
    return decodeURIComponent(fileName.slice(0, -CERTIFICATE_SUFFIX.length));
  } catch {
    return null;
  }
};

const sortedRecord = (entries: Iterable<[string, string]>) =>
  Object.fromEntries([...entries].sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0)));

/**
 * Certificate material cached as PEM files the proxy reads directly. Files
 * already in the directory at startup are picked up by `load`.
 */
export class FileCertificateCache implements CertificateCache {
  private readonly known = new Map<string, string>();

  public constructor(private readonly directory: string) {}

  public async load() {
    await mkdir(this.directory, {recursive: true, mode: 0o700});
    this.known.clear();
    for (const entry of await readdir(this.directory, {withFileTypes: true})) {
      const certificateId = entry.isFile() ? certificateIdFrom(entry.name) : null;
      if (certificateId !== null) {
        this.known.set(certificateId, join(this.directory, entry.name));
      }
    }
  }

  public has(certificateId: string) {
    return this.known.has(certificateId);
  }

  public ids() {
    return [...this.known.keys()].sort();
  }

  public pathOf(certificateId: string) {
    return this.known.get(certificateId) ?? null;
  }

  public paths() {
    return sortedRecord(this.known.entries());
  }

  public async read(certificateId: string) {
    const path = this.known.get(certificateId);
    return path === undefined ? null : readFile(path, 'utf8');
  }

  public async write(certificateId: string, material: string) {
    const path = join(this.directory, fileNameFor(certificateId));
    await mkdir(this.directory, {recursive: true, mode: 0o700});
    await writeFile(path, material, {encoding: 'utf8', mode: 0o600});
    this.known.set(certificateId, path);
  }

  public async remove(certificateId: string) {
    const path = this.known.get(certificateId);
    if (path !== undefined) {
      await rm(path, {force: true});
      this.known.delete(certificateId);
    }
  }
}

export class MemoryCertificateCache implements CertificateCache {
  private readonly materials = new Map<string, string>();

  public constructor(private readonly directory = '/memory/certificates') {}

  public async load() {}

  public has(certificateId: string) {
    return this.materials.has(certificateId);
  }

  public ids() {
    return [...this.materials.keys()].sort();
  }

  public pathOf(certificateId: string) {
    return this.materials.has(certificateId) ? join(this.directory, fileNameFor(certificateId)) : null;
  }

  public paths() {
    return sortedRecord(this.ids().map((id): [string, string] => [id, join(this.directory, fileNameFor(id))]));
  }

  public async read(certificateId: string) {
    return this.materials.get(certificateId) ?? null;
  }

  public async write(certificateId: string, material: string) {
    this.materials.set(certificateId, material);
  }

  public async remove(certificateId: string) {
    this.materials.delete(certificateId);
  }
}
