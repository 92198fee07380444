import {mkdir, readFile, rename, rm, writeFile} from 'node:fs/promises';
import {join} from 'node:path';

export type ArtifactPaths = {
  active: string;
  rollback: string;
  candidate: string;
};

const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * On-disk home of the proxy configuration: the active file the proxy runs
 * with, the previous one kept for rollback, and a transient candidate that is
 * either promoted or discarded.
 */
export class ArtifactStore {
  public readonly paths: ArtifactPaths;
  private readonly directory: string;

  public constructor({directory, fileName = 'proxy.conf'}: {directory: string; fileName?: string}) {
    this.directory = directory;
    this.paths = {
      active: join(directory, fileName),
      rollback: join(directory, `${fileName}.rollback`),
      candidate: join(directory, `${fileName}.candidate`)
    };
  }

  public async writeCandidate(text: string) {
    await mkdir(this.directory, {recursive: true});
    await writeFile(this.paths.candidate, text, 'utf8');
  }

  public async discardCandidate() {
    await rm(this.paths.candidate, {force: true});
  }

  /** Candidate becomes active; the old active, if any, becomes the rollback file. */
  public async promoteCandidate() {
    const hadActive = await this.exists(this.paths.active);
    if (hadActive) {
      await rename(this.paths.active, this.paths.rollback);
    } else {
      await rm(this.paths.rollback, {force: true});
    }
    try {
      await rename(this.paths.candidate, this.paths.active);
    } catch (error) {
      if (hadActive) {
        await rename(this.paths.rollback, this.paths.active);
      }
      throw error;
    }
  }

  /** Puts the rollback file back as active. Returns false when there is nothing to restore. */
  public async restoreRollback(): Promise<boolean> {
    if (!(await this.exists(this.paths.rollback))) {
      return false;
    }
    await rename(this.paths.rollback, this.paths.active);
    return true;
  }

  public async readActive(): Promise<string | null> {
    return this.read(this.paths.active);
  }

  public async readRollback(): Promise<string | null> {
    return this.read(this.paths.rollback);
  }

  private async read(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }

  private async exists(path: string) {
    return (await this.read(path)) !== null;
  }
}
