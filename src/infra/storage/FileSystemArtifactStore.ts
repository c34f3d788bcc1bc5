import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { ConfigError, StorageError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { ArtifactEntry, ArtifactStore } from './ArtifactStore.js';
import { WORKSPACE_ARTIFACT, artifactRef } from './ArtifactStore.js';

const SAFE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Artifact store on the local filesystem: `<root>/<jobId>/<name>`
 */
export class FileSystemArtifactStore implements ArtifactStore {
  private readonly root: string;

  constructor(rootPath: string) {
    this.root = path.resolve(rootPath);
    try {
      mkdirSync(this.root, { recursive: true });
    } catch (error) {
      throw new ConfigError('Artifact storage path is not usable', { path: this.root, error });
    }
  }

  async put(jobId: string, name: string, content: Buffer | string): Promise<string> {
    const ref = artifactRef(this.segment(jobId), this.segment(name));
    const target = this.resolve(ref);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
    } catch (error) {
      throw new StorageError('Failed to write artifact', { ref, error });
    }
    logger.debug('Artifact stored', { ref });
    return ref;
  }

  async read(ref: string): Promise<Buffer> {
    try {
      return await readFile(this.resolve(ref));
    } catch (error) {
      throw new StorageError('Failed to read artifact', { ref, error });
    }
  }

  async exists(ref: string): Promise<boolean> {
    try {
      const info = await stat(this.resolve(ref));
      return info.isFile();
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw new StorageError('Failed to inspect artifact', { ref, error });
    }
  }

  resolve(ref: string): string {
    const parts = ref.split('/');
    if (parts.length !== 2 || !parts.every((part) => SAFE_SEGMENT.test(part))) {
      throw new StorageError('Invalid artifact reference', { ref });
    }
    return path.join(this.root, parts[0], parts[1]);
  }

  async workspace(jobId: string): Promise<string> {
    const directory = path.join(this.root, this.segment(jobId), WORKSPACE_ARTIFACT);
    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      throw new StorageError('Failed to create job workspace', { jobId, error });
    }
    return directory;
  }

  async deleteJob(jobId: string): Promise<void> {
    const directory = path.join(this.root, this.segment(jobId));
    try {
      await rm(directory, { recursive: true, force: true });
    } catch (error) {
      throw new StorageError('Failed to delete job artifacts', { jobId, error });
    }
    logger.debug('Job artifacts deleted', { jobId });
  }

  async listJobEntries(): Promise<ArtifactEntry[]> {
    try {
      const entries = await readdir(this.root, { withFileTypes: true });
      const directories = entries.filter(
        (entry) => entry.isDirectory() && SAFE_SEGMENT.test(entry.name)
      );
      return await Promise.all(
        directories.map(async (entry) => {
          const info = await stat(path.join(this.root, entry.name));
          return { jobId: entry.name, modifiedAt: info.mtime };
        })
      );
    } catch (error) {
      throw new StorageError('Failed to list artifact directories', { error });
    }
  }

  private segment(value: string): string {
    if (!SAFE_SEGMENT.test(value)) {
      throw new StorageError('Invalid artifact path segment', { value });
    }
    return value;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
