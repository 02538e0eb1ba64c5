import { mkdir, open, readFile, rename, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { basename, dirname, join, resolve } from 'path';
import type { DeploymentRecord } from '../types';
import { parseDeploymentRecord } from './schema';
import type { StateStore } from './types';

/**
 * JSON file backed state store.
 *
 * `save` writes and fsyncs a temporary sibling file, then renames it over the
 * target: a crash mid-write leaves either the previous record or the new one.
 */
export class FileStateStore implements StateStore {
  readonly path: string;

  constructor(path: string) {
    this.path = resolve(path);
  }

  async load(): Promise<DeploymentRecord | null> {
    if (!existsSync(this.path)) {
      return null;
    }

    const content = await readFile(this.path, 'utf-8');
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new Error(`State file ${this.path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
      return parseDeploymentRecord(document);
    } catch (error) {
      throw new Error(`State file ${this.path} is corrupt: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async save(record: DeploymentRecord): Promise<void> {
    const dir = dirname(this.path);
    await mkdir(dir, { recursive: true });

    const tmpPath = join(dir, `.tmp.${basename(this.path)}.${process.pid}.${Date.now()}`);
    const file = await open(tmpPath, 'w');
    try {
      await file.writeFile(JSON.stringify(record, null, 2) + '\n', 'utf-8');
      await file.sync();
    } finally {
      await file.close();
    }
    await rename(tmpPath, this.path);
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }
}

/**
 * In-process store, used when a deployment record should not touch the disk.
 */
export class MemoryStateStore implements StateStore {
  private document: string | null = null;

  constructor(record?: DeploymentRecord) {
    if (record) {
      this.document = JSON.stringify(record);
    }
  }

  async load(): Promise<DeploymentRecord | null> {
    return this.document === null ? null : parseDeploymentRecord(JSON.parse(this.document));
  }

  async save(record: DeploymentRecord): Promise<void> {
    this.document = JSON.stringify(record);
  }

  async clear(): Promise<void> {
    this.document = null;
  }
}
