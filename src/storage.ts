import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

const PARTIAL_SUFFIX = '.part';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

/**
 * Flat directory holding downloaded and merged documents by filename.
 * Partial writes live under a `.part` name and only become visible to
 * `has`/`list` once renamed into place.
 */
export class DocumentStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  pathOf(name: string): string {
    const p = path.join(this.root, name);
    if (path.dirname(p) !== this.root) {
      throw new Error(`Invalid document name: ${name}`);
    }
    return p;
  }

  has(name: string): boolean {
    try {
      return fs.statSync(this.pathOf(name)).isFile();
    } catch {
      return false;
    }
  }

  async list(): Promise<string[]> {
    ensureDir(this.root);
    const entries = await fs.promises.readdir(this.root, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && !e.name.endsWith(PARTIAL_SUFFIX))
      .map((e) => e.name)
      .sort();
  }

  async read(name: string): Promise<Uint8Array> {
    return fs.promises.readFile(this.pathOf(name));
  }

  async write(name: string, bytes: Uint8Array): Promise<string> {
    const tmp = this.downloadTarget(name);
    try {
      await fs.promises.writeFile(tmp, bytes);
      return await this.commit(tmp, name);
    } catch (err) {
      await this.discard(tmp);
      throw err;
    }
  }

  /** Temporary path for a write in progress; pass it to `commit` or `discard` afterwards. */
  downloadTarget(name: string): string {
    ensureDir(this.root);
    return this.pathOf(`${name}.${randomUUID()}${PARTIAL_SUFFIX}`);
  }

  async commit(tmpPath: string, name: string): Promise<string> {
    const finalPath = this.pathOf(name);
    await fs.promises.rename(tmpPath, finalPath);
    return finalPath;
  }

  async discard(tmpPath: string): Promise<void> {
    await fs.promises.rm(tmpPath, { force: true });
  }

  /** Deletes `name`; a file that is already gone counts as removed. */
  async remove(name: string): Promise<void> {
    try {
      await fs.promises.unlink(this.pathOf(name));
    } catch (err) {
      if (!isMissing(err)) throw err;
    }
  }
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
