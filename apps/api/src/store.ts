import fs from 'fs/promises';
import path from 'path';
import { ConflictError, DataFormatError, NotFoundError } from './errors';
import { isDataFile, stripExt } from './ingest/csv';
import { VerificationStatus } from './types/schema';

const ASSET_CLASS_PATTERN = /^[a-z][a-z0-9_]*$/;

const isMissing = (err: unknown) => err instanceof Error && 'code' in err && err.code === 'ENOENT';

export type StoredFile = {
  fileName: string;
  tableName: string;
  size: number;
  modifiedAt: string;
};

/**
 * Uploaded data files on disk, laid out as
 * `{root}/{verified|unverified}/{asset_class}/{file}`. A file's stem is the
 * name of the raw table it loads into.
 */
export class FileStore {
  constructor(private readonly root: string) {}

  private statusDir(status: VerificationStatus) {
    return path.join(this.root, status);
  }

  private assetDir(status: VerificationStatus, assetClass: string) {
    if (!ASSET_CLASS_PATTERN.test(assetClass)) {
      throw new DataFormatError(`Invalid asset class '${assetClass}': use lowercase letters, digits and underscores`);
    }
    return path.join(this.statusDir(status), assetClass);
  }

  private filePath(status: VerificationStatus, assetClass: string, fileName: string) {
    if (path.basename(fileName) !== fileName || !isDataFile(fileName)) {
      throw new DataFormatError(`Invalid data file name '${fileName}'`);
    }
    return path.join(this.assetDir(status, assetClass), fileName);
  }

  private async requireAssetClass(status: VerificationStatus, assetClass: string) {
    const dir = this.assetDir(status, assetClass);
    try {
      await fs.access(dir);
    } catch {
      throw new NotFoundError(`Asset class '${assetClass}' not found`);
    }
    return dir;
  }

  async listAssetClasses(status: VerificationStatus): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.statusDir(status), { withFileTypes: true });
      return entries.filter(e => e.isDirectory()).map(e => e.name).sort();
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }

  async createAssetClass(status: VerificationStatus, assetClass: string) {
    const dir = this.assetDir(status, assetClass);
    const existing = await this.listAssetClasses(status);
    if (existing.includes(assetClass)) {
      throw new ConflictError(`Asset class '${assetClass}' already exists`);
    }
    await fs.mkdir(dir, { recursive: true });
  }

  async deleteAssetClass(status: VerificationStatus, assetClass: string) {
    const dir = await this.requireAssetClass(status, assetClass);
    const files = await fs.readdir(dir);
    if (files.length) {
      throw new ConflictError(`Asset class '${assetClass}' still holds ${files.length} file(s)`);
    }
    await fs.rmdir(dir);
  }

  async listFiles(status: VerificationStatus, assetClass: string): Promise<StoredFile[]> {
    const dir = await this.requireAssetClass(status, assetClass);
    const names = (await fs.readdir(dir)).filter(isDataFile).sort();
    return Promise.all(
      names.map(async fileName => {
        const stat = await fs.stat(path.join(dir, fileName));
        return {
          fileName,
          tableName: stripExt(fileName),
          size: stat.size,
          modifiedAt: stat.mtime.toISOString()
        };
      })
    );
  }

  async saveFile(status: VerificationStatus, assetClass: string, fileName: string, buffer: Buffer, overwrite = false) {
    const target = this.filePath(status, assetClass, fileName);
    await this.requireAssetClass(status, assetClass);
    const owner = await this.locateTable(status, stripExt(fileName));
    // raw tables are named by stem alone, so a stem belongs to one asset class
    if (owner && owner.assetClass !== assetClass) {
      throw new ConflictError(`Table '${stripExt(fileName)}' already belongs to asset class '${owner.assetClass}'`);
    }
    const existing = owner?.fileName ?? null;
    if (existing && !overwrite) {
      throw new ConflictError(`File for table '${stripExt(fileName)}' already exists in '${assetClass}'`);
    }
    // a stem maps to one raw table, so a differently-typed twin is replaced
    if (existing && existing !== fileName) {
      await fs.unlink(path.join(this.assetDir(status, assetClass), existing));
    }
    await fs.writeFile(target, buffer);
  }

  async readFile(status: VerificationStatus, assetClass: string, fileName: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.filePath(status, assetClass, fileName));
    } catch (err) {
      if (isMissing(err)) throw new NotFoundError(`File '${fileName}' not found in '${assetClass}'`);
      throw err;
    }
  }

  async writeFile(status: VerificationStatus, assetClass: string, fileName: string, buffer: Buffer) {
    await this.requireAssetClass(status, assetClass);
    await fs.writeFile(this.filePath(status, assetClass, fileName), buffer);
  }

  async deleteFile(status: VerificationStatus, assetClass: string, fileName: string) {
    try {
      await fs.unlink(this.filePath(status, assetClass, fileName));
    } catch (err) {
      if (isMissing(err)) throw new NotFoundError(`File '${fileName}' not found in '${assetClass}'`);
      throw err;
    }
  }

  /** File name backing `tableName` in an asset class, or null. */
  async findFile(status: VerificationStatus, assetClass: string, tableName: string): Promise<string | null> {
    const files = await this.listFiles(status, assetClass);
    return files.find(f => f.tableName === tableName)?.fileName ?? null;
  }

  /** Locates the asset class and file backing a raw table, searching every asset class. */
  async locateTable(status: VerificationStatus, tableName: string) {
    for (const assetClass of await this.listAssetClasses(status)) {
      const fileName = await this.findFile(status, assetClass, tableName);
      if (fileName) return { assetClass, fileName };
    }
    return null;
  }
}
