/**
 * Flat directory of audio files addressed by bare file name. Names containing
 * path separators or parent references are rejected so clients cannot reach
 * outside the directory.
 */
import * as fs from 'fs';
import * as path from 'path';
import { getAudioInfo, type AudioInfo } from '../utils/audio';
import { isErrnoCode, NotFoundError, ValidationError } from '../utils/errors';
import { validateAudioFileName } from '../utils/validators';

export interface StoredFile {
  fileName: string;
  path: string;
  size: number;
  createdAt: string;
}

export class FileStore {
  constructor(
    readonly dir: string,
    private readonly label: string
  ) {}

  private ensureDir(): void {
    fs.mkdirSync(this.dir, { recursive: true });
  }

  /** Absolute path for a name, without checking existence. */
  pathFor(fileName: string): string {
    if (!fileName || path.basename(fileName) !== fileName || fileName === '.' || fileName === '..') {
      throw new ValidationError(`Invalid ${this.label} file name: ${fileName}`);
    }
    const name = validateAudioFileName(fileName);
    if (!name.valid) throw new ValidationError(name.message);
    return path.join(this.dir, fileName);
  }

  /** Absolute path of an existing file; NotFoundError otherwise. */
  resolve(fileName: string): string {
    const filePath = this.pathFor(fileName);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new NotFoundError(`${this.label} not found: ${fileName}`);
    }
    return filePath;
  }

  async write(fileName: string, data: Buffer): Promise<string> {
    const filePath = this.pathFor(fileName);
    this.ensureDir();
    await fs.promises.writeFile(filePath, data);
    return filePath;
  }

  async read(fileName: string): Promise<Buffer> {
    return fs.promises.readFile(this.resolve(fileName));
  }

  async info(fileName: string): Promise<AudioInfo> {
    return getAudioInfo(this.resolve(fileName));
  }

  async remove(fileName: string): Promise<void> {
    await fs.promises.unlink(this.resolve(fileName));
  }

  /** Audio files in the directory, newest first. */
  async list(): Promise<StoredFile[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (e) {
      if (isErrnoCode(e, 'ENOENT')) return [];
      throw e;
    }

    const files: StoredFile[] = [];
    for (const fileName of names) {
      if (!validateAudioFileName(fileName).valid) continue;
      const filePath = path.join(this.dir, fileName);
      const stat = await fs.promises.stat(filePath);
      if (!stat.isFile()) continue;
      files.push({ fileName, path: filePath, size: stat.size, createdAt: stat.mtime.toISOString() });
    }
    return files.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.fileName.localeCompare(a.fileName));
  }
}
