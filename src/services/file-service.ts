/**
 * file-service.ts
 * Filesystem access for a run, rooted at the build base directory.
 *
 * Relative paths are resolved against the base directory, never against
 * process.cwd(), so a Bldfile outside the working directory behaves the
 * same as one inside it. Existence checks never throw.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export class FileService {
  private readonly _root: string;

  constructor(baseDir: string) {
    this._root = path.resolve(baseDir);
  }

  get root(): string {
    return this._root;
  }

  /** Absolute form of `relOrAbsPath`. */
  resolve(relOrAbsPath: string): string {
    return path.resolve(this._root, relOrAbsPath);
  }

  /**
   * Read a file as UTF-8 text.
   * Throws the underlying I/O error; callers map it to their own error.
   */
  readText(relOrAbsPath: string): string {
    return fs.readFileSync(this.resolve(relOrAbsPath), 'utf-8');
  }

  isDirectory(relOrAbsPath: string): boolean {
    return this._stat(relOrAbsPath)?.isDirectory() ?? false;
  }

  isFile(relOrAbsPath: string): boolean {
    return this._stat(relOrAbsPath)?.isFile() ?? false;
  }

  /** Regular file that the current process may execute. */
  isExecutableFile(relOrAbsPath: string): boolean {
    if (!this.isFile(relOrAbsPath)) return false;
    try {
      fs.accessSync(this.resolve(relOrAbsPath), fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  /** Create a directory and its parents. Throws on failure. */
  ensureDir(relOrAbsPath: string): void {
    fs.mkdirSync(this.resolve(relOrAbsPath), { recursive: true });
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _stat(relOrAbsPath: string): fs.Stats | undefined {
    try {
      return fs.statSync(this.resolve(relOrAbsPath), { throwIfNoEntry: false });
    } catch {
      return undefined;
    }
  }
}
