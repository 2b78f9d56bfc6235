/**
 * compiler-detector.ts
 * Locates the C++ compiler for the running platform on PATH.
 *
 * Candidates are tried in order; the first hit wins:
 *   - win32:          g++, then cl
 *   - everything else: g++
 */

import * as path from 'node:path';
import type { CompilerChoice } from '../models/build-file.js';
import { NoCompilerFoundError } from './build-errors.js';
import type { FileService } from './file-service.js';
import { SilentLogger } from './logger.js';
import type { Logger } from './logger.js';

export const POSIX_COMPILERS: readonly string[] = ['g++'];
export const WINDOWS_COMPILERS: readonly string[] = ['g++', 'cl'];

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

export interface CompilerDetectorOptions {
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export function compilerCandidates(platform: NodeJS.Platform): readonly string[] {
  return platform === 'win32' ? WINDOWS_COMPILERS : POSIX_COMPILERS;
}

export class CompilerDetector {
  private readonly _files: FileService;
  private readonly _platform: NodeJS.Platform;
  private readonly _env: NodeJS.ProcessEnv;
  private readonly _log: Logger;

  constructor(files: FileService, options: CompilerDetectorOptions = {}) {
    this._files = files;
    this._platform = options.platform ?? process.platform;
    this._env = options.env ?? process.env;
    this._log = options.logger ?? new SilentLogger();
  }

  /** First platform candidate found on PATH. Throws NoCompilerFoundError. */
  detect(): CompilerChoice {
    const candidates = compilerCandidates(this._platform);
    for (const name of candidates) {
      const found = this.which(name);
      if (found !== undefined) {
        this._log.info('Compiler detected', { name, path: found });
        return { name, path: found };
      }
      this._log.debug('Compiler candidate not on PATH', { name });
    }
    throw new NoCompilerFoundError(candidates, this._platform);
  }

  /** Resolve an explicit `--compiler` value. Throws NoCompilerFoundError. */
  resolveOverride(nameOrPath: string): CompilerChoice {
    const found = this.which(nameOrPath);
    if (found === undefined) {
      throw new NoCompilerFoundError([nameOrPath], this._platform);
    }
    this._log.info('Compiler override', { name: nameOrPath, path: found });
    return { name: nameOrPath, path: found };
  }

  /**
   * Absolute path of `command`, or undefined. A command containing a path
   * separator is checked directly instead of being searched on PATH.
   */
  which(command: string): string | undefined {
    if (command.includes('/') || command.includes('\\')) {
      return this._firstRunnable(this._files.resolve(command));
    }

    for (const dir of this._searchPath()) {
      const found = this._firstRunnable(path.join(dir, command));
      if (found !== undefined) return found;
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _searchPath(): string[] {
    const raw = this._platform === 'win32'
      ? this._env['PATH'] ?? this._env['Path'] ?? ''
      : this._env['PATH'] ?? '';
    const delimiter = this._platform === 'win32' ? ';' : ':';
    return raw.split(delimiter).filter((dir) => dir !== '');
  }

  private _firstRunnable(base: string): string | undefined {
    if (this._platform !== 'win32') {
      return this._files.isExecutableFile(base) ? base : undefined;
    }

    // Windows: try PATHEXT unless the name already carries one of them.
    const exts = (this._env['PATHEXT'] ?? DEFAULT_PATHEXT)
      .split(';')
      .filter((ext) => ext !== '');
    const hasExt = exts.some((ext) => base.toLowerCase().endsWith(ext.toLowerCase()));
    for (const ext of hasExt ? [''] : exts) {
      const candidate = base + ext;
      if (this._files.isFile(candidate)) return candidate;
    }
    return undefined;
  }
}
