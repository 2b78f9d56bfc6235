/**
 * build-validator.ts
 * Per-program checks that turn a BuildRecord into ValidatedSources.
 * Throws a BuildError on the first violation found.
 *
 * Rules, in order:
 *   1. `file=` is declared and lists at least one name   (MissingFileList)
 *   2. `bin=` is declared                                 (MissingBinDir)
 *   3. `src=` is declared and names a directory           (SourceDirNotFound)
 *   4. at least one listed name is a file under `src`     (NoValidSourceFiles)
 */

import * as path from 'node:path';
import type { BuildRecord, ValidatedSources } from '../models/build-file.js';
import {
  MissingBinDirError,
  MissingFileListError,
  NoValidSourceFilesError,
  SourceDirNotFoundError,
} from './build-errors.js';
import type { FileService } from './file-service.js';
import { SilentLogger } from './logger.js';
import type { Logger } from './logger.js';

/** `-Wall;-O2` → `["-Wall", "-O2"]`. Empty tokens are dropped. */
export function splitOptions(optionSpec: string | undefined): string[] {
  if (optionSpec === undefined) return [];
  return optionSpec.split(';').filter((token) => token.trim() !== '');
}

/**
 * `-Wall;-O2` → `"-Wall -O2"`: every ';' becomes one space.
 * An absent spec normalizes to the empty string.
 */
export function normalizeOptions(optionSpec: string | undefined): string {
  if (optionSpec === undefined) return '';
  return optionSpec.split(';').join(' ');
}

export class BuildValidator {
  private readonly _files: FileService;
  private readonly _log: Logger;

  constructor(files: FileService, logger?: Logger) {
    this._files = files;
    this._log = logger ?? new SilentLogger();
  }

  validate(record: BuildRecord): ValidatedSources {
    const fileNames = (record.fileList ?? '').split(/\s+/).filter((name) => name !== '');
    if (fileNames.length === 0) {
      throw new MissingFileListError(record.name);
    }

    if (record.binDir === undefined || record.binDir.trim() === '') {
      throw new MissingBinDirError(record.name);
    }

    const { sourceDir } = record;
    if (sourceDir === undefined || !this._files.isDirectory(sourceDir)) {
      throw new SourceDirNotFoundError(record.name, sourceDir);
    }

    const resolvedSourceFiles: string[] = [];
    for (const name of fileNames) {
      const candidate = path.join(sourceDir, name);
      if (this._files.isFile(candidate)) {
        resolvedSourceFiles.push(candidate);
      } else {
        this._log.debug('Skipping missing source file', { program: record.name, file: candidate });
      }
    }

    if (resolvedSourceFiles.length === 0) {
      throw new NoValidSourceFilesError(record.name);
    }

    return {
      programName: record.name,
      sourceDir,
      binDir: record.binDir,
      resolvedSourceFiles,
      compilerArgs: normalizeOptions(record.optionSpec),
      optionTokens: splitOptions(record.optionSpec),
    };
  }
}
