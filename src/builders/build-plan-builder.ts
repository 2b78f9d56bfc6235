/**
 * build-plan-builder.ts
 * Turns parsed BuildRecords into the ordered list of ValidatedJobs.
 *
 * Jobs come out in declaration order (first appearance of each `prog=`).
 * Each binary directory is created before its job is yielded; a
 * validation or mkdir failure aborts the whole plan.
 */

import * as path from 'node:path';
import type { BuildRecordMap, ValidatedJob, ValidatedSources } from '../models/build-file.js';
import type { OptionMode } from '../models/builder-config.js';
import { BinDirCreateFailedError } from '../services/build-errors.js';
import { BuildValidator } from '../services/build-validator.js';
import type { FileService } from '../services/file-service.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface BuildPlanOptions {
  platform?: NodeJS.Platform;
  optionMode?: OptionMode;
  logger?: Logger;
}

/** Program name on POSIX-family platforms, `<name>.exe` on win32. */
export function binaryName(programName: string, platform: NodeJS.Platform): string {
  return platform === 'win32' ? `${programName}.exe` : programName;
}

/** Arguments appended after `-o <output>` for the given option mode. */
export function optionArgsFor(sources: ValidatedSources, mode: OptionMode): string[] {
  if (mode === 'split') return [...sources.optionTokens];
  return sources.compilerArgs.trim() === '' ? [] : [sources.compilerArgs];
}

export class BuildPlanBuilder {
  private readonly _files: FileService;
  private readonly _validator: BuildValidator;
  private readonly _platform: NodeJS.Platform;
  private readonly _optionMode: OptionMode;
  private readonly _log: Logger;

  constructor(files: FileService, options: BuildPlanOptions = {}) {
    this._files = files;
    this._log = options.logger ?? new SilentLogger();
    this._validator = new BuildValidator(files, this._log);
    this._platform = options.platform ?? process.platform;
    this._optionMode = options.optionMode ?? 'joined';
  }

  build(records: BuildRecordMap): ValidatedJob[] {
    const jobs: ValidatedJob[] = [];

    for (const record of records.values()) {
      const sources = this._validator.validate(record);
      this._ensureBinDir(sources.binDir);

      const job: ValidatedJob = {
        ...sources,
        outputPath: path.join(sources.binDir, binaryName(sources.programName, this._platform)),
        optionArgs: optionArgsFor(sources, this._optionMode),
      };
      this._log.debug('  job', {
        program: job.programName,
        sources: job.resolvedSourceFiles.length,
        output: job.outputPath,
      });
      jobs.push(job);
    }

    return jobs;
  }

  private _ensureBinDir(binDir: string): void {
    try {
      this._files.ensureDir(binDir);
    } catch (err) {
      throw new BinDirCreateFailedError(binDir, err);
    }
  }
}
