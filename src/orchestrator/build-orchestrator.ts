/**
 * build-orchestrator.ts
 * Single entry-point for a complete bldrun run.
 *
 * Pipeline order:
 *   1. BldfileParser.parse(buildFile)
 *   2. CompilerDetector.detect() (or the --compiler override)
 *   3. BuildPlanBuilder.build(records) → ValidatedJob[]
 *   4. CompilerInvoker.invoke(compiler, job), one job at a time
 *
 * Any error in steps 1–3 aborts before a compiler is started. In step 4
 * the first CompileError aborts the run unless `keepGoing` is set, in
 * which case every job is attempted and one CompileError naming all
 * failed outputs is thrown at the end.
 */

import * as path from 'node:path';
import type { CompilerChoice, ValidatedJob } from '../models/build-file.js';
import type { BuilderConfig } from '../models/builder-config.js';
import { BldfileParser } from '../parsers/bldfile/bldfile-parser.js';
import { BuildPlanBuilder } from '../builders/build-plan-builder.js';
import { CompileError } from '../services/build-errors.js';
import { CompilerDetector } from '../services/compiler-detector.js';
import { CompilerInvoker } from '../services/compiler-invoker.js';
import type { CompileResult } from '../services/compiler-invoker.js';
import { FileService } from '../services/file-service.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';
import type { ProcessRunner } from '../services/process-runner.js';

export interface BuildOrchestratorOptions {
  logger?: Logger;
  /** Replaces the execa runner, e.g. with a fake in tests. */
  runner?: ProcessRunner;
}

export interface BuildSummary {
  compiler: CompilerChoice;
  jobs: ValidatedJob[];
  results: CompileResult[];
}

export class BuildOrchestrator {
  private readonly _cfg: BuilderConfig;
  private readonly _options: BuildOrchestratorOptions;
  private readonly _log: Logger;

  constructor(cfg: BuilderConfig, options: BuildOrchestratorOptions = {}) {
    this._cfg = cfg;
    this._options = options;
    this._log = options.logger ?? new SilentLogger();
  }

  async run(): Promise<BuildSummary> {
    const buildFile = path.resolve(this._cfg.buildFile);
    const baseDir = this._cfg.baseDir ?? path.dirname(buildFile);
    const files = new FileService(baseDir);
    const platform = this._cfg.platform ?? process.platform;

    this._log.info('bldrun starting', { buildFile, baseDir });

    // Step 1: Parse
    this._log.info('Step 1/4  Parsing build file');
    const records = new BldfileParser(files, this._log).parse(buildFile);
    this._log.info('Step 1/4  Done', { programs: records.size });

    // Step 2: Compiler
    this._log.info('Step 2/4  Locating compiler');
    const detector = new CompilerDetector(files, {
      platform,
      logger: this._log,
      ...(this._cfg.env !== undefined && { env: this._cfg.env }),
    });
    const compiler = this._cfg.compiler !== undefined
      ? detector.resolveOverride(this._cfg.compiler)
      : detector.detect();
    this._log.info('Step 2/4  Done', { compiler: compiler.path });

    // Step 3: Plan
    this._log.info('Step 3/4  Planning jobs');
    const planner = new BuildPlanBuilder(files, {
      platform,
      logger: this._log,
      ...(this._cfg.optionMode !== undefined && { optionMode: this._cfg.optionMode }),
    });
    const jobs = planner.build(records);
    this._log.info('Step 3/4  Done', { jobs: jobs.length });

    // Step 4: Compile
    this._log.info('Step 4/4  Compiling');
    const invoker = new CompilerInvoker({
      cwd: files.root,
      logger: this._log,
      ...(this._options.runner !== undefined && { runner: this._options.runner }),
      ...(this._cfg.dryRun !== undefined && { dryRun: this._cfg.dryRun }),
    });
    const results = await this._compileAll(invoker, compiler, jobs);
    this._log.info('Step 4/4  Done', { built: results.length });

    return { compiler, jobs, results };
  }

  private async _compileAll(
    invoker: CompilerInvoker,
    compiler: CompilerChoice,
    jobs: readonly ValidatedJob[],
  ): Promise<CompileResult[]> {
    const results: CompileResult[] = [];
    const failed: string[] = [];

    for (const job of jobs) {
      try {
        results.push(await invoker.invoke(compiler, job));
      } catch (err) {
        if (this._cfg.keepGoing !== true || !(err instanceof CompileError)) throw err;
        failed.push(...err.outputPaths);
        this._log.warn('Continuing after failed compilation', { program: job.programName });
      }
    }

    if (failed.length > 0) {
      throw new CompileError(failed);
    }
    return results;
  }
}
