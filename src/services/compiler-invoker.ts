/**
 * compiler-invoker.ts
 * Runs the compiler once for a ValidatedJob.
 *
 * Command line:
 *   <compiler> <sources...> -g -o <outputPath> <optionArgs...>
 *
 * In the default 'joined' option mode `optionArgs` is a single element
 * holding every flag separated by spaces, e.g. "-Wall -O2".
 */

import type { CompilerChoice, ValidatedJob } from '../models/build-file.js';
import { CompileError } from './build-errors.js';
import { SilentLogger } from './logger.js';
import type { Logger } from './logger.js';
import { ExecaProcessRunner } from './process-runner.js';
import type { ProcessRunner } from './process-runner.js';

export interface CompilerInvokerOptions {
  /** Working directory of the compiler process. */
  cwd: string;
  runner?: ProcessRunner;
  dryRun?: boolean;
  logger?: Logger;
}

export interface CompileResult {
  outputPath: string;
  command: string[];
  /** False when the command was only logged (dry run). */
  executed: boolean;
}

/** Compiler arguments for a job: sources, debug info, output, options. */
export function buildCompileArgs(job: ValidatedJob): string[] {
  return [...job.resolvedSourceFiles, '-g', '-o', job.outputPath, ...job.optionArgs];
}

export class CompilerInvoker {
  private readonly _cwd: string;
  private readonly _runner: ProcessRunner;
  private readonly _dryRun: boolean;
  private readonly _log: Logger;

  constructor(options: CompilerInvokerOptions) {
    this._cwd = options.cwd;
    this._runner = options.runner ?? new ExecaProcessRunner();
    this._dryRun = options.dryRun ?? false;
    this._log = options.logger ?? new SilentLogger();
  }

  /** Resolves on exit code 0; throws CompileError otherwise. */
  async invoke(compiler: CompilerChoice, job: ValidatedJob): Promise<CompileResult> {
    const args = buildCompileArgs(job);
    const command = [compiler.path, ...args];

    this._log.info(`Compiling ${job.outputPath}...`);
    this._log.info(`Compile command ${JSON.stringify(command)}`);

    if (this._dryRun) {
      return { outputPath: job.outputPath, command, executed: false };
    }

    const result = await this._runner.run(compiler.path, args, { cwd: this._cwd });
    if (result.failed || result.exitCode !== 0) {
      this._log.error(`Compilation failed: ${job.outputPath}`, { exitCode: result.exitCode });
      throw new CompileError([job.outputPath], result.exitCode);
    }

    this._log.info(`Build successful! Binary created at ${job.outputPath}`);
    return { outputPath: job.outputPath, command, executed: true };
  }
}
