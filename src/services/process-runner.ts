/**
 * process-runner.ts
 * Spawns external processes with the console streams inherited.
 */

import { execa } from 'execa';

export interface ProcessRunOptions {
  cwd: string;
}

export interface ProcessResult {
  /** Exit status, or null when the process was killed or never started. */
  exitCode: number | null;
  failed: boolean;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<ProcessResult>;
}

/** Default runner: execa with `stdio: 'inherit'`, resolves instead of rejecting on failure. */
export class ExecaProcessRunner implements ProcessRunner {
  async run(
    command: string,
    args: readonly string[],
    options: ProcessRunOptions,
  ): Promise<ProcessResult> {
    const result = await execa(command, args, {
      cwd: options.cwd,
      stdio: 'inherit',
      reject: false,
    });
    return { exitCode: result.exitCode ?? null, failed: result.failed };
  }
}
