/**
 * build-errors.ts
 * Error taxonomy for a bldrun run.
 *
 * Every error is fatal. The CLI prints `message` to stderr and exits with
 * `exitCode`; usage errors (exit 1) are handled in cli.ts and are not
 * BuildErrors.
 */

export type BuildErrorCode =
  | 'ConfigNotFound'
  | 'ConfigReadError'
  | 'FieldBeforeProg'
  | 'InvalidProgramName'
  | 'MissingFileList'
  | 'MissingBinDir'
  | 'SourceDirNotFound'
  | 'NoValidSourceFiles'
  | 'BinDirCreateFailed'
  | 'NoCompilerFound'
  | 'CompileError';

export const EXIT_CODES: Record<BuildErrorCode, number> = {
  ConfigNotFound: 2,
  ConfigReadError: 3,
  FieldBeforeProg: 4,
  InvalidProgramName: 4,
  MissingFileList: 5,
  MissingBinDir: 6,
  SourceDirNotFound: 7,
  NoValidSourceFiles: 8,
  BinDirCreateFailed: 9,
  NoCompilerFound: 10,
  CompileError: 11,
};

export class BuildError extends Error {
  readonly code: BuildErrorCode;
  readonly exitCode: number;

  constructor(code: BuildErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
    this.exitCode = EXIT_CODES[code];
  }
}

// ---------------------------------------------------------------------------
// Bldfile loading
// ---------------------------------------------------------------------------

export class ConfigNotFoundError extends BuildError {
  constructor(readonly buildFile: string) {
    super('ConfigNotFound', `Error: ${buildFile} does not exist.`);
  }
}

export class ConfigReadError extends BuildError {
  constructor(readonly buildFile: string, cause: unknown) {
    super('ConfigReadError', `Error reading ${buildFile}: ${describeCause(cause)}`, { cause });
  }
}

export class FieldBeforeProgError extends BuildError {
  constructor(readonly key: string, readonly line: number) {
    super(
      'FieldBeforeProg',
      `Error: line ${line}: '${key}=' appears before any 'prog=' line.`,
    );
  }
}

export class InvalidProgramNameError extends BuildError {
  constructor(readonly line: number) {
    super('InvalidProgramName', `Error: line ${line}: 'prog=' needs a program name.`);
  }
}

// ---------------------------------------------------------------------------
// Validation / planning
// ---------------------------------------------------------------------------

export class MissingFileListError extends BuildError {
  constructor(readonly programName: string) {
    super('MissingFileList', `Error: No source files listed for program '${programName}'.`);
  }
}

export class MissingBinDirError extends BuildError {
  constructor(readonly programName: string) {
    super('MissingBinDir', `Error: Binary directory path is missing for program '${programName}'.`);
  }
}

export class SourceDirNotFoundError extends BuildError {
  constructor(readonly programName: string, readonly sourceDir: string | undefined) {
    super(
      'SourceDirNotFound',
      sourceDir === undefined
        ? `Error: No source directory declared for program '${programName}'.`
        : `Error: Source directory '${sourceDir}' does not exist.`,
    );
  }
}

export class NoValidSourceFilesError extends BuildError {
  constructor(readonly programName: string) {
    super('NoValidSourceFiles', `Error: No valid source files found for program '${programName}'.`);
  }
}

export class BinDirCreateFailedError extends BuildError {
  constructor(readonly binDir: string, cause: unknown) {
    super(
      'BinDirCreateFailed',
      `Error creating binary directory '${binDir}': ${describeCause(cause)}`,
      { cause },
    );
  }
}

// ---------------------------------------------------------------------------
// Toolchain
// ---------------------------------------------------------------------------

export class NoCompilerFoundError extends BuildError {
  constructor(readonly candidates: readonly string[], platform: string) {
    super(
      'NoCompilerFound',
      `Error: No suitable C++ compiler found on ${platform} (tried: ${candidates.join(', ')}).`,
    );
  }
}

export class CompileError extends BuildError {
  /** Output paths of every program that failed to compile. */
  readonly outputPaths: readonly string[];

  constructor(outputPaths: readonly string[], readonly compilerExitCode: number | null = null) {
    super(
      'CompileError',
      outputPaths.length === 1
        ? `Error: Compilation failed for ${outputPaths[0]}` +
          (compilerExitCode !== null ? ` (exit code ${compilerExitCode}).` : '.')
        : `Error: Compilation failed for ${outputPaths.join(', ')}.`,
    );
    this.outputPaths = outputPaths;
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
