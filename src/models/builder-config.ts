/**
 * builder-config.ts
 * Run configuration for a single bldrun invocation.
 */

/** Default build-description filename, looked up in the working directory. */
export const DEFAULT_BUILD_FILE = 'Bldfile';

/**
 * How the `option=` value reaches the compiler.
 * - joined: the normalized string is passed as ONE argument ("-Wall -O2").
 *   Kept for compatibility with existing Bldfiles; options that rely on
 *   shell word splitting will reach the compiler as a single token.
 * - split: every `;`-separated token is its own argument.
 */
export type OptionMode = 'joined' | 'split';

/**
 * Configuration passed to the BuildOrchestrator.
 * Relative paths inside the Bldfile are resolved against `baseDir`.
 */
export interface BuilderConfig {
  /** Path to the build-description file. */
  buildFile: string;
  /** Directory the compiler runs in. Defaults to the build file's directory. */
  baseDir?: string;
  /** Compiler name or path; skips detection when set. */
  compiler?: string;
  /** Defaults to 'joined'. */
  optionMode?: OptionMode;
  /** Continue past failed compilations and report them all at the end. */
  keepGoing?: boolean;
  /** Log the compile commands without running them. */
  dryRun?: boolean;
  /** Platform used for binary naming and compiler lookup. Defaults to process.platform. */
  platform?: NodeJS.Platform;
  /** Environment searched for PATH / PATHEXT. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}
