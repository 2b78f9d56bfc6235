/**
 * build-file.ts
 * Records produced from a Bldfile and the jobs derived from them.
 *
 * Lifecycle: BldfileParser → BuildRecord, BuildValidator → ValidatedSources,
 * BuildPlanBuilder → ValidatedJob. Nothing here outlives a single run.
 */

/** Unique program identifier, declared by a `prog=<name>` line. */
export type ProgramName = string;

/** Keys recognized by the Bldfile grammar. */
export type BldfileKey = 'prog' | 'src' | 'bin' | 'file' | 'option';

/** Keys that must follow a `prog=` line. */
export type ProgramFieldKey = Exclude<BldfileKey, 'prog'>;

export const BLDFILE_KEYS: ReadonlySet<string> = new Set<BldfileKey>([
  'prog',
  'src',
  'bin',
  'file',
  'option',
]);

/**
 * Everything declared for one program. Fields stay optional until
 * BuildValidator has checked them.
 */
export interface BuildRecord {
  name: ProgramName;
  /** `src=` directory the `file=` names are relative to. */
  sourceDir?: string;
  /** `bin=` output directory. */
  binDir?: string;
  /** `file=` whitespace-separated source filenames. */
  fileList?: string;
  /** `option=` semicolon-separated compiler flags. */
  optionSpec?: string;
  /** 1-based line of the `prog=` entry that opened this record. */
  line: number;
}

/**
 * Records keyed by program name. Map iteration order is the order in which
 * each `prog=` name first appeared.
 */
export type BuildRecordMap = Map<ProgramName, BuildRecord>;

/** Result of validating a single BuildRecord. */
export interface ValidatedSources {
  programName: ProgramName;
  sourceDir: string;
  binDir: string;
  /** `join(sourceDir, name)` for every listed name that exists, in listed order. */
  resolvedSourceFiles: string[];
  /** Option spec normalized to one space-separated string. */
  compilerArgs: string;
  /** Non-empty option tokens, in declared order. */
  optionTokens: string[];
}

/** A ready-to-run compile unit. */
export interface ValidatedJob extends ValidatedSources {
  /** `join(binDir, binaryName(programName))`. */
  outputPath: string;
  /** Arguments appended after `-o <outputPath>`. */
  optionArgs: string[];
}

/** The compiler used for every job of a run. */
export interface CompilerChoice {
  /** Candidate name or override as requested (e.g. "g++"). */
  name: string;
  /** Executable that is spawned. */
  path: string;
}
