/**
 * models/index.ts
 * Barrel export for bldrun data models.
 */

export { BLDFILE_KEYS } from './build-file.js';
export type {
  BldfileKey,
  BuildRecord,
  BuildRecordMap,
  CompilerChoice,
  ProgramFieldKey,
  ProgramName,
  ValidatedJob,
  ValidatedSources,
} from './build-file.js';
export { DEFAULT_BUILD_FILE } from './builder-config.js';
export type { BuilderConfig, OptionMode } from './builder-config.js';
