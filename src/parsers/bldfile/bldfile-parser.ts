/**
 * bldfile-parser.ts
 * Reads a Bldfile into per-program BuildRecords.
 *
 * Grammar (one entry per line):
 *   prog=<name>      opens a program scope
 *   src=<dir>        source directory of the current program
 *   bin=<dir>        output directory of the current program
 *   file=<names>     space-separated source filenames, relative to src
 *   option=<flags>   semicolon-separated compiler flags
 *   # comment
 *
 * Lines are trimmed, then split on the first '=' only. Blank lines, '#'
 * comments, lines without '=' and unknown keys are skipped. A program field
 * before any `prog=` line is an error.
 *
 * Does NOT:
 * - Check that directories or files exist (BuildValidator does)
 * - Split `file=` / `option=` values; they are kept verbatim
 */

import type {
  BldfileKey,
  BuildRecord,
  BuildRecordMap,
  ProgramFieldKey,
} from '../../models/build-file.js';
import { BLDFILE_KEYS } from '../../models/build-file.js';
import {
  ConfigNotFoundError,
  ConfigReadError,
  FieldBeforeProgError,
  InvalidProgramNameError,
} from '../../services/build-errors.js';
import type { FileService } from '../../services/file-service.js';
import { SilentLogger } from '../../services/logger.js';
import type { Logger } from '../../services/logger.js';

// ---------------------------------------------------------------------------
// Parser state
// ---------------------------------------------------------------------------

/** Threaded through every line step; `current` is the open program scope. */
interface ParserState {
  readonly records: BuildRecordMap;
  current: BuildRecord | undefined;
}

/** A single `key=value` entry, before it is attributed to a program. */
export interface BldfileEntry {
  key: string;
  value: string;
  line: number;
}

const FIELD_FOR_KEY: Record<ProgramFieldKey, keyof Omit<BuildRecord, 'name' | 'line'>> = {
  src: 'sourceDir',
  bin: 'binDir',
  file: 'fileList',
  option: 'optionSpec',
};

function isKnownKey(key: string): key is BldfileKey {
  return BLDFILE_KEYS.has(key);
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

export class BldfileParser {
  private readonly _files: FileService;
  private readonly _log: Logger;

  constructor(files: FileService, logger?: Logger) {
    this._files = files;
    this._log = logger ?? new SilentLogger();
  }

  /**
   * Load and parse a Bldfile.
   * Throws ConfigNotFoundError when the file is absent and ConfigReadError
   * for any other read failure.
   */
  parse(buildFile: string): BuildRecordMap {
    let text: string;
    try {
      text = this._files.readText(buildFile);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new ConfigNotFoundError(buildFile);
      }
      throw new ConfigReadError(buildFile, err);
    }

    const records = this.parseText(text);
    this._log.debug('Bldfile parsed', { buildFile, programs: [...records.keys()] });
    return records;
  }

  /** Parse Bldfile content already in memory. */
  parseText(text: string): BuildRecordMap {
    const state: ParserState = { records: new Map(), current: undefined };
    for (const entry of BldfileParser.tokenize(text)) {
      this._applyEntry(state, entry);
    }
    return state.records;
  }

  /**
   * Split content into `key=value` entries, skipping blanks, comments and
   * lines without '='. Line numbers are 1-based.
   */
  static tokenize(text: string): BldfileEntry[] {
    const entries: BldfileEntry[] = [];
    const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (line === '' || line.startsWith('#')) return;

      const eq = line.indexOf('=');
      if (eq === -1) return;

      entries.push({
        key: line.slice(0, eq),
        value: line.slice(eq + 1),
        line: index + 1,
      });
    });

    return entries;
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private _applyEntry(state: ParserState, entry: BldfileEntry): void {
    const { key, value, line } = entry;

    if (!isKnownKey(key)) {
      this._log.debug('Ignoring unknown Bldfile key', { key, line });
      return;
    }

    if (key === 'prog') {
      if (value === '') throw new InvalidProgramNameError(line);
      // A repeated name re-opens its record; declaration order is unchanged.
      let record = state.records.get(value);
      if (record === undefined) {
        record = { name: value, line };
        state.records.set(value, record);
      }
      state.current = record;
      return;
    }

    if (state.current === undefined) {
      throw new FieldBeforeProgError(key, line);
    }
    state.current[FIELD_FOR_KEY[key]] = value;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
