/**
 * build-validator.test.ts
 *
 * Tests for BuildValidator against a temp source tree:
 *   src/a.cpp, src/b.cpp exist; nothing else does.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BuildValidator, normalizeOptions, splitOptions } from '../build-validator.js';
import { FileService } from '../file-service.js';
import {
  MissingBinDirError,
  MissingFileListError,
  NoValidSourceFilesError,
  SourceDirNotFoundError,
} from '../build-errors.js';
import type { BuildRecord } from '../../models/build-file.js';

let tmpDir: string;
let validator: BuildValidator;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bldrun-validator-'));
  fs.mkdirSync(path.join(tmpDir, 'src'));
  fs.writeFileSync(path.join(tmpDir, 'src', 'a.cpp'), 'int a() { return 1; }\n');
  fs.writeFileSync(path.join(tmpDir, 'src', 'b.cpp'), 'int b() { return 2; }\n');
  validator = new BuildValidator(new FileService(tmpDir));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function record(overrides: Partial<BuildRecord> = {}): BuildRecord {
  return {
    name: 'demo',
    line: 1,
    sourceDir: 'src',
    binDir: 'out',
    fileList: 'a.cpp',
    ...overrides,
  };
}

describe('normalizeOptions', () => {
  it('joins semicolon-separated tokens with single spaces', () => {
    expect(normalizeOptions('-Wall;-O2')).toBe('-Wall -O2');
  });

  it('replaces every semicolon, including empty segments', () => {
    expect(normalizeOptions('-Wall;;-O2')).toBe('-Wall  -O2');
  });

  it('returns the empty string for an absent spec', () => {
    expect(normalizeOptions(undefined)).toBe('');
  });
});

describe('splitOptions', () => {
  it('drops empty tokens', () => {
    expect(splitOptions('-Wall;;-O2;')).toEqual(['-Wall', '-O2']);
  });

  it('returns [] for an absent spec', () => {
    expect(splitOptions(undefined)).toEqual([]);
  });
});

describe('BuildValidator', () => {
  it('resolves exactly the existing subset of listed files, in listed order', () => {
    const result = validator.validate(record({ fileList: 'b.cpp missing.cpp a.cpp' }));
    expect(result.resolvedSourceFiles).toEqual([
      path.join('src', 'b.cpp'),
      path.join('src', 'a.cpp'),
    ]);
  });

  it('tolerates repeated whitespace between filenames', () => {
    const result = validator.validate(record({ fileList: '  a.cpp   b.cpp ' }));
    expect(result.resolvedSourceFiles).toHaveLength(2);
  });

  it('carries the normalized and split options', () => {
    const result = validator.validate(record({ optionSpec: '-Wall;-O2' }));
    expect(result.compilerArgs).toBe('-Wall -O2');
    expect(result.optionTokens).toEqual(['-Wall', '-O2']);
  });

  it('throws MissingFileListError when file= is absent', () => {
    const { fileList: _omit, ...rest } = record();
    expect(() => validator.validate(rest)).toThrow(MissingFileListError);
  });

  it('throws MissingFileListError when file= is blank', () => {
    expect(() => validator.validate(record({ fileList: '   ' }))).toThrow(MissingFileListError);
  });

  it('throws MissingBinDirError when bin= is absent', () => {
    const { binDir: _omit, ...rest } = record();
    expect(() => validator.validate(rest)).toThrow(MissingBinDirError);
  });

  it('throws SourceDirNotFoundError when src does not exist', () => {
    expect(() => validator.validate(record({ sourceDir: './missing' }))).toThrow(
      "Error: Source directory './missing' does not exist.",
    );
  });

  it('throws SourceDirNotFoundError when src names a file', () => {
    expect(() => validator.validate(record({ sourceDir: 'src/a.cpp' }))).toThrow(
      SourceDirNotFoundError,
    );
  });

  it('throws SourceDirNotFoundError when src= is absent', () => {
    const { sourceDir: _omit, ...rest } = record();
    expect(() => validator.validate(rest)).toThrow(SourceDirNotFoundError);
  });

  it('throws NoValidSourceFilesError when no listed file exists', () => {
    expect(() => validator.validate(record({ fileList: 'x.cpp y.cpp' }))).toThrow(
      NoValidSourceFilesError,
    );
  });

  it('checks file= before bin= and src=', () => {
    expect(() =>
      validator.validate({ name: 'bare', line: 3 }),
    ).toThrow("Error: No source files listed for program 'bare'.");
  });
});
