/**
 * bldfile-parser.test.ts
 *
 * Unit tests for BldfileParser.
 *
 * Covers:
 *   1. Tokenizing: comments, blank lines, lines without '=', first-'=' split
 *   2. Program scopes and declaration order
 *   3. Unknown keys ignored, last value wins
 *   4. Field before any prog= line
 *   5. File loading errors (missing file, unreadable path)
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { BldfileParser } from '../bldfile-parser.js';
import { FileService } from '../../../services/file-service.js';
import {
  ConfigNotFoundError,
  ConfigReadError,
  FieldBeforeProgError,
  InvalidProgramNameError,
} from '../../../services/build-errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bldrun-parser-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function makeParser(): BldfileParser {
  return new BldfileParser(new FileService(tmpDir));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('BldfileParser', () => {
  describe('tokenize', () => {
    it('skips blank lines, comments and lines without "="', () => {
      const entries = BldfileParser.tokenize([
        '# header',
        '',
        '   ',
        '  # indented comment',
        'no equals sign here',
        'prog=hello',
      ].join('\n'));
      expect(entries).toEqual([{ key: 'prog', value: 'hello', line: 6 }]);
    });

    it('splits on the first "=" only', () => {
      const entries = BldfileParser.tokenize('option=-DNAME=value;-O2');
      expect(entries).toEqual([{ key: 'option', value: '-DNAME=value;-O2', line: 1 }]);
    });

    it('trims surrounding whitespace and accepts CRLF line endings', () => {
      const entries = BldfileParser.tokenize('  prog=hello  \r\nbin=out\r\n');
      expect(entries).toEqual([
        { key: 'prog', value: 'hello', line: 1 },
        { key: 'bin', value: 'out', line: 2 },
      ]);
    });

    it('ignores a leading byte-order mark', () => {
      const entries = BldfileParser.tokenize('\uFEFFprog=hello');
      expect(entries[0]?.key).toBe('prog');
    });
  });

  describe('parseText', () => {
    it('attributes fields to the most recently opened program', () => {
      const records = makeParser().parseText([
        'prog=hello',
        'src=./src',
        'bin=./out',
        'file=hello.cpp',
        'option=-Wall;-O2',
        'prog=world',
        'src=./other',
        'bin=./out',
        'file=a.cpp b.cpp',
      ].join('\n'));

      expect([...records.keys()]).toEqual(['hello', 'world']);
      expect(records.get('hello')).toEqual({
        name: 'hello',
        line: 1,
        sourceDir: './src',
        binDir: './out',
        fileList: 'hello.cpp',
        optionSpec: '-Wall;-O2',
      });
      expect(records.get('world')).toEqual({
        name: 'world',
        line: 6,
        sourceDir: './other',
        binDir: './out',
        fileList: 'a.cpp b.cpp',
      });
    });

    it('keeps declaration order rather than sorting', () => {
      const records = makeParser().parseText('prog=zeta\nprog=alpha\nprog=mid\n');
      expect([...records.keys()]).toEqual(['zeta', 'alpha', 'mid']);
    });

    it('ignores unknown keys', () => {
      const records = makeParser().parseText('prog=hello\nlinker=ld\nfile=a.cpp');
      expect(records.get('hello')).toEqual({ name: 'hello', line: 1, fileList: 'a.cpp' });
    });

    it('lets the last value win when a key is repeated', () => {
      const records = makeParser().parseText('prog=hello\noption=-O0\noption=-O3');
      expect(records.get('hello')?.optionSpec).toBe('-O3');
    });

    it('re-opens an existing record when a prog= name repeats', () => {
      const records = makeParser().parseText([
        'prog=a',
        'file=a.cpp',
        'prog=b',
        'file=b.cpp',
        'prog=a',
        'bin=out',
      ].join('\n'));
      expect([...records.keys()]).toEqual(['a', 'b']);
      expect(records.get('a')).toEqual({ name: 'a', line: 1, fileList: 'a.cpp', binDir: 'out' });
    });

    it('returns an empty map for a file with only comments', () => {
      expect(makeParser().parseText('# nothing\n\n').size).toBe(0);
    });

    it('throws FieldBeforeProgError for a field before any prog= line', () => {
      const parser = makeParser();
      expect(() => parser.parseText('# c\nsrc=./src\nprog=hello')).toThrow(FieldBeforeProgError);
      expect(() => parser.parseText('# c\nsrc=./src\nprog=hello')).toThrow(
        "Error: line 2: 'src=' appears before any 'prog=' line.",
      );
    });

    it('does not treat an unknown key before prog= as an error', () => {
      const records = makeParser().parseText('version=2\nprog=hello');
      expect([...records.keys()]).toEqual(['hello']);
    });

    it('throws InvalidProgramNameError for an empty prog= value', () => {
      expect(() => makeParser().parseText('prog=')).toThrow(InvalidProgramNameError);
    });
  });

  describe('parse', () => {
    it('reads and parses a file from disk', () => {
      const file = path.join(tmpDir, 'Bldfile');
      fs.writeFileSync(file, 'prog=hello\nfile=hello.cpp\n', 'utf-8');
      const records = makeParser().parse(file);
      expect(records.get('hello')?.fileList).toBe('hello.cpp');
    });

    it('resolves a relative path against the base directory', () => {
      fs.writeFileSync(path.join(tmpDir, 'Bldfile'), 'prog=hello\n', 'utf-8');
      expect(makeParser().parse('Bldfile').has('hello')).toBe(true);
    });

    it('throws ConfigNotFoundError when the file does not exist', () => {
      const file = path.join(tmpDir, 'Bldfile');
      expect(() => makeParser().parse(file)).toThrow(ConfigNotFoundError);
      expect(() => makeParser().parse(file)).toThrow(`Error: ${file} does not exist.`);
    });

    it('throws ConfigReadError when the path cannot be read as a file', () => {
      const dir = path.join(tmpDir, 'Bldfile');
      fs.mkdirSync(dir);
      expect(() => makeParser().parse(dir)).toThrow(ConfigReadError);
    });
  });
});
