/**
 * cli-options.ts
 * Command-line parsing for bldrun.
 */

import { parseArgs } from 'node:util';
import type { BuilderConfig } from './models/builder-config.js';
import { DEFAULT_BUILD_FILE } from './models/builder-config.js';

export const USAGE = [
  'Usage: bldrun [options]',
  '',
  '  -f, --file <path>   build-description file (default: Bldfile)',
  '  --compiler <cmd>    compiler name or path; skips detection',
  '  --split-options     pass each option= token as its own argument',
  '                      (default: one argument, tokens joined by spaces)',
  '  --keep-going        build every program, then report all failures',
  '  --dry-run           print compile commands without running them',
  '  --debug             emit debug-level logs and write logs/<timestamp>/bldrun.log',
  '  -h, --help          show this help',
].join('\n');

export interface CliOptions {
  config: BuilderConfig;
  debug: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const OPTIONS = {
  file: { type: 'string', short: 'f' },
  compiler: { type: 'string' },
  'split-options': { type: 'boolean' },
  'keep-going': { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  debug: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseValues(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, strict: true, allowPositionals: false })
      .values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

/** Parse `process.argv.slice(2)`. Throws UsageError on unknown or malformed options. */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const values = parseValues(argv);
  if (values.file === '') throw new UsageError('--file needs a path');
  if (values.compiler === '') throw new UsageError('--compiler needs a command');

  const config: BuilderConfig = {
    buildFile: values.file ?? DEFAULT_BUILD_FILE,
    optionMode: values['split-options'] === true ? 'split' : 'joined',
    keepGoing: values['keep-going'] === true,
    dryRun: values['dry-run'] === true,
    ...(values.compiler !== undefined && { compiler: values.compiler }),
  };

  return { config, debug: values.debug === true, help: values.help === true };
}
