#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point: builds every program declared in a Bldfile.
 *
 * Exit status: 0 when every program compiled, 1 on a usage error,
 * otherwise the exitCode of the BuildError that stopped the run.
 *
 * Usage:
 *   npx tsx src/cli.ts [-f Bldfile] [--compiler g++] [--split-options]
 *                      [--keep-going] [--dry-run] [--debug]
 */

import * as path from 'node:path';
import { parseCliArgs, UsageError, USAGE } from './cli-options.js';
import type { CliOptions } from './cli-options.js';
import { BuildOrchestrator } from './orchestrator/build-orchestrator.js';
import { BuildError } from './services/build-errors.js';
import { ConsoleLogger, TeeLogger } from './services/logger.js';

let options: CliOptions;
try {
  options = parseCliArgs(process.argv.slice(2));
} catch (err) {
  if (!(err instanceof UsageError)) throw err;
  console.error(`bldrun: ${err.message}`);
  console.error('');
  console.error(USAGE);
  process.exit(1);
}

if (options.help) {
  console.log(USAGE);
  process.exit(0);
}

const { config, debug } = options;
const teeLogger = debug ? new TeeLogger('debug') : undefined;
const logger = teeLogger ?? new ConsoleLogger('info', 'bldrun', true);

const t0 = Date.now();
let exitCode = 0;

try {
  const summary = await new BuildOrchestrator(config, { logger }).run();
  const elapsed = Date.now() - t0;

  console.log('');
  console.log(config.dryRun === true ? 'Dry run complete ✓' : 'Build complete ✓');
  console.log(`  compiler : ${summary.compiler.path}`);
  console.log(`  programs : ${summary.jobs.length}`);
  console.log(`  elapsed  : ${elapsed} ms`);
} catch (err) {
  if (err instanceof BuildError) {
    console.error(err.message);
    exitCode = err.exitCode;
  } else {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    exitCode = 1;
  }
}

if (teeLogger !== undefined) {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const logPath = path.join('logs', timestamp, 'bldrun.log');
  teeLogger.flush(path.resolve(logPath));
  console.log(`  log      : ${logPath}`);
}

process.exit(exitCode);
