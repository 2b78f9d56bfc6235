/**
 * services/index.ts
 * Barrel export for bldrun services.
 */

export { FileService } from './file-service.js';
export { BuildValidator, normalizeOptions, splitOptions } from './build-validator.js';
export { CompilerDetector, compilerCandidates } from './compiler-detector.js';
export { CompilerInvoker, buildCompileArgs } from './compiler-invoker.js';
export type { CompileResult, CompilerInvokerOptions } from './compiler-invoker.js';
export { ExecaProcessRunner } from './process-runner.js';
export type { ProcessResult, ProcessRunner, ProcessRunOptions } from './process-runner.js';
export * from './build-errors.js';
export { ConsoleLogger, FileLogger, SilentLogger, TeeLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
