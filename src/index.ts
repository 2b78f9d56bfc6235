/**
 * index.ts
 * Library entry point: run a Bldfile build programmatically.
 *
 *   const summary = await new BuildOrchestrator({ buildFile: 'Bldfile' }).run();
 */

export * from './models/index.js';
export * from './builders/index.js';
export * from './services/index.js';
export * from './orchestrator/index.js';
export { BldfileParser } from './parsers/bldfile/bldfile-parser.js';
export type { BldfileEntry } from './parsers/bldfile/bldfile-parser.js';
