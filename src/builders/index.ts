/**
 * builders/index.ts
 * Barrel export for bldrun builders.
 */

export { BuildPlanBuilder, binaryName, optionArgsFor } from './build-plan-builder.js';
export type { BuildPlanOptions } from './build-plan-builder.js';
