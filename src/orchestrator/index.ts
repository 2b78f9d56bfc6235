/**
 * orchestrator/index.ts
 * Barrel export for the build orchestrator.
 */

export { BuildOrchestrator } from './build-orchestrator.js';
export type { BuildOrchestratorOptions, BuildSummary } from './build-orchestrator.js';
