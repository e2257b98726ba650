/**
 * Lead qualification and scoring agents.
 *
 * @module @leadforge/agents
 */

export * from './lead-qualifier';
export * from './interaction-ingest';
export * from './repository';

export { loadConfig } from './config';
export type { PipelineConfig } from './config';

export { createPipelineRuntime } from './runtime';
export type { PipelineRuntime, PipelineRuntimeOverrides } from './runtime';
