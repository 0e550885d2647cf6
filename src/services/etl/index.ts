/**
 * ETL Services
 *
 * Relational snapshot → normalized tables → batched graph upserts.
 */

export { awaitReady } from "./readiness.js";
export type { Probe, ReadinessOptions } from "./readiness.js";
export { Extractor } from "./extractor.js";
export {
  normalizeTables,
  parseDate,
  parseTimestamp,
  countDegraded,
} from "./normalizer.js";
export type { ParseResult } from "./normalizer.js";
export { chunk } from "./chunking.js";
export { GraphLoader, routeEvents, EVENT_ROUTES } from "./loader.js";
export type { LoadSummary, StepSummary, LoadProgress } from "./loader.js";
export { EtlPipeline, createPipeline } from "./orchestrator.js";
export type {
  PipelineDependencies,
  PipelinePhase,
  PipelineProgress,
  PipelineResult,
} from "./orchestrator.js";
