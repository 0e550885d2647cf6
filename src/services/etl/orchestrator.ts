import { Extractor } from "./extractor.js";
import { GraphLoader, type LoadSummary } from "./loader.js";
import { countDegraded, normalizeTables } from "./normalizer.js";
import { awaitReady, type Probe } from "./readiness.js";
import { createSourceDb, pingSource } from "../../db/connection.js";
import { openGraphWriter, pingGraph } from "../../graph/connection.js";
import {
  DEFAULT_SCHEMA_PATH,
  readSchemaStatements,
} from "../../graph/schema.js";

import type { NormalizedTables, SourceTables } from "../../db/types.js";
import type { AppConfig, EtlConfig } from "../../config.js";
import type { Logger } from "../../logger.js";

// ============================================================================
// Types
// ============================================================================

export type PipelinePhase = "readiness" | "extract" | "normalize" | "load";

export interface PipelineProgress {
  phase: PipelinePhase;
  /** Store being probed, or upsert step being written */
  detail?: string;
  current?: number;
  total?: number;
}

type ProgressCallback = (progress: PipelineProgress) => void;

export interface PipelineResult {
  summary: LoadSummary;
  /** Present-but-unparsable temporal values, by `table.column` */
  degraded: Record<string, number>;
  durationMs: number;
}

export interface PipelineDependencies {
  config: EtlConfig;
  logger: Logger;
  probes: { source: Probe; graph: Probe };
  extractor: Pick<Extractor, "extract">;
  loader: Pick<GraphLoader, "load" | "setProgressCallback">;
  /** Clock for the readiness phase; real timers when omitted */
  clock?: {
    sleep: (ms: number) => Promise<void>;
    now: () => number;
  };
}

// ============================================================================
// ETL Pipeline
// ============================================================================

/**
 * Runs readiness → extract → normalize → load once. The first failure of any
 * stage propagates unchanged.
 */
export class EtlPipeline {
  private readonly log: Logger;
  private onProgress?: ProgressCallback;

  constructor(private readonly deps: PipelineDependencies) {
    this.log = deps.logger.child({ module: "pipeline" });
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  async run(): Promise<PipelineResult> {
    const startTime = performance.now();

    // 1. Wait for both stores
    await this.waitFor("source", this.deps.probes.source);
    await this.waitFor("graph", this.deps.probes.graph);

    // 2. Extract
    this.onProgress?.({ phase: "extract" });
    this.log.info("Extracting source relations...");
    const tables: SourceTables = await this.deps.extractor.extract();

    // 3. Normalize
    this.onProgress?.({ phase: "normalize" });
    const normalized: NormalizedTables = normalizeTables(tables);
    const degraded = countDegraded(tables, normalized);
    if (Object.keys(degraded).length > 0) {
      this.log.info({ degraded }, "Unparsable temporal values set to null");
    }

    // 4. Load
    this.onProgress?.({ phase: "load" });
    this.deps.loader.setProgressCallback((progress) => {
      this.onProgress?.({
        phase: "load",
        detail: progress.step,
        current: progress.batch,
        total: progress.batches,
      });
    });
    this.log.info("Loading graph...");
    const summary = await this.deps.loader.load(normalized);

    const durationMs = Math.round(performance.now() - startTime);
    this.log.info({ durationMs }, "ETL done.");

    return { summary, degraded, durationMs };
  }

  private async waitFor(store: string, probe: Probe): Promise<void> {
    this.onProgress?.({ phase: "readiness", detail: store });
    await awaitReady(probe, {
      store,
      timeoutMs: this.deps.config.readinessTimeoutMs,
      intervalMs: this.deps.config.readinessIntervalMs,
      logger: this.deps.logger,
      sleep: this.deps.clock?.sleep,
      now: this.deps.clock?.now,
    });
  }
}

/**
 * Wire the pipeline to the configured Postgres and Neo4j stores.
 */
export function createPipeline(
  config: AppConfig,
  logger: Logger
): EtlPipeline {
  const schemaPath = config.graph.schemaPath ?? DEFAULT_SCHEMA_PATH;

  return new EtlPipeline({
    config: config.etl,
    logger,
    probes: {
      source: () => pingSource(config.source),
      graph: () => pingGraph(config.graph),
    },
    extractor: new Extractor(() => createSourceDb(config.source), logger),
    loader: new GraphLoader(() => openGraphWriter(config.graph), {
      batchSize: config.etl.batchSize,
      schemaStatements: () => readSchemaStatements(schemaPath),
      logger,
    }),
  });
}
