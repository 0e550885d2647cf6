import { describe, it, expect, vi } from "vitest";

import {
  GraphWriteError,
  ReadinessTimeoutError,
  SourceQueryError,
} from "../../../../src/errors.js";
import { GraphLoader } from "../../../../src/services/etl/loader.js";
import {
  EtlPipeline,
  type PipelineDependencies,
  type PipelineProgress,
} from "../../../../src/services/etl/orchestrator.js";
import { silentLogger } from "../../../../src/logger.js";
import { rawTables } from "../../../fixtures/shop.js";
import { InMemoryGraph } from "../../../mocks/graph.js";

import type { SourceTables } from "../../../../src/db/types.js";

function createDeps(graph: InMemoryGraph) {
  let time = 0;
  const deps = {
    config: {
      batchSize: 1000,
      readinessTimeoutMs: 2000,
      readinessIntervalMs: 1000,
    },
    logger: silentLogger(),
    probes: {
      source: vi.fn(async () => undefined),
      graph: vi.fn(async () => undefined),
    },
    extractor: {
      extract: vi.fn(async (): Promise<SourceTables> => rawTables),
    },
    loader: new GraphLoader(async () => graph, {
      schemaStatements: async () => [],
    }),
    clock: {
      now: () => time,
      sleep: async (ms: number) => {
        time += ms;
      },
    },
  } satisfies PipelineDependencies;
  return deps;
}

describe("services/etl/orchestrator", () => {
  it("should extract, normalize and load the snapshot", async () => {
    const graph = new InMemoryGraph();
    const pipeline = new EtlPipeline(createDeps(graph));

    const result = await pipeline.run();

    expect(graph.node("Customer", 100)?.join_date).toBe("2023-03-05");
    expect(graph.node("Order", 1000)?.ts).toBe("2023-03-06T10:00:00Z");
    expect(graph.relationship("VIEWED", 100, 10)?.properties).toEqual({
      ts: "2023-03-05T07:15:00Z",
    });
    expect(result.degraded).toEqual({
      "customers.join_date": 1,
      "events.ts": 1,
    });
    expect(result.summary.steps).toHaveLength(8);
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("should report phases in order", async () => {
    const progress: PipelineProgress[] = [];
    const pipeline = new EtlPipeline(createDeps(new InMemoryGraph()));
    pipeline.setProgressCallback((p) => progress.push(p));

    await pipeline.run();

    expect(progress.slice(0, 5)).toEqual([
      { phase: "readiness", detail: "source" },
      { phase: "readiness", detail: "graph" },
      { phase: "extract" },
      { phase: "normalize" },
      { phase: "load" },
    ]);
    expect(progress).toContainEqual({
      phase: "load",
      detail: "categories",
      current: 1,
      total: 1,
    });
  });

  it("should wait for both stores before extracting", async () => {
    const deps = createDeps(new InMemoryGraph());
    deps.probes.graph
      .mockRejectedValueOnce(new Error("ServiceUnavailable"))
      .mockResolvedValue(undefined);

    await new EtlPipeline(deps).run();

    expect(deps.probes.source).toHaveBeenCalledTimes(1);
    expect(deps.probes.graph).toHaveBeenCalledTimes(2);
    expect(deps.extractor.extract).toHaveBeenCalledTimes(1);
  });

  it("should abort before extraction when a store never becomes ready", async () => {
    const deps = createDeps(new InMemoryGraph());
    deps.probes.source.mockRejectedValue(new Error("connection refused"));

    const result = new EtlPipeline(deps).run();

    await expect(result).rejects.toThrow(ReadinessTimeoutError);
    await expect(result).rejects.toMatchObject({
      store: "source",
      attempts: 4,
    });
    expect(deps.probes.graph).not.toHaveBeenCalled();
    expect(deps.extractor.extract).not.toHaveBeenCalled();
  });

  it("should propagate an extraction failure unchanged", async () => {
    const graph = new InMemoryGraph();
    const deps = createDeps(graph);
    const failure = new SourceQueryError("orders", new Error("timeout"));
    deps.extractor.extract.mockRejectedValue(failure);

    await expect(new EtlPipeline(deps).run()).rejects.toBe(failure);
    expect(graph.writes).toEqual([]);
  });

  it("should propagate a load failure unchanged", async () => {
    const graph = new InMemoryGraph();
    graph.failOn = { operation: "customers", error: new Error("deadlock") };

    const result = new EtlPipeline(createDeps(graph)).run();

    await expect(result).rejects.toThrow(GraphWriteError);
    await expect(result).rejects.toMatchObject({ operation: "customers" });
    expect(graph.nodeCount("Category")).toBe(1);
  });
});
