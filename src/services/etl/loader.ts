/**
 * Graph Loader
 *
 * Turns a normalized snapshot into batched graph upserts. Steps run in a
 * fixed order so that every relationship finds both of its endpoints:
 *
 *   schema → categories → products (+IN_CATEGORY) → customers
 *   → orders (+PLACED) → order items (CONTAINS) → events (VIEWED,
 *   CLICKED, ADDED_TO_CART)
 *
 * Every write is a MERGE on identity, so replaying a load refreshes
 * properties without duplicating nodes or relationships.
 */

import { chunk } from "./chunking.js";
import {
  EVENT_TYPES,
  type EventType,
  type NumericValue,
} from "../../db/types.js";
import { GraphWriteError } from "../../errors.js";
import {
  DEFAULT_SCHEMA_PATH,
  applySchema,
  readSchemaStatements,
} from "../../graph/schema.js";
import { silentLogger, type Logger } from "../../logger.js";

import type {
  CategoryRow,
  NormalizedCustomerRow,
  NormalizedEventRow,
  NormalizedOrderRow,
  NormalizedTables,
  OrderItemRow,
  ProductRow,
} from "../../db/types.js";
import type {
  CategoryUpsert,
  CustomerUpsert,
  InteractionOperation,
  InteractionUpsert,
  OrderItemUpsert,
  OrderUpsert,
  ProductUpsert,
  UpsertOperation,
  UpsertRows,
} from "../../graph/statements.js";
import type { GraphWriter, WriteStats } from "../../graph/writer.js";

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_BATCH_SIZE = 1000;

export interface StepSummary {
  step: UpsertOperation;
  rows: number;
  batches: number;
  nodesCreated: number;
  relationshipsCreated: number;
  propertiesSet: number;
}

export interface LoadSummary {
  schemaStatements: number;
  steps: StepSummary[];
  /** Events left out because their type has no relationship, by type */
  skippedEvents: Record<string, number>;
}

export interface LoadProgress {
  step: UpsertOperation;
  batch: number;
  batches: number;
}

type ProgressCallback = (progress: LoadProgress) => void;

export type WriterFactory = () => Promise<GraphWriter>;

export interface GraphLoaderOptions {
  batchSize?: number;
  /** Source of the schema statements applied before any data write */
  schemaStatements?: () => Promise<string[]>;
  logger?: Logger;
}

/** Relationship written for each recognised event type */
export const EVENT_ROUTES: Record<EventType, InteractionOperation> = {
  view: "viewed",
  click: "clicked",
  add_to_cart: "addedToCart",
};

// ============================================================================
// Row Mapping
// ============================================================================

/** Same result as Cypher toFloat(): unreadable values become null */
export function toFloat(value: NumericValue | null): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === "string" && value.trim() === "") {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Integer coercion matching Cypher's toInteger(): truncates toward zero */
export function toInteger(value: NumericValue | null): number | null {
  const parsed = toFloat(value);
  return parsed === null ? null : Math.trunc(parsed);
}

function isEventType(value: string): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

const toCategory = (row: CategoryRow): CategoryUpsert => ({
  id: row.id,
  name: row.name,
});

const toProduct = (row: ProductRow): ProductUpsert => ({
  id: row.id,
  name: row.name,
  price: toFloat(row.price),
  category_id: row.category_id,
});

const toCustomer = (row: NormalizedCustomerRow): CustomerUpsert => ({
  id: row.id,
  name: row.name,
  join_date: row.join_date ?? null,
});

const toOrder = (row: NormalizedOrderRow): OrderUpsert => ({
  id: row.id,
  customer_id: row.customer_id,
  ts: row.ts ?? null,
});

const toOrderItem = (row: OrderItemRow): OrderItemUpsert => ({
  order_id: row.order_id,
  product_id: row.product_id,
  quantity: toInteger(row.quantity),
});

const toInteraction = (row: NormalizedEventRow): InteractionUpsert => ({
  customer_id: row.customer_id,
  product_id: row.product_id,
  ts: row.ts ?? null,
});

/**
 * Split events into one bucket per relationship. Unknown types are counted
 * and left out.
 */
export function routeEvents(events: readonly NormalizedEventRow[]): {
  buckets: Record<InteractionOperation, InteractionUpsert[]>;
  skipped: Record<string, number>;
} {
  const buckets: Record<InteractionOperation, InteractionUpsert[]> = {
    viewed: [],
    clicked: [],
    addedToCart: [],
  };
  const skipped: Record<string, number> = {};

  for (const event of events) {
    if (isEventType(event.event_type)) {
      buckets[EVENT_ROUTES[event.event_type]].push(toInteraction(event));
    } else {
      skipped[event.event_type] = (skipped[event.event_type] ?? 0) + 1;
    }
  }

  return { buckets, skipped };
}

// ============================================================================
// Graph Loader
// ============================================================================

export class GraphLoader {
  private readonly batchSize: number;
  private readonly schemaStatements: () => Promise<string[]>;
  private readonly log: Logger;
  private onProgress?: ProgressCallback;

  constructor(
    private readonly openWriter: WriterFactory,
    options: GraphLoaderOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.schemaStatements =
      options.schemaStatements ??
      (() => readSchemaStatements(DEFAULT_SCHEMA_PATH));
    this.log = (options.logger ?? silentLogger()).child({ module: "loader" });
  }

  setProgressCallback(callback: ProgressCallback): void {
    this.onProgress = callback;
  }

  /**
   * Load a normalized snapshot. Missing tables load as empty. The first
   * failing batch aborts the load; earlier batches stay committed.
   */
  async load(tables: NormalizedTables): Promise<LoadSummary> {
    const statements = await this.schemaStatements();
    const writer = await this.openWriter();

    try {
      const schemaStatements = await applySchema(writer, statements, this.log);
      const steps: StepSummary[] = [];

      const categories = (tables.categories ?? []).map(toCategory);
      steps.push(await this.writeStep(writer, "categories", categories));

      const products = (tables.products ?? []).map(toProduct);
      steps.push(await this.writeStep(writer, "products", products));

      const customers = (tables.customers ?? []).map(toCustomer);
      steps.push(await this.writeStep(writer, "customers", customers));

      const orders = (tables.orders ?? []).map(toOrder);
      steps.push(await this.writeStep(writer, "orders", orders));

      const items = (tables.order_items ?? []).map(toOrderItem);
      steps.push(await this.writeStep(writer, "orderItems", items));

      const { buckets, skipped } = routeEvents(tables.events ?? []);
      if (Object.keys(skipped).length > 0) {
        this.log.warn({ skipped }, "Skipped events with unrecognized event_type");
      }
      steps.push(await this.writeStep(writer, "viewed", buckets.viewed));
      steps.push(await this.writeStep(writer, "clicked", buckets.clicked));
      steps.push(
        await this.writeStep(writer, "addedToCart", buckets.addedToCart)
      );

      return { schemaStatements, steps, skippedEvents: skipped };
    } finally {
      await writer.close();
    }
  }

  private async writeStep<K extends UpsertOperation>(
    writer: GraphWriter,
    step: K,
    rows: UpsertRows[K][]
  ): Promise<StepSummary> {
    const summary: StepSummary = {
      step,
      rows: rows.length,
      batches: 0,
      nodesCreated: 0,
      relationshipsCreated: 0,
      propertiesSet: 0,
    };
    const batches = Math.ceil(rows.length / this.batchSize);

    for (const batch of chunk(rows, this.batchSize)) {
      let stats: WriteStats;
      try {
        stats = await writer.write(step, batch);
      } catch (error) {
        this.log.error(
          { step, batch: summary.batches, error },
          "Batch upsert failed"
        );
        throw new GraphWriteError(step, summary.batches, error);
      }

      summary.batches++;
      summary.nodesCreated += stats.nodesCreated;
      summary.relationshipsCreated += stats.relationshipsCreated;
      summary.propertiesSet += stats.propertiesSet;
      this.onProgress?.({ step, batch: summary.batches, batches });
    }

    this.log.info({ ...summary }, `Loaded ${step}`);
    return summary;
  }
}
