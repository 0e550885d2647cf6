/**
 * Graph Upsert Statements
 *
 * One named operation per node/relationship kind. Each statement receives a
 * batch as `$rows` and runs once per element in a single round trip. Nodes
 * are MERGEd on `id`; relationships are MERGEd between MATCHed endpoints, so
 * an edge whose endpoint is missing is skipped rather than created.
 */

import type { RowId } from "../db/types.js";

// ============================================================================
// Upsert Records
// ============================================================================

export interface CategoryUpsert {
  id: RowId;
  name: string | null;
}

export interface ProductUpsert {
  id: RowId;
  name: string | null;
  price: number | null;
  category_id: RowId | null;
}

export interface CustomerUpsert {
  id: RowId;
  name: string | null;
  /** Canonical YYYY-MM-DD or null */
  join_date: string | null;
}

export interface OrderUpsert {
  id: RowId;
  customer_id: RowId | null;
  /** Canonical YYYY-MM-DDTHH:MM:SSZ or null */
  ts: string | null;
}

export interface OrderItemUpsert {
  order_id: RowId;
  product_id: RowId;
  quantity: number | null;
}

export interface InteractionUpsert {
  customer_id: RowId;
  product_id: RowId;
  ts: string | null;
}

/**
 * Rows accepted by each operation
 */
export interface UpsertRows {
  categories: CategoryUpsert;
  products: ProductUpsert;
  customers: CustomerUpsert;
  orders: OrderUpsert;
  orderItems: OrderItemUpsert;
  viewed: InteractionUpsert;
  clicked: InteractionUpsert;
  addedToCart: InteractionUpsert;
}

export type UpsertOperation = keyof UpsertRows;

export type InteractionOperation = "viewed" | "clicked" | "addedToCart";

/** Relationship type written by each interaction operation */
export const INTERACTION_RELATIONSHIPS = {
  viewed: "VIEWED",
  clicked: "CLICKED",
  addedToCart: "ADDED_TO_CART",
} as const satisfies Record<InteractionOperation, string>;

// ============================================================================
// Cypher
// ============================================================================

function interactionCypher(relationship: string): string {
  return `
    UNWIND $rows AS row
    MATCH (c:Customer {id: row.customer_id})
    MATCH (p:Product {id: row.product_id})
    MERGE (c)-[r:${relationship}]->(p)
    SET r.ts = CASE
      WHEN row.ts IS NULL OR row.ts = "" THEN NULL
      ELSE datetime(row.ts)
    END
  `;
}

export const UPSERT_STATEMENTS: Record<UpsertOperation, string> = {
  categories: `
    UNWIND $rows AS row
    MERGE (g:Category {id: row.id})
    SET g.name = row.name
  `,

  products: `
    UNWIND $rows AS row
    MERGE (p:Product {id: row.id})
    SET p.name = row.name, p.price = toFloat(row.price)
    WITH row, p
    MATCH (g:Category {id: row.category_id})
    MERGE (p)-[:IN_CATEGORY]->(g)
  `,

  customers: `
    UNWIND $rows AS row
    MERGE (c:Customer {id: row.id})
    SET c.name = row.name,
        c.join_date = CASE
          WHEN row.join_date IS NULL OR row.join_date = "" THEN NULL
          ELSE date(row.join_date)
        END
  `,

  orders: `
    UNWIND $rows AS row
    MERGE (o:Order {id: row.id})
    SET o.ts = CASE
      WHEN row.ts IS NULL OR row.ts = "" THEN NULL
      ELSE datetime(row.ts)
    END
    WITH row, o
    MATCH (c:Customer {id: row.customer_id})
    MERGE (c)-[:PLACED]->(o)
  `,

  orderItems: `
    UNWIND $rows AS row
    MATCH (o:Order {id: row.order_id})
    MATCH (p:Product {id: row.product_id})
    MERGE (o)-[r:CONTAINS]->(p)
    SET r.quantity = toInteger(row.quantity)
  `,

  viewed: interactionCypher(INTERACTION_RELATIONSHIPS.viewed),
  clicked: interactionCypher(INTERACTION_RELATIONSHIPS.clicked),
  addedToCart: interactionCypher(INTERACTION_RELATIONSHIPS.addedToCart),
};

/** Liveness probe statement */
export const PING_STATEMENT = "RETURN 1";
