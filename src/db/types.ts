/**
 * Source Database Types
 *
 * Row shapes of the relational shop dataset. The loader only reads these
 * relations; it never writes to the source store.
 */

// ============================================================================
// Scalar Types
// ============================================================================

/**
 * Primary/foreign key value. INT8 columns arrive as a number, or as a bigint
 * past Number.MAX_SAFE_INTEGER (see parseInt8 in connection.ts).
 */
export type RowId = number | bigint | string;

/** A numeric column; pg hands NUMERIC back as text */
export type NumericValue = number | bigint | string;

/**
 * Raw temporal column. DATE/TIMESTAMP columns arrive as text (see the type
 * parsers in connection.ts); free-form text columns arrive as-is.
 */
export type TemporalValue = string | number | Date | null;

export const EVENT_TYPES = ["view", "click", "add_to_cart"] as const;

export type EventType = (typeof EVENT_TYPES)[number];

// ============================================================================
// Relations
// ============================================================================

export interface CustomerRow {
  id: RowId;
  name: string | null;
  /** Optional: a customers table without the column is accepted */
  join_date?: TemporalValue;
}

export interface CategoryRow {
  id: RowId;
  name: string | null;
}

export interface ProductRow {
  id: RowId;
  name: string | null;
  category_id: RowId | null;
  price: NumericValue | null;
}

export interface OrderRow {
  id: RowId;
  customer_id: RowId | null;
  ts?: TemporalValue;
}

export interface OrderItemRow {
  order_id: RowId;
  product_id: RowId;
  quantity: NumericValue | null;
}

export interface EventRow {
  customer_id: RowId;
  product_id: RowId;
  /** Anything outside EVENT_TYPES is dropped at load time */
  event_type: string;
  ts?: TemporalValue;
}

/**
 * Kysely database interface for the source store
 */
export interface SourceDatabase {
  customers: CustomerRow;
  categories: CategoryRow;
  products: ProductRow;
  orders: OrderRow;
  order_items: OrderItemRow;
  events: EventRow;
}

export type RelationName = keyof SourceDatabase;

// ============================================================================
// Snapshots
// ============================================================================

/**
 * In-memory snapshot of the source relations. Relations may be missing,
 * which downstream stages treat as empty.
 */
export type SourceTables = {
  [R in RelationName]?: SourceDatabase[R][];
};

export type NormalizedCustomerRow = Omit<CustomerRow, "join_date"> & {
  join_date?: string | null;
};

export type NormalizedOrderRow = Omit<OrderRow, "ts"> & {
  ts?: string | null;
};

export type NormalizedEventRow = Omit<EventRow, "ts"> & {
  ts?: string | null;
};

/**
 * Snapshot after temporal normalization: every temporal column present is
 * either a canonical string or null.
 */
export interface NormalizedTables {
  customers?: NormalizedCustomerRow[];
  categories?: CategoryRow[];
  products?: ProductRow[];
  orders?: NormalizedOrderRow[];
  order_items?: OrderItemRow[];
  events?: NormalizedEventRow[];
}
