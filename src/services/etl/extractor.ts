/**
 * Extractor - full snapshot of every source relation
 *
 * Each call opens its own database handle and destroys it before returning.
 */

import { sql, type Kysely } from "kysely";

import type {
  RelationName,
  SourceDatabase,
  SourceTables,
} from "../../db/types.js";
import { SourceQueryError } from "../../errors.js";
import { silentLogger, type Logger } from "../../logger.js";

export type SourceDbFactory = () => Kysely<SourceDatabase>;

export class Extractor {
  private readonly log: Logger;

  constructor(
    private readonly openDb: SourceDbFactory,
    logger: Logger = silentLogger()
  ) {
    this.log = logger.child({ module: "extractor" });
  }

  async extract(): Promise<SourceTables> {
    const db = this.openDb();

    // Reads run one after another, parents before children
    try {
      return {
        customers: await this.read(db, "customers"),
        categories: await this.read(db, "categories"),
        products: await this.read(db, "products"),
        orders: await this.read(db, "orders"),
        order_items: await this.read(db, "order_items"),
        events: await this.read(db, "events"),
      };
    } finally {
      await db.destroy();
    }
  }

  private async read<R extends RelationName>(
    db: Kysely<SourceDatabase>,
    relation: R
  ): Promise<SourceDatabase[R][]> {
    const startTime = performance.now();

    let rows: SourceDatabase[R][];
    try {
      const result = await sql<
        SourceDatabase[R]
      >`SELECT * FROM ${sql.table(relation)}`.execute(db);
      rows = result.rows;
    } catch (error) {
      this.log.error({ relation, error }, "Failed to read relation");
      throw new SourceQueryError(relation, error);
    }

    this.log.info(
      {
        relation,
        rows: rows.length,
        duration: `${String(Math.round(performance.now() - startTime))}ms`,
      },
      "Extracted relation"
    );
    return rows;
  }
}
