import neo4j from "neo4j-driver";
import { describe, it, expect } from "vitest";

import {
  INTERACTION_RELATIONSHIPS,
  UPSERT_STATEMENTS,
} from "../../../src/graph/statements.js";
import { parseInt8 } from "../../../src/db/connection.js";
import { toCypherRow, toCypherValue } from "../../../src/graph/writer.js";

import type { InteractionOperation } from "../../../src/graph/statements.js";

describe("graph/writer", () => {
  describe("toCypherValue", () => {
    it("should send integral numbers as driver integers", () => {
      expect(toCypherValue(42)).toEqual(neo4j.int(42));
      expect(toCypherValue(-3)).toEqual(neo4j.int(-3));
    });

    it("should send bigints as driver integers without losing digits", () => {
      const value = toCypherValue(9007199254740993n);

      expect(value).toEqual(neo4j.int("9007199254740993"));
      expect(String(value)).toBe("9007199254740993");
    });

    it("should give a BIGINT key and an INTEGER foreign key the same value", () => {
      const category = toCypherRow({ id: parseInt8("10"), name: "Books" });
      const product = toCypherRow({ id: 3, category_id: 10 });

      expect(category.id).toEqual(neo4j.int(10));
      expect(category.id).toEqual(product.category_id);
    });

    it("should keep floats, text and booleans", () => {
      expect(toCypherValue(12.5)).toBe(12.5);
      expect(toCypherValue("2023-03-05")).toBe("2023-03-05");
      expect(toCypherValue(true)).toBe(true);
    });

    it("should send anything else as null", () => {
      expect(toCypherValue(null)).toBeNull();
      expect(toCypherValue(undefined)).toBeNull();
      expect(toCypherValue({ nested: 1 })).toBeNull();
    });
  });

  describe("toCypherRow", () => {
    it("should convert every field", () => {
      expect(
        toCypherRow({ order_id: "9", product_id: 3, quantity: null })
      ).toEqual({
        order_id: "9",
        product_id: neo4j.int(3),
        quantity: null,
      });
    });
  });

  describe("UPSERT_STATEMENTS", () => {
    it("should MERGE nodes on id", () => {
      expect(UPSERT_STATEMENTS.categories).toContain(
        "MERGE (g:Category {id: row.id})"
      );
      expect(UPSERT_STATEMENTS.customers).toContain(
        "MERGE (c:Customer {id: row.id})"
      );
    });

    it("should MATCH both endpoints before merging an order item", () => {
      const statement = UPSERT_STATEMENTS.orderItems;

      expect(statement).toContain("MATCH (o:Order {id: row.order_id})");
      expect(statement).toContain("MATCH (p:Product {id: row.product_id})");
      expect(statement).not.toContain("MERGE (o:Order");
    });

    const interactions: [InteractionOperation, string][] = [
      ["viewed", "VIEWED"],
      ["clicked", "CLICKED"],
      ["addedToCart", "ADDED_TO_CART"],
    ];

    it.each(interactions)(
      "should write %s as %s between existing endpoints",
      (operation, relationship) => {
        const statement = UPSERT_STATEMENTS[operation];

        expect(INTERACTION_RELATIONSHIPS[operation]).toBe(relationship);
        expect(statement).toContain("MATCH (c:Customer {id: row.customer_id})");
        expect(statement).toContain("MATCH (p:Product {id: row.product_id})");
        expect(statement).toContain(`MERGE (c)-[r:${relationship}]->(p)`);
      }
    );
  });
});
