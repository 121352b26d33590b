/**
 * Query Validation Tests
 *
 * Covers:
 * - Mutation keywords blocked on read-only sources, allowed otherwise
 * - Keywords inside literals and comments are ignored
 * - Stacked statements rejected; a trailing semicolon is fine
 * - Unbound parameters and interpolated values rejected
 * - HTTP: method policy, relative paths, placeholder binding
 */

import { describe, it, expect } from "vitest";
import { analyzeSql, validateHttp, validateQuery, validateSql } from "./validate.js";
import { UnsafeQueryError } from "../errors.js";

describe("analyzeSql", () => {
  it("collects literals, placeholders and strips comments", () => {
    const analysis = analyzeSql("SELECT * FROM t -- note\nWHERE a = @a AND b = 'it''s' /* x */ AND c = :c");

    expect(analysis.literals).toEqual(["it's"]);
    expect([...analysis.placeholders].sort()).toEqual(["a", "c"]);
    expect(analysis.normalized).not.toContain("note");
  });

  it("does not take a Postgres cast for a placeholder", () => {
    expect([...analyzeSql("SELECT x::text FROM t").placeholders]).toEqual([]);
  });

  it("rejects unterminated literals and comments", () => {
    expect(() => analyzeSql("SELECT 'abc")).toThrow("unterminated quoted literal");
    expect(() => analyzeSql("SELECT 1 /* open")).toThrow("unterminated block comment");
  });
});

describe("validateSql", () => {
  it("accepts a parameterized read", () => {
    expect(() => validateSql("SELECT * FROM inventory WHERE product_id = @id", { id: "P001" }, true)).not.toThrow();
  });

  it.each([
    ["DELETE FROM inventory", "DELETE"],
    ["update inventory set quantity = 0", "UPDATE"],
    ["DROP TABLE inventory", "DROP"],
    ["REPLACE INTO inventory VALUES (1)", "REPLACE INTO"],
    ["WITH x AS (SELECT 1) INSERT INTO t SELECT * FROM x", "INSERT"],
  ])("blocks %s on a read-only source", (sql, keyword) => {
    expect(() => validateSql(sql, {}, true)).toThrow(`"${keyword}" is not allowed on a read-only data source`);
  });

  it("allows mutations when the source is writable", () => {
    expect(() => validateSql("DELETE FROM inventory WHERE product_id = @id", { id: "P1" }, false)).not.toThrow();
  });

  it("ignores keywords inside literals and comments", () => {
    expect(() => validateSql("SELECT 'DROP TABLE x' AS label -- DELETE", {}, true)).not.toThrow();
  });

  it("rejects stacked statements but not a trailing semicolon", () => {
    expect(() => validateSql("SELECT 1;", {}, true)).not.toThrow();
    expect(() => validateSql("SELECT 1; SELECT 2", {}, true)).toThrow("multiple statements are not allowed");
  });

  it("rejects an empty query", () => {
    expect(() => validateSql("   ", {}, true)).toThrow(UnsafeQueryError);
  });

  it("rejects a parameter with no placeholder", () => {
    expect(() => validateSql("SELECT * FROM t", { id: "P1" }, true))
      .toThrow('parameter "id" is not bound by a placeholder');
  });

  it("rejects a value that was spliced into a literal", () => {
    expect(() => validateSql("SELECT * FROM t WHERE name LIKE '%laptop%' AND id = @name", { name: "laptop" }, true))
      .toThrow('value of "name" is interpolated into the query text');
  });
});

describe("validateHttp", () => {
  it("defaults to GET and returns the path placeholders", () => {
    expect(validateHttp("/orders/{order_id}", { order_id: "O-1" }, true)).toEqual({
      method: "GET",
      pathTemplate: "/orders/{order_id}",
      pathParams: ["order_id"],
    });
  });

  it("only allows GET on a read-only source", () => {
    expect(() => validateHttp("GET /orders", {}, true)).not.toThrow();
    expect(() => validateHttp("HEAD /orders", {}, true)).toThrow('"HEAD" is not allowed on a read-only data source');
    expect(() => validateHttp("POST /orders", {}, true)).toThrow('"POST" is not allowed on a read-only data source');
    expect(() => validateHttp("POST /orders", {}, false)).not.toThrow();
  });

  it("rejects unknown methods and absolute or protocol-relative paths", () => {
    expect(() => validateHttp("FETCH /orders", {}, false)).toThrow('unsupported method "FETCH"');
    expect(() => validateHttp("https://evil.example/x", {}, true)).toThrow("path must be relative");
    expect(() => validateHttp("//evil.example/x", {}, true)).toThrow("path must be relative");
  });

  it("requires a parameter for every placeholder", () => {
    expect(() => validateHttp("/orders/{order_id}", {}, true)).toThrow('path placeholder "{order_id}" has no parameter');
  });

  it("rejects a value written into the path", () => {
    expect(() => validateHttp("/orders/O-1", { order_id: "O-1" }, true))
      .toThrow('value of "order_id" is interpolated into the request path');
  });

  it("accepts a placeholder value that equals a fixed path segment", () => {
    expect(validateHttp("/orders/{order_id}", { order_id: "orders" }, true).pathParams).toEqual(["order_id"]);
    expect(() => validateHttp("/orders/{order_id}", { order_id: "orders", status: "orders" }, true))
      .toThrow('value of "status" is interpolated into the request path');
  });
});

describe("validateQuery", () => {
  it("dispatches on the dialect", () => {
    expect(() => validateQuery("sql", "DELETE FROM t", {}, true)).toThrow(UnsafeQueryError);
    expect(() => validateQuery("http", "DELETE /t", {}, true)).toThrow(UnsafeQueryError);
  });
});
