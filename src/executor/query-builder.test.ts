import { describe, it, expect } from "vitest";
import {
  buildBatchUpdateSql,
  buildSelectChunkSql,
  buildTruncateSql,
  maxRowsPerUpdate,
  qualifiedName,
  quoteIdent,
} from "./query-builder";

const INT4 = '"pg_catalog"."int4"';
const TEXT = '"pg_catalog"."text"';

describe("identifiers", () => {
  it("quotes and escapes", () => {
    expect(quoteIdent("email")).toBe('"email"');
    expect(quoteIdent('we"ird')).toBe('"we""ird"');
    expect(qualifiedName("public", "users")).toBe('"public"."users"');
  });
});

describe("buildTruncateSql", () => {
  it("truncates all tables in one statement", () => {
    expect(
      buildTruncateSql([
        { schema: "public", name: "sessions" },
        { schema: "audit", name: "log" },
      ])
    ).toBe('TRUNCATE TABLE "public"."sessions", "audit"."log" CASCADE');
  });

  it("is empty without tables", () => {
    expect(buildTruncateSql([])).toBe("");
  });
});

describe("buildSelectChunkSql", () => {
  const base = {
    schema: "public",
    table: "users",
    primaryKey: "id",
    columns: ["name", "id", "email"],
    keyType: INT4,
  };

  it("starts at the lowest key", () => {
    expect(buildSelectChunkSql({ ...base, afterKey: false })).toBe(
      ['SELECT "id", "name", "email"', 'FROM "public"."users"', 'ORDER BY "id"', "LIMIT $1"].join("\n")
    );
  });

  it("continues after the previous key and keeps the search predicate", () => {
    expect(buildSelectChunkSql({ ...base, search: "is_staff = false", afterKey: true })).toBe(
      [
        'SELECT "id", "name", "email"',
        'FROM "public"."users"',
        `WHERE (is_staff = false) AND "id" > $1::${INT4}`,
        'ORDER BY "id"',
        "LIMIT $2",
      ].join("\n")
    );
  });
});

describe("buildBatchUpdateSql", () => {
  it("updates from a typed VALUES list", () => {
    const { sql, values } = buildBatchUpdateSql({
      schema: "public",
      table: "users",
      primaryKey: "id",
      columns: ["name", "email"],
      types: { id: INT4, name: TEXT, email: TEXT },
      rows: [
        { key: 1, values: ["XXX", "a@localhost"] },
        { key: 3, values: ["XX", null] },
      ],
    });

    expect(sql).toBe(
      [
        'UPDATE "public"."users" AS t',
        'SET "name" = v."name", "email" = v."email"',
        `FROM (VALUES ($1::${INT4}, $2::${TEXT}, $3::${TEXT}), ($4::${INT4}, $5::${TEXT}, $6::${TEXT})) AS v("id", "name", "email")`,
        'WHERE t."id" = v."id"',
      ].join("\n")
    );
    expect(values).toEqual([1, "XXX", "a@localhost", 3, "XX", null]);
  });

  it("returns nothing for an empty batch", () => {
    expect(
      buildBatchUpdateSql({ schema: "s", table: "t", primaryKey: "id", columns: ["a"], types: {}, rows: [] })
    ).toEqual({ sql: "", values: [] });
  });
});

describe("maxRowsPerUpdate", () => {
  it("keeps each statement under the bind parameter limit", () => {
    expect(maxRowsPerUpdate(2)).toBe(21845);
    expect(maxRowsPerUpdate(70000)).toBe(1);
  });
});
