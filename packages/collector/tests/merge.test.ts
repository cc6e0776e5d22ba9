import type { Cell, Table } from "@sampler/types";
import { describe, expect, it } from "vitest";
import { SchemaMismatchError } from "../src/errors.js";
import { compareCells, mergeTables } from "../src/merge.js";

const table = (rows: Array<[string, string, number]>): Table => ({
  columns: ["subreddit_name", "id", "score"],
  rows: rows.map(([subreddit_name, id, score]) => ({ subreddit_name, id, score })),
});

describe("mergeTables", () => {
  it("keeps stored rows over incoming ones with the same key", () => {
    const existing = table([
      ["typescript", "a1", 1],
      ["typescript", "a2", 2],
    ]);
    const incoming = table([
      ["typescript", "a2", 99],
      ["typescript", "a3", 3],
    ]);

    const merged = mergeTables(existing, incoming);

    expect(merged.rows).toEqual([
      { subreddit_name: "typescript", id: "a1", score: 1 },
      { subreddit_name: "typescript", id: "a2", score: 2 },
      { subreddit_name: "typescript", id: "a3", score: 3 },
    ]);
  });

  it("is idempotent", () => {
    const existing = table([["node", "n1", 1]]);
    const incoming = table([
      ["typescript", "t1", 1],
      ["node", "n2", 5],
    ]);

    const once = mergeTables(existing, incoming);
    expect(mergeTables(once, incoming)).toEqual(once);
  });

  it("gives the same table when merged again with its own history", () => {
    const rows = (cells: Array<[Cell, Cell, number]>): Table => ({
      columns: ["subreddit_name", "id", "score"],
      rows: cells.map(([subreddit_name, id, score]) => ({ subreddit_name, id, score })),
    });
    const history = rows([
      ["node", "n1", 1],
      ["typescript", "t1", 2],
      ["node", "n1", 3],
      [null, null, 4],
      [null, "x1", 5],
      ["deno", null, 6],
    ]);
    const incoming = rows([
      ["node", "n1", 9],
      ["typescript", "t2", 7],
      [null, "x2", 8],
      ["deno", "d1", 0],
    ]);

    const merged = mergeTables(history, incoming);

    expect(merged.rows.map((row) => row.score)).toEqual([0, 1, 2, 7, 4, 5, 8]);
    expect(mergeTables(history, merged)).toEqual(merged);
  });

  it("sorts by the sort column, keeping ties in old-then-new order", () => {
    const existing = table([
      ["typescript", "t1", 1],
      ["node", "n1", 1],
    ]);
    const incoming = table([
      ["node", "n2", 1],
      ["deno", "d1", 1],
    ]);

    const merged = mergeTables(existing, incoming);

    expect(merged.rows.map((row) => row.id)).toEqual(["d1", "n1", "n2", "t1"]);
  });

  it("matches keys loaded as text with numeric keys", () => {
    const existing: Table = { columns: ["id", "rank"], rows: [{ id: "7", rank: 1 }] };
    const incoming: Table = { columns: ["id", "rank"], rows: [{ id: 7, rank: 2 }] };

    const merged = mergeTables(existing, incoming, { sort: "rank" });

    expect(merged.rows).toEqual([{ id: "7", rank: 1 }]);
  });

  it("accepts incoming columns in another order and keeps the stored order", () => {
    const existing: Table = { columns: ["id", "subreddit_name"], rows: [] };
    const incoming: Table = {
      columns: ["subreddit_name", "id"],
      rows: [{ subreddit_name: "node", id: "n1" }],
    };

    const merged = mergeTables(existing, incoming);

    expect(merged.columns).toEqual(["id", "subreddit_name"]);
    expect(Object.keys(merged.rows[0] ?? {})).toEqual(["id", "subreddit_name"]);
  });

  it("rejects tables with different columns", () => {
    const existing = table([]);
    const incoming: Table = { columns: ["subreddit_name", "id"], rows: [] };

    expect(() => mergeTables(existing, incoming)).toThrow(SchemaMismatchError);
    expect(() => mergeTables(existing, incoming)).toThrow(
      "Both data sets must have the same features",
    );
  });

  it("rejects a key column the tables lack", () => {
    expect(() => mergeTables(table([]), table([]), { key: "url" })).toThrow(
      "Column 'url' is not in the data set",
    );
  });
});

describe("compareCells", () => {
  it("orders numbers numerically and nulls last", () => {
    const values = [10, null, 2, 33];
    expect([...values].sort(compareCells)).toEqual([2, 10, 33, null]);
  });

  it("orders text by code unit", () => {
    expect(["b", "B", "a"].sort(compareCells)).toEqual(["B", "a", "b"]);
  });

  it("puts false before true", () => {
    expect([true, false].sort(compareCells)).toEqual([false, true]);
  });
});
