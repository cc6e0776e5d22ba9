import type { CommentRecord } from "@sampler/types";
import { COMMENT_COLUMNS } from "@sampler/types";
import { describe, expect, it } from "vitest";
import { toCombinedTable, toSeparateTables, toTable } from "../src/tabular.js";

const record = (subreddit: string, id: string): CommentRecord => ({
  subreddit_name: subreddit,
  id,
  post_id: "t3_p1",
  parent_id: "t3_p1",
  top_level_comment: true,
  body: null,
  comment_created_utc: 1_700_000_000,
  is_submitter: false,
  score: 3,
  stickied: false,
});

describe("tabular conversion", () => {
  const result = new Map<string, CommentRecord[]>([
    ["node", [record("node", "n1"), record("node", "n2")]],
    ["typescript", [record("typescript", "t1")]],
  ]);

  it("keeps the requested column order", () => {
    const table = toTable(["id", "score"], [record("node", "n1")]);
    expect(table).toEqual({ columns: ["id", "score"], rows: [{ id: "n1", score: 3 }] });
  });

  it("builds one table per subreddit", () => {
    const tables = toSeparateTables(COMMENT_COLUMNS, result);
    expect([...tables.keys()]).toEqual(["node", "typescript"]);
    expect(tables.get("node")?.rows.map((row) => row.id)).toEqual(["n1", "n2"]);
    expect(tables.get("typescript")?.columns).toEqual(COMMENT_COLUMNS);
  });

  it("concatenates subreddit blocks into one table", () => {
    const table = toCombinedTable(COMMENT_COLUMNS, result);
    expect(table.rows.map((row) => `${row.subreddit_name}/${row.id}`)).toEqual([
      "node/n1",
      "node/n2",
      "typescript/t1",
    ]);
    expect(table.rows[0]?.body).toBeNull();
  });

  it("gives an empty result an empty table with the full header", () => {
    const table = toCombinedTable(COMMENT_COLUMNS, new Map<string, CommentRecord[]>());
    expect(table).toEqual({ columns: [...COMMENT_COLUMNS], rows: [] });
  });
});
