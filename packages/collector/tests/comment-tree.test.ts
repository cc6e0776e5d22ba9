import type { CommentThing, MoreComments } from "@sampler/types";
import { describe, expect, it } from "vitest";
import { CommentTree } from "../src/comment-tree.js";
import { comment, more } from "./fake-client.js";

const ids = (tree: CommentTree, includeReplies: boolean) =>
  tree.flatten(includeReplies).map((item) => item.id);

const expander = (expansions: Record<string, CommentThing[]>) => {
  const calls: string[] = [];
  const expand = async (placeholder: MoreComments) => {
    calls.push(placeholder.id);
    return expansions[placeholder.id] ?? [];
  };
  return { calls, expand };
};

describe("CommentTree", () => {
  const things = [
    comment("c1", "t3_p1"),
    comment("c1a", "t1_c1"),
    comment("c1b", "t1_c1"),
    comment("c2", "t3_p1"),
    comment("c2a", "t1_c2"),
  ];

  it("flattens top-level comments only", () => {
    expect(ids(new CommentTree("t3_p1", things), false)).toEqual(["c1", "c2"]);
  });

  it("flattens every comment depth-first", () => {
    expect(ids(new CommentTree("t3_p1", things), true)).toEqual(["c1", "c1a", "c1b", "c2", "c2a"]);
  });

  it("drops things whose parent is unknown", () => {
    const tree = new CommentTree("t3_p1", [comment("c1", "t3_p1"), comment("x", "t1_missing")]);
    expect(ids(tree, true)).toEqual(["c1"]);
    expect(tree.orphanCount).toBe(1);
  });

  it("leaves placeholders unexpanded with a zero bound", async () => {
    const tree = new CommentTree("t3_p1", [comment("c1", "t3_p1"), more("m1", "t3_p1", 5)]);
    const { calls, expand } = expander({});

    await expect(tree.resolve(0, expand)).resolves.toBe(0);

    expect(calls).toEqual([]);
    expect(ids(tree, true)).toEqual(["c1"]);
    expect(tree.placeholderSummaries).toEqual([
      { id: "m1", parentId: "t3_p1", count: 5, state: "exhausted" },
    ]);
  });

  it("expands the largest placeholder first, ties in discovery order", async () => {
    const tree = new CommentTree("t3_p1", [
      comment("c1", "t3_p1"),
      more("small", "t1_c1", 2),
      more("tieA", "t3_p1", 7),
      more("tieB", "t3_p1", 7),
    ]);
    const { calls, expand } = expander({
      tieA: [comment("c2", "t3_p1")],
      tieB: [comment("c3", "t3_p1")],
    });

    await expect(tree.resolve(2, expand)).resolves.toBe(2);

    expect(calls).toEqual(["tieA", "tieB"]);
    expect(tree.placeholderSummaries.map((summary) => summary.state)).toEqual([
      "exhausted",
      "resolved",
      "resolved",
    ]);
  });

  it("splices expanded comments where the placeholder stood", async () => {
    const tree = new CommentTree("t3_p1", [
      comment("c1", "t3_p1"),
      more("m1", "t3_p1", 3),
      comment("c9", "t3_p1"),
    ]);
    const { expand } = expander({
      m1: [comment("c2", "t3_p1"), comment("c2a", "t1_c2"), comment("c3", "t3_p1")],
    });

    await tree.resolve("unbounded", expand);

    expect(ids(tree, false)).toEqual(["c1", "c2", "c3", "c9"]);
    expect(ids(tree, true)).toEqual(["c1", "c2", "c2a", "c3", "c9"]);
  });

  it("expands placeholders revealed by an earlier expansion when unbounded", async () => {
    const tree = new CommentTree("t3_p1", [comment("c1", "t3_p1"), more("m1", "t1_c1", 4)]);
    const { calls, expand } = expander({
      m1: [comment("c1a", "t1_c1"), more("m2", "t1_c1a", 1)],
      m2: [comment("c1a1", "t1_c1a")],
    });

    await expect(tree.resolve("unbounded", expand)).resolves.toBe(2);

    expect(calls).toEqual(["m1", "m2"]);
    expect(ids(tree, true)).toEqual(["c1", "c1a", "c1a1"]);
  });
});
