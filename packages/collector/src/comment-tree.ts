import type { CommentThing, MoreComments, RedditComment, ResolutionBound } from "@sampler/types";

export type PlaceholderState = "unresolved" | "resolving" | "resolved" | "exhausted";

interface CommentNode {
  readonly kind: "comment";
  readonly comment: RedditComment;
  readonly replies: TreeNode[];
}

interface PlaceholderNode {
  readonly kind: "more";
  readonly more: MoreComments;
  state: PlaceholderState;
}

type TreeNode = CommentNode | PlaceholderNode;

export type PlaceholderExpander = (more: MoreComments) => Promise<readonly CommentThing[]>;

export interface PlaceholderSummary {
  readonly id: string;
  readonly parentId: string;
  readonly count: number;
  readonly state: PlaceholderState;
}

const parentOf = (thing: CommentThing): string =>
  thing.kind === "comment" ? thing.comment.parentId : thing.more.parentId;

/**
 * Comment forest of one post. Built from the flat depth-first thing list a
 * client returns; placeholders are expanded only through {@link resolve}.
 */
export class CommentTree {
  private readonly roots: TreeNode[] = [];
  /** Reply lists by parent fullname; the post's fullname maps to the roots. */
  private readonly siblings = new Map<string, TreeNode[]>();
  /** In discovery order, which breaks ties between equally large placeholders. */
  private readonly placeholders: PlaceholderNode[] = [];
  private orphans = 0;

  constructor(
    readonly postFullname: string,
    things: readonly CommentThing[],
  ) {
    this.siblings.set(postFullname, this.roots);
    for (const thing of things) {
      this.append(thing);
    }
  }

  /** Things whose parent was never seen; they are left out of the tree. */
  get orphanCount(): number {
    return this.orphans;
  }

  get placeholderSummaries(): readonly PlaceholderSummary[] {
    return this.placeholders.map((node) => ({
      id: node.more.id,
      parentId: node.more.parentId,
      count: node.more.count,
      state: node.state,
    }));
  }

  /**
   * Expands placeholders, largest first, until `bound` expansions have been
   * made or none remain. Placeholders left over are marked exhausted.
   * Returns the number of expansions performed.
   */
  async resolve(bound: ResolutionBound, expand: PlaceholderExpander): Promise<number> {
    let resolved = 0;

    for (;;) {
      const next = this.nextUnresolved();
      if (!next) {
        break;
      }

      if (bound !== "unbounded" && resolved >= bound) {
        for (const node of this.placeholders) {
          if (node.state === "unresolved") {
            node.state = "exhausted";
          }
        }
        break;
      }

      next.state = "resolving";
      const things = await expand(next.more);
      this.replace(next, things);
      next.state = "resolved";
      resolved += 1;
    }

    return resolved;
  }

  /** Top-level comments only, or every comment depth-first. Placeholders are skipped. */
  flatten(includeReplies: boolean): RedditComment[] {
    if (!includeReplies) {
      return this.roots.flatMap((node) => (node.kind === "comment" ? [node.comment] : []));
    }

    const output: RedditComment[] = [];
    const visit = (nodes: readonly TreeNode[]): void => {
      for (const node of nodes) {
        if (node.kind !== "comment") {
          continue;
        }
        output.push(node.comment);
        visit(node.replies);
      }
    };
    visit(this.roots);
    return output;
  }

  private nextUnresolved(): PlaceholderNode | undefined {
    let best: PlaceholderNode | undefined;
    for (const node of this.placeholders) {
      if (node.state !== "unresolved") {
        continue;
      }
      if (!best || node.more.count > best.more.count) {
        best = node;
      }
    }
    return best;
  }

  private createNode(thing: CommentThing): TreeNode {
    if (thing.kind === "comment") {
      const node: CommentNode = { kind: "comment", comment: thing.comment, replies: [] };
      this.siblings.set(`t1_${thing.comment.id}`, node.replies);
      return node;
    }

    const node: PlaceholderNode = { kind: "more", more: thing.more, state: "unresolved" };
    this.placeholders.push(node);
    return node;
  }

  private append(thing: CommentThing): void {
    const list = this.siblings.get(parentOf(thing));
    if (!list) {
      this.orphans += 1;
      return;
    }
    list.push(this.createNode(thing));
  }

  /** Splices expanded things in where the placeholder stood. */
  private replace(placeholder: PlaceholderNode, things: readonly CommentThing[]): void {
    const list = this.siblings.get(placeholder.more.parentId);
    let cursor = list ? list.indexOf(placeholder) : -1;

    if (list && cursor >= 0) {
      list.splice(cursor, 1);
    }

    for (const thing of things) {
      if (list && cursor >= 0 && parentOf(thing) === placeholder.more.parentId) {
        list.splice(cursor, 0, this.createNode(thing));
        cursor += 1;
      } else {
        this.append(thing);
      }
    }
  }
}
