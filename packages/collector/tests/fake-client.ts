import type {
  CommentThing,
  ListingRequest,
  MoreComments,
  RedditClient,
  RedditComment,
  RedditPost,
} from "@sampler/types";
import { RedditApiError } from "../src/errors.js";

export const post = (id: string, overrides: Partial<RedditPost> = {}): RedditPost => ({
  id,
  subreddit: "typescript",
  createdUtc: 1_700_000_000,
  isOriginalContent: false,
  isSelf: true,
  linkFlairText: null,
  locked: false,
  numComments: 0,
  over18: false,
  score: 1,
  spoiler: false,
  stickied: false,
  title: `Post ${id}`,
  upvoteRatio: 1,
  url: `https://example.test/${id}`,
  ...overrides,
});

export const comment = (id: string, parentId: string, linkId = "t3_p1"): CommentThing => ({
  kind: "comment",
  comment: {
    id,
    linkId,
    parentId,
    body: `body ${id}`,
    createdUtc: 1_700_000_100,
    isSubmitter: false,
    score: 1,
    stickied: false,
  } satisfies RedditComment,
});

export const more = (
  id: string,
  parentId: string,
  count: number,
  children: readonly string[] = [id],
): CommentThing => ({ kind: "more", more: { id, parentId, count, children } });

export interface ListCall {
  readonly subreddit: string;
  readonly request: ListingRequest;
}

/** In-memory client; records every call it receives. */
export class FakeRedditClient implements RedditClient {
  readonly subreddits = new Set<string>();
  readonly posts = new Map<string, RedditPost[]>();
  readonly trees = new Map<string, CommentThing[]>();
  /** Expansion results by placeholder id. */
  readonly expansions = new Map<string, CommentThing[]>();
  /** Post ids whose comment page answers with this status. */
  readonly failures = new Map<string, number>();

  readonly searches: string[] = [];
  readonly listCalls: ListCall[] = [];
  /** Posts handed out by `listPosts` so far. */
  listed = 0;
  readonly treeCalls: string[] = [];
  readonly expandCalls: string[] = [];

  async searchSubredditNames(query: string): Promise<readonly string[]> {
    this.searches.push(query);
    const lowered = query.toLowerCase();
    return [...this.subreddits].filter((name) => name.toLowerCase().startsWith(lowered));
  }

  async *listPosts(subreddit: string, request: ListingRequest): AsyncGenerator<RedditPost> {
    this.listCalls.push({ subreddit, request });
    for (const item of this.posts.get(subreddit) ?? []) {
      this.listed += 1;
      yield item;
    }
  }

  async fetchCommentTree(postId: string): Promise<readonly CommentThing[]> {
    this.treeCalls.push(postId);
    const status = this.failures.get(postId);
    if (status !== undefined) {
      throw new RedditApiError(status, `https://oauth.reddit.com/comments/${postId}`);
    }
    return this.trees.get(postId) ?? [];
  }

  async expandPlaceholder(_postId: string, placeholder: MoreComments): Promise<readonly CommentThing[]> {
    this.expandCalls.push(placeholder.id);
    return this.expansions.get(placeholder.id) ?? [];
  }
}
