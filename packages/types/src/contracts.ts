import type {
  CommentThing,
  ListingRequest,
  MoreComments,
  RedditPost,
  Table,
} from "./models.js";

/**
 * Read access to the platform. Implementations own authentication, paging
 * and retries; callers see plain values or a thrown error.
 */
export interface RedditClient {
  /** Subreddit names matching `query`, best match first. */
  searchSubredditNames(query: string): Promise<readonly string[]>;
  listPosts(subreddit: string, request: ListingRequest): AsyncIterable<RedditPost>;
  /** Comments and placeholders of a post, flattened depth-first. */
  fetchCommentTree(postId: string): Promise<readonly CommentThing[]>;
  /** Things hidden behind a placeholder, flattened depth-first. */
  expandPlaceholder(postId: string, more: MoreComments): Promise<readonly CommentThing[]>;
}

export interface TableStore {
  /** Resolves to `undefined` when nothing is stored at `location`. */
  load(location: string): Promise<Table | undefined>;
  /** Replaces whatever is stored at `location`; readers never see a partial table. */
  save(location: string, table: Table): Promise<void>;
}

export interface ProgressReporter {
  start(label: string, total?: number): void;
  tick(): void;
  finish(): void;
}
