export type RankingMode = "new" | "hot" | "top";
export type TimeWindow = "all" | "day" | "hour" | "month" | "week" | "year";

/** Maximum number of placeholder expansions per comment tree, or no limit. */
export type ResolutionBound = number | "unbounded";

// Upstream handles, as exposed by a RedditClient.

export interface RedditPost {
  readonly id: string;
  readonly subreddit: string;
  readonly createdUtc: number;
  readonly isOriginalContent: boolean | null;
  readonly isSelf: boolean | null;
  readonly linkFlairText: string | null;
  readonly locked: boolean | null;
  readonly numComments: number | null;
  readonly over18: boolean | null;
  readonly score: number | null;
  readonly spoiler: boolean | null;
  readonly stickied: boolean | null;
  readonly title: string;
  readonly upvoteRatio: number | null;
  readonly url: string | null;
}

export interface RedditComment {
  readonly id: string;
  /** Fullname of the post the comment belongs to, e.g. `t3_abc123`. */
  readonly linkId: string;
  /** Fullname of the post or comment replied to. */
  readonly parentId: string;
  readonly body: string | null;
  readonly createdUtc: number | null;
  readonly isSubmitter: boolean | null;
  readonly score: number | null;
  readonly stickied: boolean | null;
}

/** A "load more comments" entry that has not been fetched yet. */
export interface MoreComments {
  readonly id: string;
  readonly parentId: string;
  readonly count: number;
  /** Ids of the hidden comments. Empty for "continue this thread" entries. */
  readonly children: readonly string[];
}

export type CommentThing =
  | { readonly kind: "comment"; readonly comment: RedditComment }
  | { readonly kind: "more"; readonly more: MoreComments };

export interface ListingRequest {
  readonly mode: RankingMode;
  /** `null` pages until the platform stops returning results. */
  readonly limit: number | null;
  readonly timeWindow: TimeWindow | null;
}

// Flat records. Column names are the persisted dataset schema.

export type PostRecord = {
  readonly subreddit_name: string;
  readonly post_created_utc: number;
  readonly id: string;
  readonly is_original_content: boolean | null;
  readonly is_self: boolean | null;
  readonly link_flair_text: string | null;
  readonly locked: boolean | null;
  readonly num_comments: number | null;
  readonly over_18: boolean | null;
  readonly score: number | null;
  readonly spoiler: boolean | null;
  readonly stickied: boolean | null;
  readonly title: string;
  readonly upvote_ratio: number | null;
  readonly url: string | null;
};

export type CommentRecord = {
  readonly subreddit_name: string;
  readonly id: string;
  readonly post_id: string;
  readonly parent_id: string;
  readonly top_level_comment: boolean;
  readonly body: string | null;
  readonly comment_created_utc: number | null;
  readonly is_submitter: boolean | null;
  readonly score: number | null;
  readonly stickied: boolean | null;
};

/** Records per subreddit, in request order. */
export type CollectionResult<R> = Map<string, R[]>;

export interface CollectResult {
  readonly posts: CollectionResult<PostRecord>;
  readonly comments: CollectionResult<CommentRecord> | null;
}

// Tables

export type Cell = string | number | boolean | null;
export type Row = Readonly<Record<string, Cell>>;

export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

export type ColumnType = "string" | "number" | "boolean";
export type ColumnTypes = Readonly<Record<string, ColumnType>>;

export const POST_COLUMN_TYPES = {
  subreddit_name: "string",
  post_created_utc: "number",
  id: "string",
  is_original_content: "boolean",
  is_self: "boolean",
  link_flair_text: "string",
  locked: "boolean",
  num_comments: "number",
  over_18: "boolean",
  score: "number",
  spoiler: "boolean",
  stickied: "boolean",
  title: "string",
  upvote_ratio: "number",
  url: "string",
} as const satisfies Record<keyof PostRecord, ColumnType>;

export const COMMENT_COLUMN_TYPES = {
  subreddit_name: "string",
  id: "string",
  post_id: "string",
  parent_id: "string",
  top_level_comment: "boolean",
  body: "string",
  comment_created_utc: "number",
  is_submitter: "boolean",
  score: "number",
  stickied: "boolean",
} as const satisfies Record<keyof CommentRecord, ColumnType>;

export const POST_COLUMNS: readonly (keyof PostRecord)[] = [
  "subreddit_name",
  "post_created_utc",
  "id",
  "is_original_content",
  "is_self",
  "link_flair_text",
  "locked",
  "num_comments",
  "over_18",
  "score",
  "spoiler",
  "stickied",
  "title",
  "upvote_ratio",
  "url",
];

export const COMMENT_COLUMNS: readonly (keyof CommentRecord)[] = [
  "subreddit_name",
  "id",
  "post_id",
  "parent_id",
  "top_level_comment",
  "body",
  "comment_created_utc",
  "is_submitter",
  "score",
  "stickied",
];
