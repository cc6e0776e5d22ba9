import type {
  CommentThing,
  ListingRequest,
  MoreComments,
  RedditClient,
  RedditPost,
} from "@sampler/types";
import type { z } from "zod";
import { RedditApiError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  accessTokenSchema,
  commentDataSchema,
  commentPageSchema,
  listingSchema,
  moreChildrenSchema,
  moreDataSchema,
  postDataSchema,
  searchNamesSchema,
  type ListingChild,
} from "./reddit-schemas.js";
import { RetryableError, sleep, withRetry } from "./retry.js";

const TOKEN_URL = "https://www.reddit.com/api/v1/access_token";
const API_BASE = "https://oauth.reddit.com";
const PAGE_SIZE = 100;
const COMMENT_PAGE_LIMIT = 500;

export interface RedditApiClientConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly userAgent: string;
  /** With a username and password the client uses the password grant. */
  readonly username?: string;
  readonly password?: string;
  readonly requestDelayMs: number;
  readonly maxRetryAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly logger?: Logger;
}

interface AccessToken {
  readonly value: string;
  readonly expiresAt: number;
}

const stripPrefix = (id: string, prefix: string): string =>
  id.startsWith(prefix) ? id.slice(prefix.length) : id;

function toRedditPost(data: z.infer<typeof postDataSchema>): RedditPost {
  return {
    id: data.id,
    subreddit: data.subreddit,
    createdUtc: data.created_utc,
    isOriginalContent: data.is_original_content,
    isSelf: data.is_self,
    linkFlairText: data.link_flair_text,
    locked: data.locked,
    numComments: data.num_comments,
    over18: data.over_18,
    score: data.score,
    spoiler: data.spoiler,
    stickied: data.stickied,
    title: data.title,
    upvoteRatio: data.upvote_ratio,
    url: data.url,
  };
}

/** Appends comments and placeholders depth-first, descending into nested reply listings. */
export function parseCommentThings(
  children: readonly ListingChild[],
  output: CommentThing[] = [],
): CommentThing[] {
  for (const child of children) {
    if (child.kind === "t1") {
      const data = commentDataSchema.parse(child.data);
      output.push({
        kind: "comment",
        comment: {
          id: data.id,
          linkId: data.link_id,
          parentId: data.parent_id,
          body: data.body,
          createdUtc: data.created_utc,
          isSubmitter: data.is_submitter,
          score: data.score,
          stickied: data.stickied,
        },
      });

      const replies = listingSchema.safeParse(data.replies);
      if (replies.success) {
        parseCommentThings(replies.data.data.children, output);
      }
    } else if (child.kind === "more") {
      const data = moreDataSchema.parse(child.data);
      output.push({
        kind: "more",
        more: {
          id: data.id,
          parentId: data.parent_id,
          count: data.count,
          children: data.children,
        },
      });
    }
  }
  return output;
}

/** Authenticated client for the Reddit OAuth API. Requests are sequential and paced. */
export class RedditApiClient implements RedditClient {
  private token: AccessToken | null = null;
  private readonly logger: Logger;

  constructor(private readonly config: RedditApiClientConfig) {
    this.logger = config.logger ?? silentLogger;
  }

  async searchSubredditNames(query: string): Promise<readonly string[]> {
    const url = new URL(`${API_BASE}/api/search_reddit_names`);
    url.searchParams.set("query", query);
    url.searchParams.set("exact", "false");
    url.searchParams.set("include_over_18", "true");

    const response = await this.getJson(url, searchNamesSchema);
    return response.names;
  }

  async *listPosts(subreddit: string, request: ListingRequest): AsyncGenerator<RedditPost> {
    const limit = request.limit ?? Number.POSITIVE_INFINITY;
    let after: string | null | undefined;
    let listed = 0;

    while (listed < limit) {
      const url = new URL(`${API_BASE}/r/${encodeURIComponent(subreddit)}/${request.mode}`);
      url.searchParams.set("limit", String(Math.min(PAGE_SIZE, limit - listed)));
      url.searchParams.set("raw_json", "1");
      if (request.timeWindow) {
        url.searchParams.set("t", request.timeWindow);
      }
      if (after) {
        url.searchParams.set("after", after);
      }

      const listing = await this.getJson(url, listingSchema);
      const children = listing.data.children.filter((child) => child.kind === "t3");
      if (children.length === 0) {
        return;
      }

      for (const child of children) {
        yield toRedditPost(postDataSchema.parse(child.data));
        listed += 1;
        if (listed >= limit) {
          return;
        }
      }

      after = listing.data.after;
      if (!after) {
        return;
      }
    }
  }

  async fetchCommentTree(postId: string): Promise<readonly CommentThing[]> {
    const url = this.commentPageUrl(postId);
    const [postListing, commentListing] = await this.getJson(url, commentPageSchema);

    if (!postListing.data.children.some((child) => child.kind === "t3")) {
      throw new RedditApiError(404, url.toString(), `Post not found: ${postId}`);
    }

    return parseCommentThings(commentListing.data.children);
  }

  async expandPlaceholder(postId: string, more: MoreComments): Promise<readonly CommentThing[]> {
    if (more.children.length === 0) {
      return this.continueThread(postId, more);
    }

    const url = new URL(`${API_BASE}/api/morechildren`);
    url.searchParams.set("api_type", "json");
    url.searchParams.set("link_id", `t3_${stripPrefix(postId, "t3_")}`);
    url.searchParams.set("children", more.children.join(","));
    url.searchParams.set("raw_json", "1");

    const response = await this.getJson(url, moreChildrenSchema);
    if (response.json.errors.length > 0) {
      throw new Error(`morechildren failed for ${more.id}: ${JSON.stringify(response.json.errors)}`);
    }

    return parseCommentThings(response.json.data?.things ?? []);
  }

  /** "Continue this thread": re-fetch the page focused on the parent comment and keep its replies. */
  private async continueThread(postId: string, more: MoreComments): Promise<readonly CommentThing[]> {
    const focusId = stripPrefix(more.parentId, "t1_");
    const url = this.commentPageUrl(postId);
    url.searchParams.set("comment", focusId);

    const [, commentListing] = await this.getJson(url, commentPageSchema);
    return parseCommentThings(commentListing.data.children).filter(
      (thing) => !(thing.kind === "comment" && thing.comment.id === focusId),
    );
  }

  private commentPageUrl(postId: string): URL {
    const url = new URL(`${API_BASE}/comments/${stripPrefix(postId, "t3_")}`);
    url.searchParams.set("limit", String(COMMENT_PAGE_LIMIT));
    url.searchParams.set("raw_json", "1");
    return url;
  }

  private async accessToken(): Promise<string> {
    if (this.token && Date.now() < this.token.expiresAt) {
      return this.token.value;
    }

    const { clientId, clientSecret, username, password } = this.config;
    const body = new URLSearchParams(
      username && password
        ? { grant_type: "password", username, password }
        : { grant_type: "client_credentials" },
    );

    const response = await this.send(TOKEN_URL, {
      method: "POST",
      headers: {
        authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`,
        "content-type": "application/x-www-form-urlencoded",
      },
      body,
    });
    const token = accessTokenSchema.parse(response);

    this.token = {
      value: token.access_token,
      // Refresh a minute early.
      expiresAt: Date.now() + token.expires_in * 1000 - 60_000,
    };
    this.logger.debug({ expiresIn: token.expires_in }, "reddit_authenticated");
    return this.token.value;
  }

  private async getJson<S extends z.ZodTypeAny>(url: URL, schema: S): Promise<z.output<S>> {
    const payload = await this.send(url.toString(), {}, true);
    return schema.parse(payload);
  }

  private async send(url: string, init: RequestInit, authorize = false): Promise<unknown> {
    const payload = await withRetry(
      async () => {
        const headers = new Headers(init.headers);
        headers.set("user-agent", this.config.userAgent);
        headers.set("accept", "application/json");
        if (authorize) {
          headers.set("authorization", `Bearer ${await this.accessToken()}`);
        }

        const res = await fetch(url, { ...init, headers });

        if (res.status === 401 && authorize) {
          this.token = null;
          throw new RetryableError(`Unauthorized, refreshing token: ${url}`);
        }

        if (res.status === 429) {
          const retryAfterHeader = res.headers.get("retry-after");
          const retryAfterMs = retryAfterHeader ? Number(retryAfterHeader) * 1000 : undefined;
          throw new RetryableError(`Rate limited: ${url}`, retryAfterMs);
        }

        if (res.status >= 500) {
          throw new RetryableError(`Upstream server error ${res.status}: ${url}`);
        }

        if (!res.ok) {
          throw new RedditApiError(res.status, url);
        }

        const body: unknown = await res.json();
        return body;
      },
      {
        maxAttempts: this.config.maxRetryAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        onRetry: ({ attempt, delayMs, error }) => {
          this.logger.warn({ url, attempt, delayMs, reason: error.message }, "reddit_request_retry");
        },
      },
    );

    await sleep(this.config.requestDelayMs);
    return payload;
  }
}
