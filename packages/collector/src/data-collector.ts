import type {
  CollectResult,
  CommentRecord,
  PostRecord,
  ProgressReporter,
  RedditClient,
  ResolutionBound,
} from "@sampler/types";
import { collectSubredditComments } from "./comment-collector.js";
import { validateFilters, validatePostLimit, validateResolutionBound } from "./filters.js";
import { silentLogger, type Logger } from "./logger.js";
import { collectSubredditPosts } from "./post-collector.js";
import { noopProgress } from "./progress.js";
import { verifySubreddits } from "./verifier.js";

export interface CollectRequest {
  readonly subreddits: string | readonly string[];
  /** One of new, hot or top, any case. Defaults to "new". */
  readonly mode?: string;
  /** Posts per subreddit for new and hot; `null` for the platform maximum. */
  readonly limit?: number | null;
  /** Only used by "top"; defaults to "all" there. */
  readonly timeWindow?: string | null;
  readonly includeComments?: boolean;
  readonly includeReplies?: boolean;
  /** Placeholder expansions per post. Defaults to 0. */
  readonly resolutionBound?: ResolutionBound;
}

export interface DataCollectorOptions {
  readonly logger?: Logger;
  readonly progress?: ProgressReporter;
}

const normalizeSubreddits = (subreddits: string | readonly string[]): string[] => {
  const names = typeof subreddits === "string" ? [subreddits] : subreddits;
  const seen = new Set<string>();
  const output: string[] = [];

  for (const raw of names) {
    const name = raw.trim().replace(/^\/?r\//i, "");
    const key = name.toLowerCase();
    if (name && !seen.has(key)) {
      seen.add(key);
      output.push(name);
    }
  }
  return output;
};

/**
 * Collects posts and, optionally, their comments from one or more subreddits.
 * Every input is checked and every subreddit verified before the first
 * listing request; a failure anywhere aborts the whole call.
 */
export class DataCollector {
  private readonly logger: Logger;
  private readonly progress: ProgressReporter;

  constructor(
    private readonly client: RedditClient,
    options: DataCollectorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
    this.progress = options.progress ?? noopProgress;
  }

  async collect(request: CollectRequest): Promise<CollectResult> {
    const filters = validateFilters(request.mode ?? "new", request.timeWindow);
    const limit = validatePostLimit(request.limit);
    const resolutionBound = validateResolutionBound(request.resolutionBound);
    const subreddits = normalizeSubreddits(request.subreddits);

    await verifySubreddits(this.client, subreddits, this.logger);

    const posts = new Map<string, PostRecord[]>();
    for (const subreddit of subreddits) {
      posts.set(
        subreddit,
        await collectSubredditPosts(this.client, subreddit, {
          filters,
          limit,
          logger: this.logger,
          progress: this.progress,
        }),
      );
    }

    if (!(request.includeComments ?? true)) {
      return { posts, comments: null };
    }

    const comments = new Map<string, CommentRecord[]>();
    for (const [subreddit, subredditPosts] of posts) {
      comments.set(
        subreddit,
        await collectSubredditComments(this.client, subreddit, subredditPosts, {
          includeReplies: request.includeReplies ?? false,
          resolutionBound,
          logger: this.logger,
          progress: this.progress,
        }),
      );
    }

    return { posts, comments };
  }
}
