import type { PostRecord, ProgressReporter, RedditClient } from "@sampler/types";
import { PLATFORM_MAX_POSTS, type ListingFilters } from "./filters.js";
import type { Logger } from "./logger.js";
import { noopProgress } from "./progress.js";
import { toPostRecord } from "./records.js";

export interface PostCollectionOptions {
  readonly filters: ListingFilters;
  /** `null` means the platform maximum. Ignored for "top". */
  readonly limit: number | null;
  readonly logger: Logger;
  readonly progress?: ProgressReporter;
}

/**
 * Yields one record per listed post, in the listing's ranking order.
 * "top" listings ignore `limit` and run to the platform's window-bounded maximum.
 */
export async function* streamSubredditPosts(
  client: RedditClient,
  subreddit: string,
  options: PostCollectionOptions,
): AsyncGenerator<PostRecord> {
  const { filters, logger } = options;
  const progress = options.progress ?? noopProgress;

  if (filters.mode === "top" && options.limit !== null) {
    logger.warn({ subreddit, limit: options.limit }, "post_limit_ignored_for_top");
  }

  const limit =
    filters.mode === "top" ? PLATFORM_MAX_POSTS : (options.limit ?? PLATFORM_MAX_POSTS);

  progress.start(
    `Collecting ${filters.mode} r/${subreddit} posts`,
    filters.mode === "top" || options.limit === null ? undefined : limit,
  );

  let collected = 0;
  try {
    for await (const post of client.listPosts(subreddit, {
      mode: filters.mode,
      limit,
      timeWindow: filters.timeWindow,
    })) {
      yield toPostRecord(post);
      collected += 1;
      progress.tick();

      if (collected >= limit) {
        break;
      }
    }
  } finally {
    progress.finish();
  }

  logger.info({ subreddit, mode: filters.mode, posts: collected }, "posts_collected");
}

export async function collectSubredditPosts(
  client: RedditClient,
  subreddit: string,
  options: PostCollectionOptions,
): Promise<PostRecord[]> {
  const posts: PostRecord[] = [];
  for await (const post of streamSubredditPosts(client, subreddit, options)) {
    posts.push(post);
  }
  return posts;
}
