import type { RedditClient } from "@sampler/types";
import { TargetNotFoundError } from "./errors.js";
import type { Logger } from "./logger.js";

/**
 * The name search may return several similar subreddits; only an exact,
 * case-insensitive match in first position counts.
 */
export async function subredditExists(client: RedditClient, name: string): Promise<boolean> {
  const matches = await client.searchSubredditNames(name);
  const first = matches[0];
  return first !== undefined && first.toLowerCase() === name.toLowerCase();
}

/** Checks every name and reports all missing ones together. */
export async function verifySubreddits(
  client: RedditClient,
  names: readonly string[],
  logger?: Logger,
): Promise<void> {
  const missing: string[] = [];

  for (const name of names) {
    if (await subredditExists(client, name)) {
      logger?.debug({ subreddit: name }, "subreddit_verified");
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    logger?.warn({ subreddits: missing }, "subreddit_not_found");
    throw new TargetNotFoundError(missing);
  }
}
