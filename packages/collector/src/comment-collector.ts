import type {
  CommentRecord,
  ProgressReporter,
  RedditClient,
  ResolutionBound,
} from "@sampler/types";
import { CommentTree } from "./comment-tree.js";
import { isGoneError } from "./errors.js";
import type { Logger } from "./logger.js";
import { noopProgress } from "./progress.js";
import { toCommentRecord } from "./records.js";

export interface CommentCollectionOptions {
  readonly includeReplies: boolean;
  readonly resolutionBound: ResolutionBound;
  readonly logger: Logger;
  readonly progress?: ProgressReporter;
}

export interface PostStub {
  readonly id: string;
}

const toPostFullname = (postId: string): string =>
  postId.startsWith("t3_") ? postId : `t3_${postId}`;

/**
 * Fetches and flattens the comment tree of one post. A post that was deleted
 * or made private since it was listed yields no comments.
 */
export async function collectPostComments(
  client: RedditClient,
  subreddit: string,
  post: PostStub,
  options: CommentCollectionOptions,
): Promise<CommentRecord[]> {
  const { logger } = options;

  try {
    const things = await client.fetchCommentTree(post.id);
    const tree = new CommentTree(toPostFullname(post.id), things);
    const expansions = await tree.resolve(options.resolutionBound, (more) =>
      client.expandPlaceholder(post.id, more),
    );

    if (tree.orphanCount > 0) {
      logger.debug(
        { subreddit, postId: post.id, orphans: tree.orphanCount },
        "comment_orphans_dropped",
      );
    }

    const records = tree
      .flatten(options.includeReplies)
      .map((comment) => toCommentRecord(subreddit, comment));

    logger.debug(
      { subreddit, postId: post.id, comments: records.length, expansions },
      "post_comments_collected",
    );
    return records;
  } catch (error) {
    if (!isGoneError(error)) {
      throw error;
    }
    logger.warn({ subreddit, postId: post.id, error: String(error) }, "post_gone_comments_skipped");
    return [];
  }
}

/** Comments of every post, concatenated in post order. */
export async function collectSubredditComments(
  client: RedditClient,
  subreddit: string,
  posts: readonly PostStub[],
  options: CommentCollectionOptions,
): Promise<CommentRecord[]> {
  const progress = options.progress ?? noopProgress;
  const comments: CommentRecord[] = [];

  progress.start(`Collecting comments for ${posts.length} r/${subreddit} posts`, posts.length);
  try {
    for (const post of posts) {
      comments.push(...(await collectPostComments(client, subreddit, post, options)));
      progress.tick();
    }
  } finally {
    progress.finish();
  }

  options.logger.info(
    { subreddit, posts: posts.length, comments: comments.length },
    "comments_collected",
  );
  return comments;
}
