import type { CommentRecord, PostRecord, RedditComment, RedditPost } from "@sampler/types";

export function toPostRecord(post: RedditPost): PostRecord {
  return {
    subreddit_name: post.subreddit,
    post_created_utc: post.createdUtc,
    id: post.id,
    is_original_content: post.isOriginalContent,
    is_self: post.isSelf,
    link_flair_text: post.linkFlairText,
    locked: post.locked,
    num_comments: post.numComments,
    over_18: post.over18,
    score: post.score,
    spoiler: post.spoiler,
    stickied: post.stickied,
    title: post.title,
    upvote_ratio: post.upvoteRatio,
    url: post.url,
  };
}

/**
 * `subreddit` is the subreddit the post was collected from, not anything
 * reported on the comment: replies can be reached through other listings.
 */
export function toCommentRecord(subreddit: string, comment: RedditComment): CommentRecord {
  return {
    subreddit_name: subreddit,
    id: comment.id,
    post_id: comment.linkId,
    parent_id: comment.parentId,
    top_level_comment: comment.parentId === comment.linkId,
    body: comment.body,
    comment_created_utc: comment.createdUtc,
    is_submitter: comment.isSubmitter,
    score: comment.score,
    stickied: comment.stickied,
  };
}
