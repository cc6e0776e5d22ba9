import { z } from "zod";

const nullableBoolean = z
  .boolean()
  .nullish()
  .transform((value) => value ?? null);
const nullableNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? null);
const nullableString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const listingChildSchema = z.object({
  kind: z.string(),
  data: z.record(z.string(), z.unknown()),
});

export type ListingChild = z.infer<typeof listingChildSchema>;

export const listingSchema = z.object({
  data: z.object({
    after: z.string().nullish(),
    children: z.array(listingChildSchema).default([]),
  }),
});

/** `GET /comments/{id}`: the post listing, then the comment listing. */
export const commentPageSchema = z.tuple([listingSchema, listingSchema]);

export const postDataSchema = z.object({
  id: z.string(),
  subreddit: z.string(),
  created_utc: z.number(),
  is_original_content: nullableBoolean,
  is_self: nullableBoolean,
  link_flair_text: nullableString,
  locked: nullableBoolean,
  num_comments: nullableNumber,
  over_18: nullableBoolean,
  score: nullableNumber,
  spoiler: nullableBoolean,
  stickied: nullableBoolean,
  title: z.string(),
  upvote_ratio: nullableNumber,
  url: nullableString,
});

export const commentDataSchema = z.object({
  id: z.string(),
  link_id: z.string(),
  parent_id: z.string(),
  body: nullableString,
  created_utc: nullableNumber,
  is_submitter: nullableBoolean,
  score: nullableNumber,
  stickied: nullableBoolean,
  // A listing, or "" when there are no replies.
  replies: z.unknown(),
});

export const moreDataSchema = z.object({
  id: z.string(),
  parent_id: z.string(),
  count: z.number().default(0),
  children: z.array(z.string()).default([]),
});

export const searchNamesSchema = z.object({
  names: z.array(z.string()).default([]),
});

export const moreChildrenSchema = z.object({
  json: z.object({
    errors: z.array(z.unknown()).default([]),
    data: z
      .object({
        things: z.array(listingChildSchema).default([]),
      })
      .optional(),
  }),
});

export const accessTokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});
