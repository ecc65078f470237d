import { z } from 'zod'
import type { CommentRecord, PostRecord, UserRecord } from './types.js'

// Reddit API payloads. Only the fields the collector maps are declared;
// everything else in a thing is stripped.

export const thingSchema = z.object({
  kind: z.string(),
  data: z.unknown()
})

export const listingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(thingSchema)
  })
})

// A comments page is the post listing followed by the comment listing.
export const threadSchema = z.tuple([listingSchema, listingSchema])

export const linkSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  author: z.string(),
  author_fullname: z.string().optional(),
  subreddit: z.string(),
  score: z.number(),
  upvote_ratio: z.number().default(0),
  num_comments: z.number().int(),
  created_utc: z.number(),
  is_self: z.boolean().default(false),
  selftext: z.string().default(''),
  url: z.string(),
  permalink: z.string(),
  link_flair_text: z.string().nullable().optional(),
  stickied: z.boolean().default(false),
  locked: z.boolean().default(false),
  spoiler: z.boolean().default(false),
  over_18: z.boolean().default(false)
})

export const commentSchema = z.object({
  id: z.string().min(1),
  author: z.string(),
  author_fullname: z.string().optional(),
  body: z.string(),
  score: z.number(),
  created_utc: z.number(),
  parent_id: z.string().min(1),
  is_submitter: z.boolean().default(false),
  stickied: z.boolean().default(false),
  depth: z.number().int().default(0),
  controversiality: z.number().int().default(0),
  gilded: z.number().int().default(0),
  replies: z.union([listingSchema, z.literal('')]).optional()
})

export const userAboutSchema = z.object({
  kind: z.literal('t2'),
  data: z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    link_karma: z.number(),
    comment_karma: z.number(),
    total_karma: z.number().optional(),
    created_utc: z.number(),
    is_gold: z.boolean().default(false),
    is_mod: z.boolean().default(false),
    is_employee: z.boolean().default(false),
    has_verified_email: z.boolean().nullable().default(null)
  })
})

export type RedditListing = z.infer<typeof listingSchema>
export type RedditThing = z.infer<typeof thingSchema>
export type RedditLink = z.infer<typeof linkSchema>
export type RedditComment = z.infer<typeof commentSchema>
export type RedditUser = z.infer<typeof userAboutSchema>['data']

// Cached CSV rows hold strings only; these restore the record types.

function blankTo(value: unknown, replacement: null | undefined): unknown {
  return value === '' ? replacement : value
}

function toBoolean(value: unknown): unknown {
  if (value === 'true') return true
  if (value === 'false') return false
  return value
}

const csvNumber = z.preprocess((value) => blankTo(value, undefined), z.coerce.number().finite())
const csvBoolean = z.preprocess(toBoolean, z.boolean())
const csvNullableBoolean = z.preprocess(
  (value) => toBoolean(blankTo(value, null)),
  z.boolean().nullable()
)
const csvNullableString = z.preprocess((value) => blankTo(value, null) ?? null, z.string().nullable())
const csvText = z.preprocess((value) => value ?? '', z.string())

export const postRecordSchema: z.ZodType<PostRecord, z.ZodTypeDef, unknown> = z.object({
  post_id: z.string().min(1),
  title: csvText,
  author_id: csvNullableString,
  author_name: z.string(),
  subreddit: z.string(),
  score: csvNumber,
  upvote_ratio: csvNumber,
  num_comments: csvNumber,
  created_utc: csvNumber,
  created_datetime: z.string(),
  is_self: csvBoolean,
  selftext: csvText,
  url: csvText,
  permalink: csvText,
  flair: csvNullableString,
  stickied: csvBoolean,
  locked: csvBoolean,
  spoiler: csvBoolean,
  nsfw: csvBoolean
})

export const commentRecordSchema: z.ZodType<CommentRecord, z.ZodTypeDef, unknown> = z.object({
  comment_id: z.string().min(1),
  post_id: z.string().min(1),
  author_id: csvNullableString,
  author_name: z.string(),
  body: csvText,
  score: csvNumber,
  created_utc: csvNumber,
  created_datetime: z.string(),
  parent_id: z.string().min(1),
  parent_type: z.enum(['post', 'comment']),
  is_submitter: csvBoolean,
  stickied: csvBoolean,
  depth: csvNumber,
  controversiality: csvNumber,
  gilded: csvNumber
})

export const userRecordSchema: z.ZodType<UserRecord, z.ZodTypeDef, unknown> = z.object({
  user_id: z.string().min(1),
  username: z.string().min(1),
  link_karma: csvNumber,
  comment_karma: csvNumber,
  total_karma: csvNumber,
  created_utc: csvNumber,
  created_datetime: z.string(),
  is_gold: csvBoolean,
  is_mod: csvBoolean,
  is_employee: csvBoolean,
  has_verified_email: csvNullableBoolean
})
