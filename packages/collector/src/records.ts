import { parseParentRef } from '@threadgraph/network'
import { epochToIso } from './dates.js'
import type { RedditComment, RedditLink, RedditUser } from './schema.js'
import type { CommentRecord, PostRecord, UserRecord } from './types.js'

export const DELETED_AUTHOR = '[deleted]'

const ACCOUNT_PREFIX = 't2_'
const PERMALINK_ORIGIN = 'https://reddit.com'

type Author = { author_id: string | null; author_name: string }

function toAuthor(author: string, fullname: string | undefined): Author {
  if (!fullname || author === DELETED_AUTHOR) {
    return { author_id: null, author_name: DELETED_AUTHOR }
  }
  return { author_id: fullname.replace(ACCOUNT_PREFIX, ''), author_name: author }
}

export function toPostRecord(link: RedditLink): PostRecord {
  const { author_id, author_name } = toAuthor(link.author, link.author_fullname)
  return {
    post_id: link.id,
    title: link.title,
    author_id,
    author_name,
    subreddit: link.subreddit,
    score: link.score,
    upvote_ratio: link.upvote_ratio,
    num_comments: link.num_comments,
    created_utc: link.created_utc,
    created_datetime: epochToIso(link.created_utc),
    is_self: link.is_self,
    selftext: link.selftext,
    url: link.url,
    permalink: `${PERMALINK_ORIGIN}${link.permalink}`,
    flair: link.link_flair_text ?? null,
    stickied: link.stickied,
    locked: link.locked,
    spoiler: link.spoiler,
    nsfw: link.over_18
  }
}

export function toCommentRecord(comment: RedditComment, postId: string): CommentRecord {
  const { author_id, author_name } = toAuthor(comment.author, comment.author_fullname)
  const { parent_id, parent_type } = parseParentRef(comment.parent_id)
  return {
    comment_id: comment.id,
    post_id: postId,
    author_id,
    author_name,
    body: comment.body,
    score: comment.score,
    created_utc: comment.created_utc,
    created_datetime: epochToIso(comment.created_utc),
    parent_id,
    parent_type,
    is_submitter: comment.is_submitter,
    stickied: comment.stickied,
    depth: comment.depth,
    controversiality: comment.controversiality,
    gilded: comment.gilded
  }
}

export function toUserRecord(user: RedditUser): UserRecord {
  return {
    user_id: user.id,
    username: user.name,
    link_karma: user.link_karma,
    comment_karma: user.comment_karma,
    total_karma: user.total_karma ?? user.link_karma + user.comment_karma,
    created_utc: user.created_utc,
    created_datetime: epochToIso(user.created_utc),
    is_gold: user.is_gold,
    is_mod: user.is_mod,
    is_employee: user.is_employee,
    has_verified_email: user.has_verified_email
  }
}
