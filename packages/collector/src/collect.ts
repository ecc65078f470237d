import { commentSchema } from './schema.js'
import type { RedditComment, RedditThing } from './schema.js'
import { decode } from './reddit.js'
import type { RedditClient } from './reddit.js'
import { DELETED_AUTHOR, toCommentRecord, toPostRecord, toUserRecord } from './records.js'
import type { CommentRecord, ListPostsOptions, Logger, PostRecord, UserRecord } from './types.js'

export async function fetchPosts(
  client: RedditClient,
  subreddit: string,
  opts?: ListPostsOptions
): Promise<PostRecord[]> {
  const links = await client.listPosts(subreddit, opts)
  return links.map(toPostRecord)
}

/**
 * Walks a comment forest breadth-first, the order a fully expanded thread
 * lists its comments in. "Load more" placeholders are dropped, not expanded.
 */
export function flattenThread(things: readonly RedditThing[], maxComments?: number): RedditComment[] {
  const limit = maxComments && maxComments > 0 ? maxComments : Number.POSITIVE_INFINITY
  const queue = [...things]
  const comments: RedditComment[] = []

  for (let thing = queue.shift(); thing && comments.length < limit; thing = queue.shift()) {
    if (thing.kind !== 't1') continue
    const comment = decode(commentSchema, thing.data, 'comment')
    comments.push(comment)
    if (comment.replies) queue.push(...comment.replies.data.children)
  }
  return comments
}

export async function fetchCommentsFromPosts(
  client: RedditClient,
  postIds: readonly string[],
  opts?: { maxCommentsPerPost?: number; logger?: Logger }
): Promise<CommentRecord[]> {
  const logger = opts?.logger
  const records: CommentRecord[] = []

  for (const [index, postId] of postIds.entries()) {
    logger?.info?.('fetching comments', { post_id: postId, index: index + 1, total: postIds.length })
    const things = await client.getComments(postId)
    for (const comment of flattenThread(things, opts?.maxCommentsPerPost)) {
      records.push(toCommentRecord(comment, postId))
    }
  }
  return records
}

export async function fetchUserInfo(
  client: RedditClient,
  usernames: ReadonlyArray<string | null>,
  opts?: { logger?: Logger }
): Promise<UserRecord[]> {
  const logger = opts?.logger
  const unique = [...new Set(usernames)]
  const users: UserRecord[] = []

  for (const [index, username] of unique.entries()) {
    if (!username || username === DELETED_AUTHOR) continue
    logger?.info?.('fetching user', { index: index + 1, total: unique.length })
    try {
      users.push(toUserRecord(await client.getUser(username)))
    } catch (err) {
      logger?.warn?.('user fetch failed', {
        username,
        error: err instanceof Error ? err.message : String(err)
      })
    }
  }
  return users
}
