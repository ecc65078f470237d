import type { Comment, InteractionType, Post, RawInteraction } from './types.js'

type AuthorLookup = ReadonlyMap<string, string | null>

function authorLookup<T>(
  rows: readonly T[],
  key: (row: T) => string,
  author: (row: T) => string | null
): AuthorLookup {
  const lookup = new Map<string, string | null>()
  for (const row of rows) {
    lookup.set(key(row), author(row))
  }
  return lookup
}

function threadOf(comment: Comment): string | null {
  if (comment.post_id) return comment.post_id
  return comment.parent_type === 'post' ? comment.parent_id : null
}

/**
 * Derives one directed interaction per comment that replies to someone else.
 *
 * Comments with a deleted author, replies whose parent is missing from the
 * input or was written by a deleted account, and replies to one's own post or
 * comment produce nothing.
 */
export function extractInteractions(
  comments: readonly Comment[],
  posts: readonly Post[]
): RawInteraction[] {
  const postAuthors = authorLookup(posts, (post) => post.post_id, (post) => post.author_id)
  const commentAuthors = authorLookup(
    comments,
    (comment) => comment.comment_id,
    (comment) => comment.author_id
  )

  const interactions: RawInteraction[] = []
  for (const comment of comments) {
    const fromUser = comment.author_id
    if (!fromUser) continue

    let toUser: string | null | undefined
    let interactionType: InteractionType
    if (comment.parent_type === 'post') {
      toUser = postAuthors.get(comment.parent_id)
      interactionType = 'comment_on_post'
    } else {
      toUser = commentAuthors.get(comment.parent_id)
      interactionType = 'reply_to_comment'
    }

    if (!toUser || toUser === fromUser) continue

    interactions.push({
      from_user_id: fromUser,
      to_user_id: toUser,
      interaction_type: interactionType,
      timestamp: comment.created_utc,
      comment_id: comment.comment_id,
      post_id: threadOf(comment)
    })
  }
  return interactions
}
