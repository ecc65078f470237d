import { z } from 'zod'
import { NetworkErrorCode, makeNetworkError } from './errors.js'
import type { Comment, ParentType, Post } from './types.js'

const POST_PREFIX = 't3_'
const COMMENT_PREFIX = 't1_'

function blankToNull(value: unknown): unknown {
  return value === '' || value === undefined ? null : value
}

function blankToUndefined(value: unknown): unknown {
  return value === '' || value === null ? undefined : value
}

const nullableId = z.preprocess(blankToNull, z.string().min(1).nullable())

export const postRowSchema = z.object({
  post_id: z.string().min(1),
  author_id: nullableId
})

export const commentRowSchema = z.object({
  comment_id: z.string().min(1),
  author_id: nullableId,
  parent_id: z.string().min(1),
  parent_type: z.enum(['post', 'comment']),
  created_utc: z.preprocess(blankToUndefined, z.coerce.number().finite()),
  post_id: nullableId
})

function parseRows<T>(label: string, rows: readonly unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row)
    if (result.success) return result.data
    const issue = result.error.issues[0]
    const field = issue && issue.path.length > 0 ? `.${issue.path.join('.')}` : ''
    throw makeNetworkError(
      NetworkErrorCode.INPUT_INVALID,
      `Invalid ${label} row ${index}: ${issue?.message ?? 'schema mismatch'}`,
      `${label}[${index}]${field}`,
      result.error.issues
    )
  })
}

/** Validates untyped post rows (CSV rows included) into `Post` values. */
export function parsePosts(rows: readonly unknown[]): Post[] {
  return parseRows('posts', rows, postRowSchema)
}

/** Validates untyped comment rows; `created_utc` is coerced to a number. */
export function parseComments(rows: readonly unknown[]): Comment[] {
  return parseRows('comments', rows, commentRowSchema)
}

export function parseParentRef(raw: string): { parent_id: string; parent_type: ParentType } {
  const parentType: ParentType = raw.startsWith(POST_PREFIX) ? 'post' : 'comment'
  return {
    parent_id: raw.replace(POST_PREFIX, '').replace(COMMENT_PREFIX, ''),
    parent_type: parentType
  }
}
