import { EDGE_COLUMNS, buildInteractionNetwork, parseComments, parsePosts } from '@threadgraph/network'
import type { Edge } from '@threadgraph/network'
import type { FileStore } from '@threadgraph/store'
import type { z } from 'zod'
import { fetchCommentsFromPosts, fetchPosts, fetchUserInfo } from './collect.js'
import { isWithinRange } from './dates.js'
import { makeCollectorError, CollectorErrorCode } from './errors.js'
import type { RedditClient } from './reddit.js'
import { commentRecordSchema, postRecordSchema, userRecordSchema } from './schema.js'
import type {
  CollectOptions,
  CommentRecord,
  Logger,
  PostRecord,
  RunSummary,
  UserRecord
} from './types.js'

export type PipelineDeps = {
  client: RedditClient
  store: FileStore
  logger?: Logger
}

export type Dataset = 'posts' | 'comments' | 'users' | 'edges' | 'summary'

export function datasetFilename(subreddit: string, sort: string, dataset: Dataset): string {
  const extension = dataset === 'summary' ? 'json' : 'csv'
  return `${subreddit.toLowerCase()}_${sort}_${dataset}.${extension}`
}

async function loadCached<T>(
  deps: PipelineDeps,
  filename: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  refresh?: boolean
): Promise<T[] | null> {
  if (refresh || !(await deps.store.exists(filename))) return null

  const rows = await deps.store.readCsv(filename)
  deps.logger?.info?.('dataset cache hit', { file: filename, rows: rows.length })
  return rows.map((row, index) => {
    const parsed = schema.safeParse(row)
    if (!parsed.success) {
      throw makeCollectorError(
        CollectorErrorCode.CACHE_INVALID,
        `Cached ${filename} row ${index} does not match its record type`,
        { details: parsed.error.issues }
      )
    }
    return parsed.data
  })
}

function keepInRange(posts: PostRecord[], opts: CollectOptions, logger?: Logger): PostRecord[] {
  const range = opts.range
  if (!range) return posts
  const kept = posts.filter((post) => isWithinRange(post.created_utc, range))
  if (kept.length < posts.length) {
    logger?.info?.('posts outside date range dropped', { dropped: posts.length - kept.length })
  }
  return kept
}

export async function collectPosts(deps: PipelineDeps, opts: CollectOptions): Promise<PostRecord[]> {
  const filename = datasetFilename(opts.subreddit, opts.sort, 'posts')
  const cached = await loadCached(deps, filename, postRecordSchema, opts.refresh)
  if (cached) return keepInRange(cached, opts, deps.logger)

  const fetched = await fetchPosts(deps.client, opts.subreddit, {
    sort: opts.sort,
    limit: opts.limit,
    timeFilter: opts.timeFilter
  })
  const posts = keepInRange(fetched, opts, deps.logger)

  await deps.store.saveCsv(posts, filename)
  return posts
}

export async function collectComments(
  deps: PipelineDeps,
  opts: CollectOptions,
  posts: readonly PostRecord[]
): Promise<CommentRecord[]> {
  const filename = datasetFilename(opts.subreddit, opts.sort, 'comments')
  const cached = await loadCached(deps, filename, commentRecordSchema, opts.refresh)
  if (cached) return cached

  const fetchOpts: { maxCommentsPerPost?: number; logger?: Logger } = {}
  if (opts.maxCommentsPerPost !== undefined) fetchOpts.maxCommentsPerPost = opts.maxCommentsPerPost
  if (deps.logger) fetchOpts.logger = deps.logger
  const comments = await fetchCommentsFromPosts(
    deps.client,
    posts.map((post) => post.post_id),
    fetchOpts
  )

  await deps.store.saveCsv(comments, filename)
  return comments
}

export async function collectUsers(
  deps: PipelineDeps,
  opts: CollectOptions,
  posts: readonly PostRecord[],
  comments: readonly CommentRecord[]
): Promise<UserRecord[]> {
  const filename = datasetFilename(opts.subreddit, opts.sort, 'users')
  const cached = await loadCached(deps, filename, userRecordSchema, opts.refresh)
  if (cached) return cached

  const usernames = [
    ...posts.map((post) => post.author_name),
    ...comments.map((comment) => comment.author_name)
  ]
  const users = await fetchUserInfo(deps.client, usernames, deps.logger ? { logger: deps.logger } : {})

  await deps.store.saveCsv(users, filename)
  return users
}

// Edges are derived data: always rebuilt, never read back from the cache.
export async function collectNetwork(
  deps: PipelineDeps,
  opts: CollectOptions,
  posts: readonly PostRecord[],
  comments: readonly CommentRecord[]
): Promise<Edge[]> {
  const edges = buildInteractionNetwork(comments, posts)
  deps.logger?.info?.('interaction network built', {
    posts: posts.length,
    comments: comments.length,
    edges: edges.length
  })
  await deps.store.saveCsv(edges, datasetFilename(opts.subreddit, opts.sort, 'edges'), {
    columns: EDGE_COLUMNS,
    keepEmpty: true
  })
  return edges
}

export async function runCollection(deps: PipelineDeps, opts: CollectOptions): Promise<RunSummary> {
  const posts = await collectPosts(deps, opts)
  const comments = await collectComments(deps, opts, posts)
  const users = opts.includeUsers === false ? [] : await collectUsers(deps, opts, posts, comments)
  const edges = await collectNetwork(deps, opts, posts, comments)

  const summary: RunSummary = {
    subreddit: opts.subreddit,
    sort: opts.sort,
    time_filter: opts.timeFilter,
    collected_at: new Date().toISOString(),
    posts: posts.length,
    comments: comments.length,
    users: users.length,
    edges: edges.length
  }
  await deps.store.saveJson(summary, datasetFilename(opts.subreddit, opts.sort, 'summary'))
  deps.logger?.info?.('collection finished', summary)
  return summary
}

/**
 * Builds edges from arbitrary post and comment CSV files in the store.
 * Rows only need the columns the network reads; others are ignored.
 */
export async function buildNetworkFromFiles(
  store: FileStore,
  files: { posts: string; comments: string; out: string },
  logger?: Logger
): Promise<Edge[]> {
  const posts = parsePosts(await store.readCsv(files.posts))
  const comments = parseComments(await store.readCsv(files.comments))
  const edges = buildInteractionNetwork(comments, posts)
  logger?.info?.('interaction network built', {
    posts: posts.length,
    comments: comments.length,
    edges: edges.length
  })
  await store.saveCsv(edges, files.out, { columns: EDGE_COLUMNS, keepEmpty: true })
  return edges
}
