import type { z } from 'zod'
import { makeCollectorError, CollectorErrorCode } from './errors.js'
import { linkSchema, listingSchema, threadSchema, userAboutSchema } from './schema.js'
import type { RedditLink, RedditThing, RedditUser } from './schema.js'
import { SORT_METHODS, TIME_FILTERS } from './types.js'
import type { FetchFn, ListPostsOptions, SortMethod, TimeFilter } from './types.js'

export type RedditClient = {
  listPosts: (subreddit: string, opts?: ListPostsOptions) => Promise<RedditLink[]>
  getComments: (postId: string) => Promise<RedditThing[]>
  getUser: (username: string) => Promise<RedditUser>
}

const DEFAULT_BASE_URL = 'https://www.reddit.com'
const MAX_LISTING_LIMIT = 100
const TIME_FILTERED_SORTS: readonly SortMethod[] = ['top', 'controversial']

function cleanBaseUrl(url: string): string {
  return url.replace(/\/$/, '')
}

export function parseSortMethod(value: string): SortMethod {
  const sort = SORT_METHODS.find((candidate) => candidate === value)
  if (!sort) {
    throw makeCollectorError(CollectorErrorCode.INVALID_ARGUMENT, `Invalid sort_method: ${value}`)
  }
  return sort
}

export function parseTimeFilter(value: string): TimeFilter {
  const filter = TIME_FILTERS.find((candidate) => candidate === value)
  if (!filter) {
    throw makeCollectorError(CollectorErrorCode.INVALID_ARGUMENT, `Invalid time_filter: ${value}`)
  }
  return filter
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) {
    throw makeCollectorError(CollectorErrorCode.INVALID_ARGUMENT, `Invalid limit: ${limit}`)
  }
  return Math.min(MAX_LISTING_LIMIT, Math.max(1, Math.trunc(limit)))
}

export function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string
): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw makeCollectorError(CollectorErrorCode.RESPONSE_INVALID, `Unexpected ${what} payload`, {
      details: parsed.error.issues
    })
  }
  return parsed.data
}

export function createRedditClient(opts: {
  userAgent: string
  baseUrl?: string
  fetch?: FetchFn
}): RedditClient {
  const baseUrl = cleanBaseUrl(opts.baseUrl ?? DEFAULT_BASE_URL)
  const fetchFn: FetchFn = opts.fetch ?? globalThis.fetch
  const headers = { 'user-agent': opts.userAgent, accept: 'application/json' }

  async function getJson(pathname: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(`${baseUrl}${pathname}`)
    for (const [key, value] of Object.entries({ ...params, raw_json: '1' })) {
      url.searchParams.set(key, value)
    }
    const res = await fetchFn(url.toString(), { headers })
    if (!res.ok) {
      throw makeCollectorError(
        CollectorErrorCode.REQUEST_FAILED,
        `GET ${pathname} failed with status ${res.status}`,
        { status: res.status }
      )
    }
    try {
      return await res.json()
    } catch (err) {
      throw makeCollectorError(
        CollectorErrorCode.RESPONSE_INVALID,
        `GET ${pathname} returned invalid JSON`,
        { status: res.status, details: err instanceof Error ? err.message : String(err) }
      )
    }
  }

  return {
    async listPosts(subreddit, listOpts) {
      const sort = listOpts?.sort ?? 'hot'
      const params: Record<string, string> = {
        limit: String(clampLimit(listOpts?.limit ?? MAX_LISTING_LIMIT))
      }
      if (TIME_FILTERED_SORTS.includes(sort)) {
        params.t = listOpts?.timeFilter ?? 'all'
      }

      const name = encodeURIComponent(subreddit.toLowerCase())
      const body = await getJson(`/r/${name}/${sort}.json`, params)
      const listing = decode(listingSchema, body, 'listing')
      return listing.data.children
        .filter((child) => child.kind === 't3')
        .map((child) => decode(linkSchema, child.data, 'post'))
    },

    async getComments(postId) {
      const body = await getJson(`/comments/${encodeURIComponent(postId)}.json`)
      const [, comments] = decode(threadSchema, body, 'thread')
      return comments.data.children
    },

    async getUser(username) {
      const body = await getJson(`/user/${encodeURIComponent(username)}/about.json`)
      return decode(userAboutSchema, body, 'user').data
    }
  }
}
