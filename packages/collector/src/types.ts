import type { ParentType } from '@threadgraph/network'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type Logger = {
  debug?: (message: string, meta?: Record<string, unknown>) => void
  info?: (message: string, meta?: Record<string, unknown>) => void
  warn?: (message: string, meta?: Record<string, unknown>) => void
  error?: (message: string, meta?: Record<string, unknown>) => void
}

export type CollectorConfig = {
  userAgent: string
  baseUrl: string
  dataDir: string
  postLimit: number
  logLevel: LogLevel
  maxCommentsPerPost?: number
}

export const SORT_METHODS = ['hot', 'new', 'top', 'rising', 'controversial'] as const
export type SortMethod = (typeof SORT_METHODS)[number]

export const TIME_FILTERS = ['hour', 'day', 'week', 'month', 'year', 'all'] as const
export type TimeFilter = (typeof TIME_FILTERS)[number]

export type FetchFn = (
  input: string,
  init?: { headers?: Record<string, string> }
) => Promise<{
  ok: boolean
  status: number
  json(): Promise<unknown>
}>

export type DateRange = {
  from?: Date
  to?: Date
}

export type PostRecord = {
  post_id: string
  title: string
  author_id: string | null
  author_name: string
  subreddit: string
  score: number
  upvote_ratio: number
  num_comments: number
  created_utc: number
  created_datetime: string
  is_self: boolean
  selftext: string
  url: string
  permalink: string
  flair: string | null
  stickied: boolean
  locked: boolean
  spoiler: boolean
  nsfw: boolean
}

export type CommentRecord = {
  comment_id: string
  post_id: string
  author_id: string | null
  author_name: string
  body: string
  score: number
  created_utc: number
  created_datetime: string
  parent_id: string
  parent_type: ParentType
  is_submitter: boolean
  stickied: boolean
  depth: number
  controversiality: number
  gilded: number
}

export type UserRecord = {
  user_id: string
  username: string
  link_karma: number
  comment_karma: number
  total_karma: number
  created_utc: number
  created_datetime: string
  is_gold: boolean
  is_mod: boolean
  is_employee: boolean
  has_verified_email: boolean | null
}

export type ListPostsOptions = {
  sort?: SortMethod
  limit?: number
  timeFilter?: TimeFilter
}

export type CollectOptions = {
  subreddit: string
  sort: SortMethod
  limit: number
  timeFilter: TimeFilter
  maxCommentsPerPost?: number
  range?: DateRange
  refresh?: boolean
  includeUsers?: boolean
}

export type RunSummary = {
  subreddit: string
  sort: SortMethod
  time_filter: TimeFilter
  collected_at: string
  posts: number
  comments: number
  users: number
  edges: number
}
