import { makeCollectorError, CollectorErrorCode } from './errors.js'
import type { CollectorConfig, LogLevel } from './types.js'

const DEFAULT_BASE_URL = 'https://www.reddit.com'
const DEFAULT_DATA_DIR = 'data'
const DEFAULT_POST_LIMIT = 100
const DEFAULT_LOG_LEVEL: LogLevel = 'info'
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

function toInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isFinite(parsed) ? parsed : fallback
}

function toLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase()
  return LOG_LEVELS.find((candidate) => candidate === level) ?? DEFAULT_LOG_LEVEL
}

export type LocalConfig = Pick<CollectorConfig, 'dataDir' | 'logLevel'>

/** Settings for commands that only work on files already in the data directory. */
export function loadLocalConfig(overrides?: Partial<LocalConfig>): LocalConfig {
  const env = process.env
  return {
    dataDir: overrides?.dataDir ?? env.THREADGRAPH_DATA_DIR ?? DEFAULT_DATA_DIR,
    logLevel: overrides?.logLevel ?? toLogLevel(env.THREADGRAPH_LOG_LEVEL)
  }
}

export function loadConfig(overrides?: Partial<CollectorConfig>): CollectorConfig {
  const env = process.env
  const userAgent = overrides?.userAgent ?? env.REDDIT_USER_AGENT ?? ''

  if (!userAgent) {
    throw makeCollectorError(
      CollectorErrorCode.INVALID_ARGUMENT,
      'REDDIT_USER_AGENT is required for @threadgraph/collector'
    )
  }

  const base = {
    userAgent,
    baseUrl: overrides?.baseUrl ?? env.REDDIT_BASE_URL ?? DEFAULT_BASE_URL,
    postLimit: overrides?.postLimit ?? toInt(env.THREADGRAPH_POST_LIMIT, DEFAULT_POST_LIMIT),
    ...loadLocalConfig(overrides)
  }

  const maxCommentsPerPost =
    overrides?.maxCommentsPerPost ?? toInt(env.THREADGRAPH_MAX_COMMENTS_PER_POST, 0)
  if (maxCommentsPerPost > 0) {
    return { ...base, maxCommentsPerPost }
  }

  return base
}
