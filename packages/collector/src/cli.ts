#!/usr/bin/env node
import { FileStore } from '@threadgraph/store'
import { loadConfig, loadLocalConfig } from './config.js'
import { createLogger } from './logger.js'
import { getDateRange, parseDay } from './dates.js'
import { makeCollectorError, CollectorErrorCode } from './errors.js'
import { createRedditClient, parseSortMethod, parseTimeFilter } from './reddit.js'
import {
  buildNetworkFromFiles,
  collectComments,
  collectNetwork,
  collectPosts,
  collectUsers,
  runCollection
} from './pipeline.js'
import type { PipelineDeps } from './pipeline.js'
import type { CollectOptions, CollectorConfig, DateRange } from './types.js'

type Args = Record<string, string | boolean>

const USAGE = 'Usage: threadgraph <collect|posts|comments|users|network> [--flags]'

function parseArgs(argv: string[]): Args {
  const out: Args = {}
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    if (!arg) continue
    if (!arg.startsWith('--')) continue
    const [key, value] = arg.slice(2).split('=')
    if (!key) continue
    if (value !== undefined) {
      out[key] = value
    } else {
      const next = argv[i + 1]
      if (next && !next.startsWith('--')) {
        out[key] = next
        i += 1
      } else {
        out[key] = true
      }
    }
  }
  return out
}

function stringArg(args: Args, key: string): string | undefined {
  const value = args[key]
  return typeof value === 'string' ? value : undefined
}

function numberArg(args: Args, key: string): number | undefined {
  const value = stringArg(args, key)
  if (value === undefined) return undefined
  const parsed = Number(value)
  if (!Number.isFinite(parsed)) {
    throw makeCollectorError(CollectorErrorCode.INVALID_ARGUMENT, `--${key} must be a number`)
  }
  return parsed
}

function parseRange(args: Args): DateRange | undefined {
  const from = stringArg(args, 'from')
  const to = stringArg(args, 'to')
  if (from && to) {
    const [start, end] = getDateRange(from, to)
    return { from: start, to: end }
  }
  if (from) return { from: parseDay(from) }
  if (to) return { to: parseDay(to) }
  return undefined
}

function setup(args: Args): { deps: PipelineDeps; opts: CollectOptions } {
  const overrides: Partial<CollectorConfig> = {}
  const dataDir = stringArg(args, 'data-dir')
  if (dataDir) overrides.dataDir = dataDir
  const limit = numberArg(args, 'limit')
  if (limit !== undefined) overrides.postLimit = limit
  const maxComments = numberArg(args, 'max-comments')
  if (maxComments !== undefined) overrides.maxCommentsPerPost = maxComments

  const config = loadConfig(overrides)
  const logger = createLogger({ json: args['log-json'] === true, level: config.logLevel })
  const store = new FileStore({ baseDir: config.dataDir, logger })
  const client = createRedditClient({ userAgent: config.userAgent, baseUrl: config.baseUrl })

  const subreddit = stringArg(args, 'subreddit')
  if (!subreddit) {
    throw makeCollectorError(CollectorErrorCode.INVALID_ARGUMENT, '--subreddit is required')
  }

  const opts: CollectOptions = {
    subreddit,
    sort: parseSortMethod(stringArg(args, 'sort') ?? 'hot'),
    limit: config.postLimit,
    timeFilter: parseTimeFilter(stringArg(args, 'time-filter') ?? 'all'),
    refresh: args.refresh === true,
    includeUsers: args['skip-users'] !== true
  }
  if (config.maxCommentsPerPost !== undefined) opts.maxCommentsPerPost = config.maxCommentsPerPost
  const range = parseRange(args)
  if (range) opts.range = range

  return { deps: { client, store, logger }, opts }
}

async function runNetwork(args: Args): Promise<void> {
  const postsFile = stringArg(args, 'posts')
  const commentsFile = stringArg(args, 'comments')
  if (!postsFile && !commentsFile) {
    const { deps, opts } = setup(args)
    const cachedOpts = { ...opts, refresh: false }
    const posts = await collectPosts(deps, cachedOpts)
    const comments = await collectComments(deps, cachedOpts, posts)
    await collectNetwork(deps, opts, posts, comments)
    return
  }
  if (!postsFile || !commentsFile) {
    throw makeCollectorError(
      CollectorErrorCode.INVALID_ARGUMENT,
      'network needs both --posts and --comments'
    )
  }

  const dataDir = stringArg(args, 'data-dir')
  const config = loadLocalConfig(dataDir ? { dataDir } : {})
  const logger = createLogger({ json: args['log-json'] === true, level: config.logLevel })
  const store = new FileStore({ baseDir: config.dataDir, logger })
  await buildNetworkFromFiles(
    store,
    { posts: postsFile, comments: commentsFile, out: stringArg(args, 'out') ?? 'edges.csv' },
    logger
  )
}

async function main(): Promise<void> {
  const [command, ...rest] = process.argv.slice(2)
  const args = parseArgs(rest)

  switch (command) {
    case 'collect': {
      const { deps, opts } = setup(args)
      await runCollection(deps, opts)
      return
    }
    case 'posts': {
      const { deps, opts } = setup(args)
      await collectPosts(deps, opts)
      return
    }
    case 'comments': {
      const { deps, opts } = setup(args)
      const posts = await collectPosts(deps, { ...opts, refresh: false })
      await collectComments(deps, opts, posts)
      return
    }
    case 'users': {
      const { deps, opts } = setup(args)
      const posts = await collectPosts(deps, { ...opts, refresh: false })
      const comments = await collectComments(deps, { ...opts, refresh: false }, posts)
      await collectUsers(deps, opts, posts, comments)
      return
    }
    case 'network':
      await runNetwork(args)
      return
    default:
      throw new Error(USAGE)
  }
}

main().catch((err) => {
  console.error(err)
  process.exit(1)
})
