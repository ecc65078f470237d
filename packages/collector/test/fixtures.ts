import type { FetchFn, Logger } from '../src/types.js'

export type Thing = { kind: string; data: Record<string, unknown> }

export function listing(children: Thing[]): { kind: 'Listing'; data: Record<string, unknown> } {
  return { kind: 'Listing', data: { after: null, children } }
}

export function link(id: string, author: string, fullname?: string): Thing {
  return {
    kind: 't3',
    data: {
      id,
      name: `t3_${id}`,
      title: `Post ${id}`,
      author,
      ...(fullname ? { author_fullname: fullname } : {}),
      subreddit: 'testsub',
      score: 10,
      upvote_ratio: 0.9,
      num_comments: 2,
      created_utc: 1700000000,
      is_self: true,
      selftext: 'body',
      url: `https://www.reddit.com/r/testsub/comments/${id}/`,
      permalink: `/r/testsub/comments/${id}/`,
      link_flair_text: null,
      stickied: false,
      locked: false,
      spoiler: false,
      over_18: false
    }
  }
}

export function comment(
  id: string,
  author: string,
  fullname: string | undefined,
  parent: string,
  createdUtc: number,
  replies: Thing[] = []
): Thing {
  return {
    kind: 't1',
    data: {
      id,
      name: `t1_${id}`,
      author,
      ...(fullname ? { author_fullname: fullname } : {}),
      body: `comment ${id}`,
      score: 1,
      created_utc: createdUtc,
      parent_id: parent,
      is_submitter: false,
      stickied: false,
      depth: parent.startsWith('t3_') ? 0 : 1,
      controversiality: 0,
      gilded: 0,
      replies: replies.length > 0 ? listing(replies) : ''
    }
  }
}

export function more(id: string, parent: string): Thing {
  return { kind: 'more', data: { id, name: `t1_${id}`, parent_id: parent, count: 3, children: ['x'] } }
}

export function thread(post: Thing, comments: Thing[]): unknown {
  return [listing([post]), listing(comments)]
}

export function user(id: string, name: string, verified?: boolean): unknown {
  return {
    kind: 't2',
    data: {
      id,
      name,
      link_karma: 10,
      comment_karma: 5,
      total_karma: 15,
      created_utc: 1600000000,
      is_gold: false,
      is_mod: false,
      is_employee: false,
      ...(verified !== undefined ? { has_verified_email: verified } : {})
    }
  }
}

export type FetchCall = { url: string; headers: Record<string, string> }

/** Serves canned bodies by URL pathname; unknown paths answer 404. */
export function createFetchStub(routes: Record<string, unknown>): {
  fetch: FetchFn
  calls: FetchCall[]
} {
  const calls: FetchCall[] = []
  const fetch: FetchFn = async (input, init) => {
    calls.push({ url: input, headers: init?.headers ?? {} })
    const pathname = new URL(input).pathname
    if (!(pathname in routes)) {
      return { ok: false, status: 404, json: async () => ({ error: 404 }) }
    }
    const body = routes[pathname]
    return { ok: true, status: 200, json: async () => body }
  }
  return { fetch, calls }
}

export type LogEntry = { level: string; message: string; meta?: Record<string, unknown> }

export function createMemoryLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const record = (level: string) => (message: string, meta?: Record<string, unknown>) => {
    entries.push(meta ? { level, message, meta } : { level, message })
  }
  return {
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error')
    },
    entries
  }
}
