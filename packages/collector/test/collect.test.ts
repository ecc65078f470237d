import assert from 'node:assert'
import { test } from 'node:test'
import { fetchCommentsFromPosts, fetchPosts, fetchUserInfo, flattenThread } from '../src/collect.js'
import { createRedditClient } from '../src/reddit.js'
import {
  comment,
  createFetchStub,
  createMemoryLogger,
  link,
  listing,
  more,
  thread,
  user
} from './fixtures.js'

function clientFor(routes: Record<string, unknown>) {
  const stub = createFetchStub(routes)
  const client = createRedditClient({ userAgent: 'ua', baseUrl: 'https://api.test', fetch: stub.fetch })
  return { client, calls: stub.calls }
}

const nestedThread = thread(link('p1', 'alice', 't2_ua'), [
  comment('c1', 'bob', 't2_ub', 't3_p1', 100, [
    comment('c3', 'carol', 't2_uc', 't1_c1', 300, [comment('c5', 'bob', 't2_ub', 't1_c3', 500)])
  ]),
  comment('c2', 'carol', 't2_uc', 't3_p1', 200, [comment('c4', '[deleted]', undefined, 't1_c2', 400)]),
  more('m1', 't3_p1')
])

test('fetchPosts maps listing posts to post records', async () => {
  const { client } = clientFor({
    '/r/testsub/hot.json': listing([link('p1', 'alice', 't2_ua'), link('p2', '[deleted]')])
  })

  const posts = await fetchPosts(client, 'testsub')

  assert.deepStrictEqual(posts[0], {
    post_id: 'p1',
    title: 'Post p1',
    author_id: 'ua',
    author_name: 'alice',
    subreddit: 'testsub',
    score: 10,
    upvote_ratio: 0.9,
    num_comments: 2,
    created_utc: 1700000000,
    created_datetime: '2023-11-14T22:13:20.000Z',
    is_self: true,
    selftext: 'body',
    url: 'https://www.reddit.com/r/testsub/comments/p1/',
    permalink: 'https://reddit.com/r/testsub/comments/p1/',
    flair: null,
    stickied: false,
    locked: false,
    spoiler: false,
    nsfw: false
  })
  assert.strictEqual(posts[1]?.author_id, null)
  assert.strictEqual(posts[1]?.author_name, '[deleted]')
})

test('comment threads are flattened breadth-first without load-more placeholders', async () => {
  const { client } = clientFor({ '/comments/p1.json': nestedThread })

  const comments = await fetchCommentsFromPosts(client, ['p1'])

  assert.deepStrictEqual(
    comments.map((record) => [
      record.comment_id,
      record.author_id,
      record.parent_id,
      record.parent_type
    ]),
    [
      ['c1', 'ub', 'p1', 'post'],
      ['c2', 'uc', 'p1', 'post'],
      ['c3', 'uc', 'c1', 'comment'],
      ['c4', null, 'c2', 'comment'],
      ['c5', 'ub', 'c3', 'comment']
    ]
  )
  assert.ok(comments.every((record) => record.post_id === 'p1'))
  assert.strictEqual(comments[3]?.author_name, '[deleted]')
  assert.strictEqual(comments[0]?.created_datetime, '1970-01-01T00:01:40.000Z')
})

test('maxCommentsPerPost stops each thread after that many comments', async () => {
  const { client, calls } = clientFor({
    '/comments/p1.json': nestedThread,
    '/comments/p2.json': thread(link('p2', 'bob', 't2_ub'), [
      comment('d1', 'alice', 't2_ua', 't3_p2', 600),
      comment('d2', 'carol', 't2_uc', 't3_p2', 700)
    ])
  })
  const { logger, entries } = createMemoryLogger()

  const comments = await fetchCommentsFromPosts(client, ['p1', 'p2'], {
    maxCommentsPerPost: 3,
    logger
  })

  assert.deepStrictEqual(
    comments.map((record) => record.comment_id),
    ['c1', 'c2', 'c3', 'd1', 'd2']
  )
  assert.strictEqual(calls.length, 2)
  assert.deepStrictEqual(
    entries.map((entry) => entry.meta),
    [
      { post_id: 'p1', index: 1, total: 2 },
      { post_id: 'p2', index: 2, total: 2 }
    ]
  )
})

test('flattenThread treats a zero limit as unlimited', () => {
  const things = [
    comment('c1', 'bob', 't2_ub', 't3_p1', 100, [comment('c2', 'alice', 't2_ua', 't1_c1', 200)])
  ]

  assert.deepStrictEqual(
    flattenThread(things, 0).map((entry) => entry.id),
    ['c1', 'c2']
  )
})

test('fetchUserInfo deduplicates names and skips users that cannot be fetched', async () => {
  const { client, calls } = clientFor({
    '/user/alice/about.json': user('ua', 'alice', true),
    '/user/bob/about.json': user('ub', 'bob')
  })
  const { logger, entries } = createMemoryLogger()

  const users = await fetchUserInfo(
    client,
    ['alice', 'bob', null, '[deleted]', 'alice', 'ghost'],
    { logger }
  )

  assert.deepStrictEqual(users, [
    {
      user_id: 'ua',
      username: 'alice',
      link_karma: 10,
      comment_karma: 5,
      total_karma: 15,
      created_utc: 1600000000,
      created_datetime: '2020-09-13T12:26:40.000Z',
      is_gold: false,
      is_mod: false,
      is_employee: false,
      has_verified_email: true
    },
    {
      user_id: 'ub',
      username: 'bob',
      link_karma: 10,
      comment_karma: 5,
      total_karma: 15,
      created_utc: 1600000000,
      created_datetime: '2020-09-13T12:26:40.000Z',
      is_gold: false,
      is_mod: false,
      is_employee: false,
      has_verified_email: null
    }
  ])
  assert.strictEqual(calls.length, 3)
  const warnings = entries.filter((entry) => entry.level === 'warn')
  assert.deepStrictEqual(warnings, [
    {
      level: 'warn',
      message: 'user fetch failed',
      meta: { username: 'ghost', error: 'GET /user/ghost/about.json failed with status 404' }
    }
  ])
})
