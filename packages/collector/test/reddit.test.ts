import assert from 'node:assert'
import { test } from 'node:test'
import { CollectorErrorCode, isCollectorError } from '../src/errors.js'
import { createRedditClient, parseSortMethod, parseTimeFilter } from '../src/reddit.js'
import { createFetchStub, link, listing, thread, comment, more, user } from './fixtures.js'

function hasCode(code: string, status?: number) {
  return (err: unknown): boolean =>
    isCollectorError(err) && err.code === code && (status === undefined || err.status === status)
}

test('listPosts sends the listing query with user agent and keeps only posts', async () => {
  const { fetch, calls } = createFetchStub({
    '/r/testsub/top.json': listing([link('p1', 'alice', 't2_ua'), more('m1', 't3_p0')])
  })
  const client = createRedditClient({
    userAgent: 'threadgraph-test/1.0',
    baseUrl: 'https://api.test/',
    fetch
  })

  const posts = await client.listPosts('testsub', { sort: 'top', limit: 25, timeFilter: 'week' })

  assert.strictEqual(calls.length, 1)
  assert.strictEqual(calls[0]?.url, 'https://api.test/r/testsub/top.json?limit=25&t=week&raw_json=1')
  assert.strictEqual(calls[0]?.headers['user-agent'], 'threadgraph-test/1.0')
  assert.deepStrictEqual(
    posts.map((post) => [post.id, post.author, post.author_fullname]),
    [['p1', 'alice', 't2_ua']]
  )
})

test('listPosts clamps the limit and only sends a time filter where it applies', async () => {
  const { fetch, calls } = createFetchStub({
    '/r/testsub/hot.json': listing([]),
    '/r/testsub/new.json': listing([])
  })
  const client = createRedditClient({ userAgent: 'ua', baseUrl: 'https://api.test', fetch })

  assert.deepStrictEqual(await client.listPosts('testsub', { limit: 500, timeFilter: 'day' }), [])
  await client.listPosts('testsub', { sort: 'new', limit: 0 })

  assert.deepStrictEqual(
    calls.map((call) => call.url),
    [
      'https://api.test/r/testsub/hot.json?limit=100&raw_json=1',
      'https://api.test/r/testsub/new.json?limit=1&raw_json=1'
    ]
  )
})

test('getComments returns the top-level things of the thread', async () => {
  const { fetch, calls } = createFetchStub({
    '/comments/p1.json': thread(link('p1', 'alice', 't2_ua'), [
      comment('c1', 'bob', 't2_ub', 't3_p1', 100),
      more('m1', 't3_p1')
    ])
  })
  const client = createRedditClient({ userAgent: 'ua', baseUrl: 'https://api.test', fetch })

  const things = await client.getComments('p1')

  assert.strictEqual(calls[0]?.url, 'https://api.test/comments/p1.json?raw_json=1')
  assert.deepStrictEqual(
    things.map((thing) => thing.kind),
    ['t1', 'more']
  )
})

test('getUser unwraps the account payload and defaults missing flags', async () => {
  const { fetch } = createFetchStub({ '/user/bob/about.json': user('ub', 'bob') })
  const client = createRedditClient({ userAgent: 'ua', baseUrl: 'https://api.test', fetch })

  const bob = await client.getUser('bob')

  assert.strictEqual(bob.id, 'ub')
  assert.strictEqual(bob.name, 'bob')
  assert.strictEqual(bob.has_verified_email, null)
})

test('failed requests and unexpected payloads raise collector errors', async () => {
  const { fetch } = createFetchStub({
    '/r/broken/hot.json': { kind: 'Listing', data: { children: 'nope' } },
    '/comments/p1.json': [listing([])]
  })
  const client = createRedditClient({ userAgent: 'ua', baseUrl: 'https://api.test', fetch })

  await assert.rejects(
    () => client.listPosts('missing'),
    hasCode(CollectorErrorCode.REQUEST_FAILED, 404)
  )
  await assert.rejects(() => client.listPosts('broken'), hasCode(CollectorErrorCode.RESPONSE_INVALID))
  await assert.rejects(() => client.getComments('p1'), hasCode(CollectorErrorCode.RESPONSE_INVALID))
  await assert.rejects(() => client.getUser('nobody'), hasCode(CollectorErrorCode.REQUEST_FAILED, 404))
})

test('sort and time filter arguments are validated', () => {
  assert.strictEqual(parseSortMethod('controversial'), 'controversial')
  assert.strictEqual(parseTimeFilter('month'), 'month')
  assert.throws(() => parseSortMethod('best'), hasCode(CollectorErrorCode.INVALID_ARGUMENT))
  assert.throws(() => parseTimeFilter('decade'), hasCode(CollectorErrorCode.INVALID_ARGUMENT))
})
