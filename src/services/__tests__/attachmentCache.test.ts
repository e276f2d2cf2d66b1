import { describe, it, expect, beforeEach } from '@jest/globals'
import path from 'path'
import { AttachmentCache, type AttachmentCacheOptions, type EvictionReason } from '../attachmentCache.js'

describe('AttachmentCache', () => {
  let clock: number

  const createCache = (overrides: Partial<AttachmentCacheOptions> = {}) =>
    new AttachmentCache({
      ttlMs: 1000,
      policy: 'serve-once',
      publicBaseUrl: 'https://bot.example.test',
      now: () => clock,
      ...overrides
    })

  beforeEach(() => {
    clock = 10_000
  })

  it('issues a distinct token each time the same file is hosted', () => {
    const cache = createCache()
    const first = cache.host('/tmp/photo.png')
    const second = cache.host('/tmp/photo.png')

    expect(first.token).not.toBe(second.token)
    expect(first.token).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
    expect(first.path).toBe(`/attachments/${first.token}`)
    expect(first.url).toBe(`https://bot.example.test/attachments/${first.token}`)
    expect(cache.size).toBe(2)
  })

  it('omits the url without a public base url and resolves paths', () => {
    const cache = createCache({ publicBaseUrl: undefined })
    const hosted = cache.host('relative/file.txt', { contentType: 'text/plain' })

    expect(hosted.url).toBeUndefined()
    expect(cache.resolve(hosted.token)).toEqual({
      localPath: path.resolve('relative/file.txt'),
      contentType: 'text/plain'
    })
  })

  it('regenerates a token that is already in use', () => {
    const tokens = ['same', 'same', 'other']
    const cache = createCache({ generateToken: () => tokens.shift() ?? 'exhausted' })

    expect(cache.host('/tmp/a').token).toBe('same')
    expect(cache.host('/tmp/b').token).toBe('other')
  })

  it('lets only one request claim a serve-once entry', () => {
    const cache = createCache()
    const { token } = cache.host('/tmp/a.png')

    expect(cache.claim(token)).toEqual({ token, localPath: path.resolve('/tmp/a.png') })
    expect(cache.claim(token)).toBeUndefined()
    expect(cache.resolve(token)).toBeUndefined()
  })

  it('evicts a serve-once entry after a completed serve', () => {
    const cache = createCache()
    const evicted: EvictionReason[] = []
    cache.on('entry:evicted', (_entry, reason) => evicted.push(reason))
    const { token } = cache.host('/tmp/a.png')

    cache.claim(token)
    cache.complete(token)

    expect(cache.size).toBe(0)
    expect(evicted).toEqual(['served'])
    expect(cache.claim(token)).toBeUndefined()
  })

  it('releases a failed serve so the entry can be fetched again', () => {
    const cache = createCache()
    const { token } = cache.host('/tmp/a.png')

    cache.claim(token)
    cache.release(token)

    expect(cache.stats()).toEqual({ entries: 1, unconsumed: 1, policy: 'serve-once' })
    expect(cache.claim(token)).toBeDefined()
  })

  it('serves ttl entries repeatedly until they expire', () => {
    const cache = createCache({ policy: 'ttl' })
    const served: number[] = []
    cache.on('entry:served', (entry) => served.push(entry.serveCount))
    const { token } = cache.host('/tmp/a.png')

    for (let i = 0; i < 3; i++) {
      expect(cache.claim(token)).toBeDefined()
      cache.complete(token)
    }
    expect(served).toEqual([1, 2, 3])
    expect(cache.size).toBe(1)

    clock += 1000
    expect(cache.claim(token)).toBeUndefined()
    expect(cache.size).toBe(0)
  })

  it('sweeps only expired entries', () => {
    const cache = createCache()
    const old = cache.host('/tmp/old')
    clock += 600
    const fresh = cache.host('/tmp/fresh')

    expect(cache.sweep(clock + 500)).toBe(1)
    expect(cache.resolve(old.token)).toBeUndefined()
    expect(cache.resolve(fresh.token)).toBeDefined()
  })

  it('starts and stops the background sweeper', () => {
    const cache = createCache({ sweepIntervalMs: 5 })
    cache.start()
    cache.start()
    cache.stop()
    cache.stop()
    expect(cache.size).toBe(0)
  })

  it('removes entries on request', () => {
    const cache = createCache()
    const { token } = cache.host('/tmp/a')

    expect(cache.remove(token)).toBe(true)
    expect(cache.remove(token)).toBe(false)
  })
})
