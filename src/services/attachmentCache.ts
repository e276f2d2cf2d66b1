import path from 'path'
import { EventEmitter } from 'eventemitter3'
import { v4 as uuidv4 } from 'uuid'
import type { CacheEntry, EvictionPolicy, HostedAttachment } from '../core/types.js'
import { silentLogger, type Logger } from '../utils/Logger.js'

export interface AttachmentCacheOptions {
  ttlMs: number
  policy: EvictionPolicy
  sweepIntervalMs?: number
  routePrefix?: string
  publicBaseUrl?: string
  logger?: Logger
  now?: () => number
  generateToken?: () => string
}

export interface ClaimedAttachment {
  token: string
  localPath: string
  contentType?: string
}

export type EvictionReason = 'expired' | 'served' | 'removed'

type CacheEvents = {
  'entry:hosted': [entry: CacheEntry]
  'entry:served': [entry: CacheEntry]
  'entry:evicted': [entry: CacheEntry, reason: EvictionReason]
}

/**
 * Maps local files to short-lived public paths.
 *
 * Under `serve-once` an entry can be claimed by a single request; a failed
 * serve releases it again, a successful one evicts it. Under `ttl` an entry
 * may be fetched any number of times until it expires.
 */
export class AttachmentCache extends EventEmitter<CacheEvents> {
  private entries: Map<string, CacheEntry> = new Map()
  private sweeper: NodeJS.Timeout | null = null
  private readonly logger: Logger
  private readonly now: () => number
  private readonly generateToken: () => string
  private readonly routePrefix: string

  constructor(private readonly options: AttachmentCacheOptions) {
    super()
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
    this.generateToken = options.generateToken ?? uuidv4
    this.routePrefix = (options.routePrefix ?? '/attachments').replace(/\/+$/, '')
  }

  public get policy(): EvictionPolicy {
    return this.options.policy
  }

  public get size(): number {
    return this.entries.size
  }

  public host(localPath: string, options: { contentType?: string } = {}): HostedAttachment {
    let token = this.generateToken()
    while (this.entries.has(token)) {
      this.logger.warn({ token }, 'Attachment token collision, regenerating')
      token = this.generateToken()
    }

    const createdAt = this.now()
    const entry: CacheEntry = {
      token,
      localPath: path.resolve(localPath),
      ...(options.contentType ? { contentType: options.contentType } : {}),
      createdAt,
      expiresAt: createdAt + this.options.ttlMs,
      state: 'unconsumed',
      serveCount: 0
    }
    this.entries.set(token, entry)

    const routePath = `${this.routePrefix}/${token}`
    this.logger.debug({ token, localPath: entry.localPath }, 'Attachment hosted')
    this.emit('entry:hosted', entry)

    return {
      token,
      path: routePath,
      ...(this.options.publicBaseUrl ? { url: `${this.options.publicBaseUrl}${routePath}` } : {})
    }
  }

  /**
   * Looks a token up without consuming it.
   */
  public resolve(token: string): { localPath: string; contentType?: string } | undefined {
    const entry = this.liveEntry(token)
    if (!entry) return undefined
    if (this.options.policy === 'serve-once' && entry.state === 'served') return undefined
    return {
      localPath: entry.localPath,
      ...(entry.contentType ? { contentType: entry.contentType } : {})
    }
  }

  public claim(token: string): ClaimedAttachment | undefined {
    const entry = this.liveEntry(token)
    if (!entry) return undefined

    if (this.options.policy === 'serve-once') {
      if (entry.state === 'served') return undefined
      entry.state = 'served'
    }

    return {
      token,
      localPath: entry.localPath,
      ...(entry.contentType ? { contentType: entry.contentType } : {})
    }
  }

  public complete(token: string): void {
    const entry = this.entries.get(token)
    if (!entry) return
    entry.state = 'served'
    entry.serveCount += 1
    this.emit('entry:served', entry)
    if (this.options.policy === 'serve-once') {
      this.evict(entry, 'served')
    }
  }

  public release(token: string): void {
    const entry = this.entries.get(token)
    if (!entry || this.options.policy !== 'serve-once') return
    entry.state = 'unconsumed'
  }

  public remove(token: string): boolean {
    const entry = this.entries.get(token)
    if (!entry) return false
    this.evict(entry, 'removed')
    return true
  }

  public sweep(now: number = this.now()): number {
    let evicted = 0
    for (const entry of Array.from(this.entries.values())) {
      if (entry.expiresAt <= now) {
        this.evict(entry, 'expired')
        evicted += 1
      }
    }
    if (evicted > 0) {
      this.logger.debug({ evicted, remaining: this.entries.size }, 'Attachment sweep completed')
    }
    return evicted
  }

  public start(): void {
    if (this.sweeper) return
    const interval = this.options.sweepIntervalMs ?? 60000
    this.sweeper = setInterval(() => this.sweep(), interval)
    this.sweeper.unref()
  }

  public stop(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper)
      this.sweeper = null
    }
  }

  public clear(): void {
    for (const entry of Array.from(this.entries.values())) {
      this.evict(entry, 'removed')
    }
  }

  public stats(): { entries: number; unconsumed: number; policy: EvictionPolicy } {
    let unconsumed = 0
    for (const entry of this.entries.values()) {
      if (entry.state === 'unconsumed') unconsumed += 1
    }
    return { entries: this.entries.size, unconsumed, policy: this.options.policy }
  }

  private liveEntry(token: string): CacheEntry | undefined {
    const entry = this.entries.get(token)
    if (!entry) return undefined
    if (entry.expiresAt <= this.now()) {
      this.evict(entry, 'expired')
      return undefined
    }
    return entry
  }

  private evict(entry: CacheEntry, reason: EvictionReason): void {
    if (this.entries.get(entry.token) !== entry) return
    this.entries.delete(entry.token)
    this.logger.debug({ token: entry.token, reason }, 'Attachment evicted')
    this.emit('entry:evicted', entry, reason)
  }
}
