import { promises as fs } from 'fs'
import path from 'path'
import type { z } from 'zod'
import { MessageValidationError, TransportError } from '../core/errors.js'
import type {
  ActionResult,
  MediaType,
  MessagingType,
  OutboundMessage,
  SendFailure,
  SendOutcome,
  SendResult,
  SenderAction,
  UploadResult
} from '../core/types.js'
import {
  actionResponseSchema,
  graphErrorSchema,
  sendResponseSchema,
  uploadResponseSchema,
  type GraphError
} from '../dto/graph.js'
import { assertValidMessage, toSendApiMessage } from '../messages/message.js'
import { silentLogger, type Logger } from '../utils/Logger.js'
import { backoffDelay, sleep as defaultSleep, type Sleep } from '../utils/retry.js'
import type { HttpMethod, HttpTransport, TransportBody, TransportResponse } from './httpTransport.js'

// Graph error codes for temporary failures and rate limiting
export const RETRYABLE_GRAPH_CODES: ReadonlySet<number> = new Set([1, 2, 4, 17, 32, 613])

export interface SendClientOptions {
  pageAccessToken: string
  graphApiUrl: string
  maxAttempts: number
  backoffBaseMs: number
  backoffCapMs: number
  transport: HttpTransport
  logger?: Logger
  sleep?: Sleep
  random?: () => number
}

export interface CallOptions {
  signal?: AbortSignal
}

export interface SendOptions extends CallOptions {
  messagingType?: MessagingType
  tag?: string
}

export type UploadSource =
  | { type: MediaType; url: string }
  | { type: MediaType; filePath: string; contentType?: string }

type Attempt = { ok: true; response: TransportResponse } | { ok: false; failure: Omit<SendFailure, 'attempts'> }

interface Call<T> {
  operation: string
  method: HttpMethod
  path: string
  body: TransportBody
  parse: (body: unknown) => T | undefined
  signal?: AbortSignal
  recipientId?: string
}

function graphError(body: unknown): GraphError | undefined {
  const parsed = graphErrorSchema.safeParse(body)
  return parsed.success ? parsed.data.error : undefined
}

/**
 * Maps a non-2xx response to a failure. 5xx, 429 and the temporary Graph
 * codes are retryable; every other status is fatal.
 */
export function classifyResponse(status: number, body: unknown): Omit<SendFailure, 'attempts'> {
  const error = graphError(body)
  const code = error?.code
  const reason = error?.message ?? `HTTP ${status}`
  const retryable = status >= 500 || status === 429 || (code !== undefined && RETRYABLE_GRAPH_CODES.has(code))
  return {
    kind: retryable ? 'retryable' : 'fatal',
    reason,
    status,
    ...(code !== undefined ? { code } : {})
  }
}

function classifyThrown(error: unknown): Omit<SendFailure, 'attempts'> {
  if (error instanceof TransportError) {
    return { kind: 'retryable', reason: error.reason === 'aborted' ? 'aborted' : error.message }
  }
  const message = error instanceof Error ? error.message : String(error)
  return { kind: 'retryable', reason: `transport failure: ${message}` }
}

function parseWith<S extends z.ZodTypeAny>(schema: S): (body: unknown) => z.output<S> | undefined {
  return (body) => {
    const parsed = schema.safeParse(body)
    return parsed.success ? parsed.data : undefined
  }
}

/**
 * Outbound client for the Send API. Failures come back as values; nothing
 * here throws for a platform or network error.
 */
export class SendClient {
  private readonly logger: Logger
  private readonly sleep: Sleep
  private readonly random: () => number
  private readonly background: Set<Promise<void>> = new Set()

  constructor(private readonly options: SendClientOptions) {
    this.logger = options.logger ?? silentLogger
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
  }

  async send(recipientId: string, message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    try {
      assertValidMessage(message)
    } catch (error) {
      if (error instanceof MessageValidationError) {
        this.logger.error({ recipientId, reason: error.message }, 'Refusing to send invalid message')
        return { ok: false, failure: { kind: 'fatal', reason: error.message, attempts: 0 } }
      }
      throw error
    }

    const outcome = await this.execute({
      operation: 'send',
      method: 'POST',
      path: '/me/messages',
      recipientId,
      body: {
        recipient: { id: recipientId },
        messaging_type: options.messagingType ?? 'RESPONSE',
        message: toSendApiMessage(message),
        ...(options.tag ? { tag: options.tag } : {})
      },
      parse: parseWith(sendResponseSchema),
      ...(options.signal ? { signal: options.signal } : {})
    })
    if (!outcome.ok) return outcome
    return {
      ok: true,
      attempts: outcome.attempts,
      data: { messageId: outcome.data.message_id, recipientId: outcome.data.recipient_id }
    }
  }

  async sendAction(recipientId: string, action: SenderAction, options: CallOptions = {}): Promise<ActionResult> {
    const outcome = await this.execute({
      operation: `sender_action:${action}`,
      method: 'POST',
      path: '/me/messages',
      recipientId,
      body: { recipient: { id: recipientId }, sender_action: action },
      parse: parseWith(actionResponseSchema),
      ...(options.signal ? { signal: options.signal } : {})
    })
    if (!outcome.ok) return outcome
    return { ok: true, attempts: outcome.attempts, data: { recipientId: outcome.data.recipient_id } }
  }

  async uploadAttachment(source: UploadSource, options: CallOptions = {}): Promise<UploadResult> {
    let body: TransportBody
    if ('url' in source) {
      body = { message: { attachment: { type: source.type, payload: { url: source.url, is_reusable: true } } } }
    } else {
      let data: Buffer
      try {
        data = await fs.readFile(source.filePath)
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error)
        this.logger.error({ filePath: source.filePath, reason }, 'Cannot read attachment for upload')
        return { ok: false, failure: { kind: 'fatal', reason: `cannot read ${source.filePath}: ${reason}`, attempts: 0 } }
      }
      const form = new FormData()
      form.append('message', JSON.stringify({ attachment: { type: source.type, payload: { is_reusable: true } } }))
      form.append(
        'filedata',
        new Blob([new Uint8Array(data)], { type: source.contentType ?? 'application/octet-stream' }),
        path.basename(source.filePath)
      )
      body = form
    }

    const outcome = await this.execute({
      operation: 'upload_attachment',
      method: 'POST',
      path: '/me/message_attachments',
      body,
      parse: parseWith(uploadResponseSchema),
      ...(options.signal ? { signal: options.signal } : {})
    })
    if (!outcome.ok) return outcome
    return { ok: true, attempts: outcome.attempts, data: { attachmentId: outcome.data.attachment_id } }
  }

  /**
   * Authenticated call to any page-scoped endpoint, with the same retry
   * policy as `send`. Resolves with the decoded response body.
   */
  callApi(
    apiPath: string,
    body: Record<string, unknown>,
    options: CallOptions & { method?: HttpMethod } = {}
  ): Promise<SendOutcome<unknown>> {
    return this.execute({
      operation: `call:${apiPath}`,
      method: options.method ?? 'POST',
      path: apiPath.startsWith('/') ? apiPath : `/${apiPath}`,
      body,
      parse: (response) => response,
      ...(options.signal ? { signal: options.signal } : {})
    })
  }

  /**
   * Fires `mark_seen` then `typing_on` without waiting for either.
   * Failures are logged; `settle()` waits for the pair to finish.
   */
  acknowledge(recipientId: string, options: CallOptions = {}): void {
    const actions: SenderAction[] = ['mark_seen', 'typing_on']
    for (const action of actions) {
      this.track(
        this.sendAction(recipientId, action, options).then((result) => {
          if (!result.ok) {
            this.logger.warn({ recipientId, action, failure: result.failure }, 'Acknowledgement failed')
          }
        })
      )
    }
  }

  async settle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(Array.from(this.background))
    }
  }

  get pending(): number {
    return this.background.size
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Background send call failed')
      })
      .finally(() => {
        this.background.delete(tracked)
      })
    this.background.add(tracked)
  }

  private url(apiPath: string): string {
    return `${this.options.graphApiUrl}${apiPath}?access_token=${encodeURIComponent(this.options.pageAccessToken)}`
  }

  private async attempt(call: Call<unknown>): Promise<Attempt> {
    try {
      const response = await this.options.transport.request(call.method, this.url(call.path), call.body, {
        ...(call.signal ? { signal: call.signal } : {})
      })
      return { ok: true, response }
    } catch (error) {
      return { ok: false, failure: classifyThrown(error) }
    }
  }

  // The first request is issued before the first await, so calls made
  // back to back reach the transport in call order.
  private async execute<T>(call: Call<T>): Promise<SendOutcome<T>> {
    const { maxAttempts, backoffBaseMs, backoffCapMs } = this.options
    const context = { operation: call.operation, ...(call.recipientId ? { recipientId: call.recipientId } : {}) }
    let last: SendFailure = { kind: 'retryable', reason: 'no attempt made', attempts: 0 }

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.attempt(call)

      let failure: Omit<SendFailure, 'attempts'>
      if (result.ok && result.response.status >= 200 && result.response.status < 300) {
        const data = call.parse(result.response.body)
        if (data !== undefined) {
          this.logger.debug({ ...context, attempt }, 'Send API call succeeded')
          return { ok: true, data, attempts: attempt }
        }
        failure = { kind: 'fatal', reason: 'unexpected response body', status: result.response.status }
      } else if (result.ok) {
        failure = classifyResponse(result.response.status, result.response.body)
      } else {
        failure = result.failure
      }

      last = { ...failure, attempts: attempt }
      if (failure.kind === 'fatal') {
        this.logger.error({ ...context, failure: last }, 'Send API call failed')
        return { ok: false, failure: last }
      }
      if (attempt === maxAttempts) break

      const delayMs = backoffDelay(attempt, { baseMs: backoffBaseMs, capMs: backoffCapMs }, this.random)
      this.logger.warn({ ...context, attempt, maxAttempts, delayMs, failure: last }, 'Send API call failed, retrying')
      const waited = await this.sleep(delayMs, call.signal)
      if (!waited) {
        const aborted: SendFailure = { kind: 'retryable', reason: 'aborted', attempts: attempt }
        this.logger.warn({ ...context, failure: aborted }, 'Send API retry aborted')
        return { ok: false, failure: aborted }
      }
    }

    this.logger.error({ ...context, failure: last }, 'Send API call failed after all retry attempts')
    return { ok: false, failure: last }
  }
}
