import type { z } from 'zod'
import {
  accountLinkingSchema,
  deliverySchema,
  entrySchema,
  messageSchema,
  messagingEventSchema,
  optinSchema,
  postbackSchema,
  readSchema,
  referralSchema,
  webhookPayloadSchema,
  type RawAttachment,
  type RawMessagingEvent
} from '../dto/webhook.js'
import { UpdateKind, type InboundAttachment, type Update } from '../core/types.js'
import { silentLogger, type Logger } from '../utils/Logger.js'

type Raw = Readonly<Record<string, unknown>>

type BuildResult = { update: Update } | { reason: string }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

function attachmentType(type: string): Exclude<InboundAttachment, { type: 'location' }>['type'] {
  switch (type) {
    case 'image':
    case 'audio':
    case 'video':
    case 'file':
    case 'template':
      return type
    default:
      return 'fallback'
  }
}

function toAttachment(raw: RawAttachment): InboundAttachment {
  const title = raw.title !== undefined ? { title: raw.title } : {}
  const coordinates = raw.payload?.coordinates
  if (raw.type === 'location' && coordinates) {
    return Object.freeze({ type: 'location', latitude: coordinates.lat, longitude: coordinates.long, ...title })
  }
  const url = raw.payload?.url
  return Object.freeze({
    type: attachmentType(raw.type),
    ...(url !== undefined ? { url } : {}),
    ...title
  })
}

/**
 * Builds one Update from a messaging event. Keys are checked in a fixed
 * precedence because the platform may attach incidental fields.
 */
function buildUpdate(event: RawMessagingEvent, raw: Raw): BuildResult {
  const base = {
    senderId: event.sender.id,
    ...(event.recipient ? { recipientId: event.recipient.id } : {}),
    timestamp: event.timestamp,
    raw
  }

  if ('message' in raw) {
    const parse = messageSchema.safeParse(raw.message)
    if (!parse.success) return { reason: `message ${describeIssues(parse.error)}` }
    const message = parse.data
    const attachments = Object.freeze((message.attachments ?? []).map(toAttachment))

    if (message.is_echo === true) {
      return {
        update: {
          ...base,
          kind: UpdateKind.MESSAGE_ECHOED,
          messageId: message.mid,
          attachments,
          ...(message.text !== undefined ? { text: message.text } : {}),
          ...(message.app_id !== undefined ? { appId: message.app_id } : {}),
          ...(message.metadata !== undefined ? { metadata: message.metadata } : {})
        }
      }
    }

    return {
      update: {
        ...base,
        kind: UpdateKind.MESSAGE_RECEIVED,
        messageId: message.mid,
        attachments,
        ...(message.text !== undefined ? { text: message.text } : {}),
        ...(message.quick_reply ? { quickReply: { payload: message.quick_reply.payload } } : {}),
        ...(message.seq !== undefined ? { sequence: message.seq } : {})
      }
    }
  }

  if ('delivery' in raw) {
    const parse = deliverySchema.safeParse(raw.delivery)
    if (!parse.success) return { reason: `delivery ${describeIssues(parse.error)}` }
    return {
      update: {
        ...base,
        kind: UpdateKind.DELIVERY_CONFIRMED,
        watermark: parse.data.watermark,
        messageIds: Object.freeze(parse.data.mids ?? []),
        ...(parse.data.seq !== undefined ? { sequence: parse.data.seq } : {})
      }
    }
  }

  if ('read' in raw) {
    const parse = readSchema.safeParse(raw.read)
    if (!parse.success) return { reason: `read ${describeIssues(parse.error)}` }
    return {
      update: {
        ...base,
        kind: UpdateKind.READ_CONFIRMED,
        watermark: parse.data.watermark,
        ...(parse.data.seq !== undefined ? { sequence: parse.data.seq } : {})
      }
    }
  }

  if ('postback' in raw) {
    const parse = postbackSchema.safeParse(raw.postback)
    if (!parse.success) return { reason: `postback ${describeIssues(parse.error)}` }
    const referral = parse.data.referral
    return {
      update: {
        ...base,
        kind: UpdateKind.POSTBACK_RECEIVED,
        payload: parse.data.payload,
        ...(parse.data.title !== undefined ? { title: parse.data.title } : {}),
        ...(referral
          ? {
              referral: {
                ...(referral.ref !== undefined ? { ref: referral.ref } : {}),
                ...(referral.source !== undefined ? { source: referral.source } : {}),
                ...(referral.type !== undefined ? { referralType: referral.type } : {})
              }
            }
          : {})
      }
    }
  }

  if ('referral' in raw) {
    const parse = referralSchema.safeParse(raw.referral)
    if (!parse.success) return { reason: `referral ${describeIssues(parse.error)}` }
    return {
      update: {
        ...base,
        kind: UpdateKind.REFERRAL_RECEIVED,
        ...(parse.data.ref !== undefined ? { ref: parse.data.ref } : {}),
        ...(parse.data.source !== undefined ? { source: parse.data.source } : {}),
        ...(parse.data.type !== undefined ? { referralType: parse.data.type } : {})
      }
    }
  }

  if ('optin' in raw) {
    const parse = optinSchema.safeParse(raw.optin)
    if (!parse.success) return { reason: `optin ${describeIssues(parse.error)}` }
    return {
      update: {
        ...base,
        kind: UpdateKind.OPTIN_RECEIVED,
        ...(parse.data.ref !== undefined ? { ref: parse.data.ref } : {}),
        ...(parse.data.user_ref !== undefined ? { userRef: parse.data.user_ref } : {})
      }
    }
  }

  if ('account_linking' in raw) {
    const parse = accountLinkingSchema.safeParse(raw.account_linking)
    if (!parse.success) return { reason: `account_linking ${describeIssues(parse.error)}` }
    return {
      update: {
        ...base,
        kind: UpdateKind.ACCOUNT_LINKED,
        status: parse.data.status,
        ...(parse.data.status === 'linked' && parse.data.authorization_code !== undefined
          ? { authorizationCode: parse.data.authorization_code }
          : {})
      }
    }
  }

  return { reason: `unknown event shape (keys: ${Object.keys(raw).join(', ')})` }
}

/**
 * Lazy, single-use sequence of Updates from one webhook delivery.
 * `parsed` and `skipped` reflect what has been consumed so far.
 */
export class UpdateBatch implements Iterable<Update> {
  private parsedCount = 0
  private skippedCount = 0
  private readonly iterator: Generator<Update, void, undefined>

  constructor(payload: unknown, private readonly logger: Logger = silentLogger) {
    this.iterator = this.walk(payload)
  }

  public get parsed(): number {
    return this.parsedCount
  }

  public get skipped(): number {
    return this.skippedCount
  }

  public [Symbol.iterator](): Iterator<Update> {
    return this.iterator
  }

  public toArray(): Update[] {
    return Array.from(this)
  }

  private skip(reason: string, location: { entryIndex?: number; eventIndex?: number }): void {
    this.skippedCount += 1
    this.logger.warn({ evt: 'webhook_event_skipped', reason, ...location }, 'Skipped malformed webhook event')
  }

  private *walk(payload: unknown): Generator<Update, void, undefined> {
    const batch = webhookPayloadSchema.safeParse(payload)
    if (!batch.success) {
      this.skip(`payload ${describeIssues(batch.error)}`, {})
      return
    }

    for (const [entryIndex, rawEntry] of batch.data.entry.entries()) {
      const entry = entrySchema.safeParse(rawEntry)
      if (!entry.success) {
        this.skip(`entry ${describeIssues(entry.error)}`, { entryIndex })
        continue
      }

      for (const [eventIndex, rawEvent] of entry.data.messaging.entries()) {
        if (!isRecord(rawEvent)) {
          this.skip('event is not an object', { entryIndex, eventIndex })
          continue
        }
        const envelope = messagingEventSchema.safeParse(rawEvent)
        if (!envelope.success) {
          this.skip(describeIssues(envelope.error), { entryIndex, eventIndex })
          continue
        }

        const result = buildUpdate(envelope.data, Object.freeze({ ...rawEvent }))
        if ('reason' in result) {
          this.skip(result.reason, { entryIndex, eventIndex })
          continue
        }

        this.parsedCount += 1
        yield Object.freeze(result.update)
      }
    }
  }
}

export function parseWebhookPayload(payload: unknown, logger?: Logger): UpdateBatch {
  return new UpdateBatch(payload, logger)
}
