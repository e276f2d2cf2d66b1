import { z } from 'zod'

// Raw shapes of the platform's webhook batch. Validated per event so that
// one bad event never rejects its siblings.

const platformId = z.union([z.string().min(1), z.number()]).transform((id) => String(id))

export const participantSchema = z.object({ id: platformId })

export const attachmentSchema = z.object({
  type: z.string(),
  title: z.string().optional(),
  payload: z
    .object({
      url: z.string().optional(),
      coordinates: z.object({ lat: z.number(), long: z.number() }).optional()
    })
    .passthrough()
    .nullable()
    .optional()
})

export const messageSchema = z.object({
  mid: z.string(),
  seq: z.number().optional(),
  text: z.string().optional(),
  is_echo: z.boolean().optional(),
  app_id: platformId.optional(),
  metadata: z.string().optional(),
  quick_reply: z.object({ payload: z.string() }).optional(),
  attachments: z.array(attachmentSchema).optional()
})

export const deliverySchema = z.object({
  mids: z.array(z.string()).optional(),
  watermark: z.number(),
  seq: z.number().optional()
})

export const readSchema = z.object({
  watermark: z.number(),
  seq: z.number().optional()
})

export const referralSchema = z.object({
  ref: z.string().optional(),
  source: z.string().optional(),
  type: z.string().optional()
})

export const postbackSchema = z.object({
  payload: z.string(),
  title: z.string().optional(),
  referral: referralSchema.optional()
})

export const optinSchema = z.object({
  ref: z.string().optional(),
  user_ref: z.string().optional()
})

export const accountLinkingSchema = z.object({
  status: z.enum(['linked', 'unlinked']),
  authorization_code: z.string().optional()
})

export const messagingEventSchema = z
  .object({
    sender: participantSchema,
    recipient: participantSchema.optional(),
    timestamp: z.number()
  })
  .passthrough()

export const entrySchema = z
  .object({
    id: platformId.optional(),
    time: z.number().optional(),
    messaging: z.array(z.unknown())
  })
  .passthrough()

export const webhookPayloadSchema = z
  .object({
    object: z.string().optional(),
    entry: z.array(z.unknown())
  })
  .passthrough()

export type RawAttachment = z.infer<typeof attachmentSchema>
export type RawMessagingEvent = z.infer<typeof messagingEventSchema>
