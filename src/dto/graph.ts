import { z } from 'zod'

// Graph API response bodies the send client relies on.

const graphId = z.union([z.string(), z.number()]).transform((id) => String(id))

export const graphErrorSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      type: z.string().optional(),
      code: z.number().optional(),
      error_subcode: z.number().optional(),
      fbtrace_id: z.string().optional()
    })
    .passthrough()
})

export const sendResponseSchema = z.object({
  recipient_id: graphId,
  message_id: z.string()
})

export const actionResponseSchema = z.object({
  recipient_id: graphId
})

export const uploadResponseSchema = z.object({
  attachment_id: graphId
})

export type GraphError = z.infer<typeof graphErrorSchema>['error']
