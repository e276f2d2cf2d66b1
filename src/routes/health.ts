import type { RequestHandler } from 'express'
import type { IUpdateDispatcher } from '../core/interfaces.js'
import type { AttachmentCache } from '../services/attachmentCache.js'

export interface HealthSources {
  dispatcher: IUpdateDispatcher
  attachments: AttachmentCache
}

export function createHealthHandler(sources: HealthSources): RequestHandler {
  return (_req, res) => {
    res.json({
      status: sources.dispatcher.accepting ? 'ok' : 'draining',
      timestamp: new Date().toISOString(),
      conversations: sources.dispatcher.activeConversations,
      attachments: sources.attachments.stats()
    })
  }
}
