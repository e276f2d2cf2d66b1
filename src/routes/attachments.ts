import type { RequestHandler, Response } from 'express'
import type { AttachmentCache } from '../services/attachmentCache.js'
import { silentLogger, type Logger } from '../utils/Logger.js'

// Paths come from the application, never from the request
const SEND_OPTIONS = { dotfiles: 'allow' } as const

function notFound(res: Response): void {
  res.status(404).json({ success: false, error: 'Attachment not found' })
}

export function createAttachmentHandler(cache: AttachmentCache, logger: Logger = silentLogger): RequestHandler {
  return (req, res) => {
    const token = req.params.token

    // HEAD only probes the entry; it must not count as a serve
    if (req.method === 'HEAD') {
      const entry = token ? cache.resolve(token) : undefined
      if (!entry) {
        notFound(res)
        return
      }
      if (entry.contentType) {
        res.type(entry.contentType)
      }
      res.sendFile(entry.localPath, SEND_OPTIONS, (err) => {
        if (!err) return
        logger.warn({ err, token }, 'Failed to describe hosted attachment')
        if (!res.headersSent) {
          notFound(res)
        }
      })
      return
    }

    const claimed = token ? cache.claim(token) : undefined
    if (!claimed) {
      notFound(res)
      return
    }

    // The path is captured at claim time; a later eviction cannot affect this transfer
    if (claimed.contentType) {
      res.type(claimed.contentType)
    }
    res.sendFile(claimed.localPath, SEND_OPTIONS, (err) => {
      if (err) {
        cache.release(claimed.token)
        logger.warn({ err, token: claimed.token }, 'Failed to serve hosted attachment')
        if (!res.headersSent) {
          notFound(res)
        }
        return
      }
      cache.complete(claimed.token)
      logger.debug({ token: claimed.token }, 'Hosted attachment served')
    })
  }
}
