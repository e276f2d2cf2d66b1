import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { SIGNATURE_HEADERS, verifySignature, type SignatureAlgorithm } from '../utils/signature.js'
import { silentLogger, type Logger } from '../utils/Logger.js'

export interface SignatureGuardOptions {
  appSecret: string
  algorithm: SignatureAlgorithm
  logger?: Logger
}

// Expects the body as a Buffer, i.e. mounted after express.raw()
export function createSignatureGuard(options: SignatureGuardOptions): RequestHandler {
  const logger = options.logger ?? silentLogger
  const headerName = SIGNATURE_HEADERS[options.algorithm]

  return (req: Request, res: Response, next: NextFunction) => {
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0)
    const header = req.header(headerName)
    if (!verifySignature(rawBody, header, options.appSecret, options.algorithm)) {
      logger.warn({ header: headerName, present: header !== undefined, bytes: rawBody.length }, 'Rejected webhook with invalid signature')
      res.status(403).json({ success: false, error: 'Invalid request signature' })
      return
    }
    next()
  }
}
