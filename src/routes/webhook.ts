import express, { type RequestHandler, type Router } from 'express'
import { z } from 'zod'
import type { IUpdateDispatcher } from '../core/interfaces.js'
import { createSignatureGuard } from '../middleware/signature.js'
import { parseWebhookPayload } from '../services/eventParser.js'
import { safeEqual, type SignatureAlgorithm } from '../utils/signature.js'
import { silentLogger, type Logger } from '../utils/Logger.js'

export const EVENT_RECEIVED = 'EVENT_RECEIVED'
export const VERIFICATION_FAILED = 'Verification token did not match server'

const verifyQuerySchema = z.object({
  'hub.mode': z.string(),
  'hub.verify_token': z.string(),
  'hub.challenge': z.string()
})

export interface WebhookRouteOptions {
  verifyToken: string
  appSecret: string
  signatureAlgorithm: SignatureAlgorithm
  dispatcher: IUpdateDispatcher
  bodyLimit?: string
  logger?: Logger
}

export function createVerificationHandler(verifyToken: string, logger: Logger = silentLogger): RequestHandler {
  return (req, res) => {
    const parse = verifyQuerySchema.safeParse(req.query)
    if (
      !parse.success ||
      parse.data['hub.mode'] !== 'subscribe' ||
      !safeEqual(parse.data['hub.verify_token'], verifyToken)
    ) {
      logger.warn({ mode: req.query['hub.mode'] }, 'Webhook verification rejected')
      res.status(403).type('text/plain').send(VERIFICATION_FAILED)
      return
    }
    logger.info('Webhook verification succeeded')
    res.status(200).type('text/plain').send(parse.data['hub.challenge'])
  }
}

/**
 * Decodes a signature-checked batch and hands it to the dispatcher. The
 * platform gets its 200 as soon as the batch is queued; handler outcomes
 * never change the response.
 */
export function createEventHandler(dispatcher: IUpdateDispatcher, logger: Logger = silentLogger): RequestHandler {
  return (req, res) => {
    if (!dispatcher.accepting) {
      res.status(503).json({ success: false, error: 'Gateway is shutting down' })
      return
    }

    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0)
    let payload: unknown
    try {
      payload = JSON.parse(rawBody.toString('utf8'))
    } catch (err) {
      logger.warn({ err, bytes: rawBody.length }, 'Webhook body is not valid JSON')
      res.status(400).json({ success: false, error: 'Request body must be JSON' })
      return
    }

    const batch = parseWebhookPayload(payload, logger)
    const summary = dispatcher.dispatch(batch)
    logger.info(
      { parsed: batch.parsed, skipped: batch.skipped, queued: summary.queued, rejected: summary.rejected },
      'Webhook batch received'
    )
    res.status(200).type('text/plain').send(EVENT_RECEIVED)
  }
}

export function createWebhookRouter(options: WebhookRouteOptions): Router {
  const logger = options.logger ?? silentLogger
  const router = express.Router()

  router.get('/', createVerificationHandler(options.verifyToken, logger))
  router.post(
    '/',
    express.raw({ type: '*/*', limit: options.bodyLimit ?? '1mb' }),
    createSignatureGuard({ appSecret: options.appSecret, algorithm: options.signatureAlgorithm, logger }),
    createEventHandler(options.dispatcher, logger)
  )

  return router
}
