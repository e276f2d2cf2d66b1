import { z } from 'zod'
import { ConfigError } from '../core/errors.js'

function validateUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return ['http:', 'https:'].includes(parsed.protocol)
  } catch {
    return false
  }
}

const httpUrl = z.string().refine(validateUrl, { message: 'must be an http(s) URL' })

const envSchema = z.object({
  VERIFY_TOKEN: z.string().min(1),
  PAGE_ACCESS_TOKEN: z.string().min(1),
  APP_SECRET: z.string().min(1),
  SIGNATURE_ALGORITHM: z.enum(['sha1', 'sha256']).default('sha256'),
  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  GRAPH_API_URL: httpUrl.default('https://graph.facebook.com/v19.0'),
  SEND_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SEND_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(250),
  SEND_BACKOFF_CAP_MS: z.coerce.number().int().min(0).default(8000),
  SEND_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),
  ATTACHMENT_TTL_SEC: z.coerce.number().int().min(1).default(300),
  ATTACHMENT_POLICY: z.enum(['serve-once', 'ttl']).default('serve-once'),
  ATTACHMENT_SWEEP_SEC: z.coerce.number().int().min(1).default(60),
  PUBLIC_BASE_URL: httpUrl.optional(),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(10000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
})

export interface GatewayConfig {
  verifyToken: string
  pageAccessToken: string
  appSecret: string
  signatureAlgorithm: 'sha1' | 'sha256'
  host: string
  port: number
  graphApiUrl: string
  send: {
    maxAttempts: number
    backoffBaseMs: number
    backoffCapMs: number
    timeoutMs: number
  }
  attachments: {
    ttlMs: number
    policy: 'serve-once' | 'ttl'
    sweepIntervalMs: number
    publicBaseUrl?: string
  }
  shutdownGraceMs: number
  logLevel: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  // Treat empty strings from .env files as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  )
  const parse = envSchema.safeParse(cleaned)
  if (!parse.success) {
    throw new ConfigError(parse.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }
  const data = parse.data
  if (data.SEND_BACKOFF_CAP_MS < data.SEND_BACKOFF_BASE_MS) {
    throw new ConfigError(['SEND_BACKOFF_CAP_MS: must not be smaller than SEND_BACKOFF_BASE_MS'])
  }

  return {
    verifyToken: data.VERIFY_TOKEN,
    pageAccessToken: data.PAGE_ACCESS_TOKEN,
    appSecret: data.APP_SECRET,
    signatureAlgorithm: data.SIGNATURE_ALGORITHM,
    host: data.HOST,
    port: data.PORT,
    graphApiUrl: data.GRAPH_API_URL.replace(/\/+$/, ''),
    send: {
      maxAttempts: data.SEND_MAX_ATTEMPTS,
      backoffBaseMs: data.SEND_BACKOFF_BASE_MS,
      backoffCapMs: data.SEND_BACKOFF_CAP_MS,
      timeoutMs: data.SEND_TIMEOUT_MS
    },
    attachments: {
      ttlMs: data.ATTACHMENT_TTL_SEC * 1000,
      policy: data.ATTACHMENT_POLICY,
      sweepIntervalMs: data.ATTACHMENT_SWEEP_SEC * 1000,
      ...(data.PUBLIC_BASE_URL ? { publicBaseUrl: data.PUBLIC_BASE_URL.replace(/\/+$/, '') } : {})
    },
    shutdownGraceMs: data.SHUTDOWN_GRACE_MS,
    logLevel: data.LOG_LEVEL
  }
}
