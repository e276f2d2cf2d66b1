import { createHmac, timingSafeEqual } from 'crypto'

export type SignatureAlgorithm = 'sha1' | 'sha256'

export const SIGNATURE_HEADERS: Record<SignatureAlgorithm, string> = {
  sha1: 'x-hub-signature',
  sha256: 'x-hub-signature-256'
}

const HEX = /^[0-9a-f]+$/i

export function computeSignature(rawBody: Buffer, secret: string, algorithm: SignatureAlgorithm = 'sha256'): string {
  return `${algorithm}=${createHmac(algorithm, secret).update(rawBody).digest('hex')}`
}

/**
 * Checks a `<algo>=<hex digest>` header against an HMAC of the unparsed body.
 * Returns false for anything it cannot verify; never throws.
 */
export function verifySignature(
  rawBody: Buffer,
  header: string | undefined,
  secret: string,
  algorithm: SignatureAlgorithm = 'sha256'
): boolean {
  if (!header || !secret) return false

  const separator = header.indexOf('=')
  if (separator === -1) return false

  const prefix = header.slice(0, separator).toLowerCase()
  const claimed = header.slice(separator + 1).trim()
  if (prefix !== algorithm || !HEX.test(claimed) || claimed.length % 2 !== 0) return false

  const expected = createHmac(algorithm, secret).update(rawBody).digest()
  const received = Buffer.from(claimed, 'hex')
  if (received.length !== expected.length) return false

  return timingSafeEqual(received, expected)
}

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a)
  const right = Buffer.from(b)
  if (left.length !== right.length) return false
  return timingSafeEqual(left, right)
}
