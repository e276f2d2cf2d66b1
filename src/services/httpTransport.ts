import { TransportError } from '../core/errors.js'

export type HttpMethod = 'POST' | 'DELETE'

export type TransportBody = Record<string, unknown> | FormData

export interface TransportResponse {
  status: number
  body: unknown
}

export interface TransportRequestOptions {
  signal?: AbortSignal
}

/**
 * Transport used by the send client. A resolved promise
 * means an HTTP response arrived, whatever its status; anything else is
 * a TransportError.
 */
export interface HttpTransport {
  request(
    method: HttpMethod,
    url: string,
    body: TransportBody,
    options?: TransportRequestOptions
  ): Promise<TransportResponse>
}

function decodeBody(text: string): unknown {
  if (text.length === 0) return null
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

export class FetchTransport implements HttpTransport {
  constructor(private readonly timeoutMs: number) {}

  async request(
    method: HttpMethod,
    url: string,
    body: TransportBody,
    options: TransportRequestOptions = {}
  ): Promise<TransportResponse> {
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.timeoutMs)
    const onAbort = (): void => controller.abort()
    options.signal?.addEventListener('abort', onAbort, { once: true })
    if (options.signal?.aborted) controller.abort()

    try {
      const isForm = body instanceof FormData
      const response = await fetch(url, {
        method,
        // fetch sets the multipart boundary itself
        headers: isForm ? {} : { 'Content-Type': 'application/json' },
        body: isForm ? body : JSON.stringify(body),
        signal: controller.signal
      })
      const text = await response.text()
      return { status: response.status, body: decodeBody(text) }
    } catch (error) {
      if (timedOut) {
        throw new TransportError(`Request timed out after ${this.timeoutMs}ms`, 'timeout', { cause: error })
      }
      if (controller.signal.aborted) {
        throw new TransportError('Request aborted', 'aborted', { cause: error })
      }
      const message = error instanceof Error ? error.message : String(error)
      throw new TransportError(`Network error: ${message}`, 'network', { cause: error })
    } finally {
      clearTimeout(timer)
      options.signal?.removeEventListener('abort', onAbort)
    }
  }
}
