import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import http from 'http'
import { TransportError } from '../../core/errors.js'
import { FetchTransport } from '../httpTransport.js'

type Respond = (req: http.IncomingMessage, res: http.ServerResponse) => void

interface ReceivedRequest {
  method: string | undefined
  url: string | undefined
  contentType: string | undefined
  body: string
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(0, '127.0.0.1', () => {
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new Error('server is not listening on a port'))
        return
      }
      resolve(address.port)
    })
  })
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()))
    server.closeAllConnections()
  })
}

describe('FetchTransport', () => {
  let server: http.Server
  let baseUrl: string
  let received: ReceivedRequest[]
  let respond: Respond

  beforeEach(async () => {
    received = []
    respond = (_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({ recipient_id: 'U1', message_id: 'mid.1' }))
    }
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = []
      req.on('data', (chunk: Buffer) => chunks.push(chunk))
      req.on('end', () => {
        received.push({
          method: req.method,
          url: req.url,
          contentType: req.headers['content-type'],
          body: Buffer.concat(chunks).toString('utf8')
        })
        respond(req, res)
      })
    })
    baseUrl = `http://127.0.0.1:${await listen(server)}`
  })

  afterEach(async () => {
    await close(server)
  })

  it('posts JSON and decodes a JSON response', async () => {
    const transport = new FetchTransport(1000)

    const response = await transport.request('POST', `${baseUrl}/me/messages?access_token=test-token`, {
      recipient: { id: 'U1' }
    })

    expect(response).toEqual({ status: 200, body: { recipient_id: 'U1', message_id: 'mid.1' } })
    expect(received).toEqual([
      {
        method: 'POST',
        url: '/me/messages?access_token=test-token',
        contentType: 'application/json',
        body: '{"recipient":{"id":"U1"}}'
      }
    ])
  })

  it('returns error statuses as responses', async () => {
    respond = (_req, res) => {
      res.writeHead(400, { 'Content-Type': 'application/json' })
      res.end(JSON.stringify({ error: { message: 'Invalid parameter', code: 100 } }))
    }

    const response = await new FetchTransport(1000).request('DELETE', `${baseUrl}/me/messenger_profile`, {
      fields: ['greeting']
    })

    expect(response).toEqual({ status: 400, body: { error: { message: 'Invalid parameter', code: 100 } } })
    expect(received[0]?.method).toBe('DELETE')
    expect(received[0]?.body).toBe('{"fields":["greeting"]}')
  })

  it('falls back to the raw text for a body that is not JSON', async () => {
    respond = (_req, res) => {
      res.writeHead(502, { 'Content-Type': 'text/html' })
      res.end('<html>Bad Gateway</html>')
    }

    const response = await new FetchTransport(1000).request('POST', baseUrl, {})

    expect(response).toEqual({ status: 502, body: '<html>Bad Gateway</html>' })
  })

  it('decodes an empty body as null', async () => {
    respond = (_req, res) => {
      res.writeHead(200)
      res.end()
    }

    const response = await new FetchTransport(1000).request('POST', baseUrl, {})

    expect(response).toEqual({ status: 200, body: null })
  })

  it('lets fetch set the multipart boundary for form uploads', async () => {
    const form = new FormData()
    form.append('message', JSON.stringify({ attachment: { type: 'file' } }))
    form.append('filedata', new Blob(['file body'], { type: 'text/plain' }), 'note.txt')

    await new FetchTransport(1000).request('POST', `${baseUrl}/me/message_attachments`, form)

    expect(received[0]?.contentType).toMatch(/^multipart\/form-data; boundary=/)
    expect(received[0]?.body).toContain('file body')
  })

  it('throws a timeout error when the server does not answer in time', async () => {
    respond = () => undefined

    const error = await new FetchTransport(50).request('POST', baseUrl, {}).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'timeout', message: 'Request timed out after 50ms' })
  })

  it('throws an aborted error for a signal that is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()

    const error = await new FetchTransport(1000)
      .request('POST', baseUrl, {}, { signal: controller.signal })
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'aborted' })
    expect(received).toEqual([])
  })

  it('throws an aborted error when the caller aborts mid-request', async () => {
    respond = () => undefined
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 20)

    const error = await new FetchTransport(5000)
      .request('POST', baseUrl, {}, { signal: controller.signal })
      .catch((err: unknown) => err)

    expect(error).toMatchObject({ reason: 'aborted', message: 'Request aborted' })
  })

  it('throws a network error when nothing listens on the port', async () => {
    const unused = http.createServer()
    const port = await listen(unused)
    await close(unused)

    const error = await new FetchTransport(1000)
      .request('POST', `http://127.0.0.1:${port}/`, {})
      .catch((err: unknown) => err)

    expect(error).toBeInstanceOf(TransportError)
    expect(error).toMatchObject({ reason: 'network' })
  })
})
