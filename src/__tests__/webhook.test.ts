import { describe, it, expect, beforeEach, afterEach } from '@jest/globals'
import fs from 'fs'
import os from 'os'
import path from 'path'
import request from 'supertest'
import { RegistrationError } from '../core/errors.js'
import { UpdateKind } from '../core/types.js'
import type { MessengerGateway } from '../MessengerGateway.js'
import { computeSignature } from '../utils/signature.js'
import { deferred, type FakeTransport } from './helpers/fakeTransport.js'
import { createTestGateway } from './helpers/testGateway.js'

function batch(...messaging: unknown[]) {
  return { object: 'page', entry: [{ id: 'PAGE', time: 1700000000000, messaging }] }
}

function textEvent(senderId: string, text: string) {
  return {
    sender: { id: senderId },
    recipient: { id: 'PAGE' },
    timestamp: 1700000000000,
    message: { mid: `m-${senderId}-${text}`, text }
  }
}

describe('Webhook endpoint', () => {
  let gateway: MessengerGateway
  let transport: FakeTransport

  const postRaw = (raw: string, secret = 'test-secret') =>
    request(gateway.app)
      .post('/webhook')
      .set('Content-Type', 'application/json')
      .set('X-Hub-Signature-256', computeSignature(Buffer.from(raw), secret))
      .send(raw)

  const settle = async () => {
    await gateway.dispatcher.idle()
    await gateway.sendClient.settle()
  }

  beforeEach(() => {
    ;({ gateway, transport } = createTestGateway())
  })

  describe('verification handshake', () => {
    it('echoes the challenge for a matching token', async () => {
      const response = await request(gateway.app)
        .get('/webhook?hub.mode=subscribe&hub.verify_token=test-verify-token&hub.challenge=1158201444')
        .expect(200)

      expect(response.text).toBe('1158201444')
    })

    it('rejects a wrong token', async () => {
      const response = await request(gateway.app)
        .get('/webhook?hub.mode=subscribe&hub.verify_token=nope&hub.challenge=1')
        .expect(403)

      expect(response.text).toBe('Verification token did not match server')
    })

    it('rejects other modes and missing parameters', async () => {
      await request(gateway.app)
        .get('/webhook?hub.mode=unsubscribe&hub.verify_token=test-verify-token&hub.challenge=1')
        .expect(403)
      await request(gateway.app).get('/webhook').expect(403)
    })
  })

  describe('event delivery', () => {
    it('acknowledges and replies to a message in order', async () => {
      const calls: Array<{ senderId: string; text: string | undefined }> = []
      gateway.handle(UpdateKind.MESSAGE_RECEIVED, (update, context) => {
        calls.push({ senderId: update.senderId, text: update.text })
        context.acknowledge()
        return update.text
      })

      const response = await postRaw(JSON.stringify(batch(textEvent('U1', 'hi')))).expect(200)
      await settle()

      expect(response.text).toBe('EVENT_RECEIVED')
      expect(calls).toEqual([{ senderId: 'U1', text: 'hi' }])
      expect(transport.jsonBodies()).toEqual([
        { recipient: { id: 'U1' }, sender_action: 'mark_seen' },
        { recipient: { id: 'U1' }, sender_action: 'typing_on' },
        { recipient: { id: 'U1' }, messaging_type: 'RESPONSE', message: { text: 'hi' } }
      ])
    })

    it('keeps arrival order across deliveries for one sender', async () => {
      const gate = deferred()
      const calls: string[] = []
      gateway.handle(UpdateKind.MESSAGE_RECEIVED, async (update) => {
        calls.push(`start:${update.text}`)
        if (update.text === 'a') await gate.promise
        calls.push(`end:${update.text}`)
      })

      await postRaw(JSON.stringify(batch(textEvent('U1', 'a')))).expect(200)
      await postRaw(JSON.stringify(batch(textEvent('U1', 'b')))).expect(200)
      expect(calls).toEqual(['start:a'])

      gate.resolve()
      await settle()

      expect(calls).toEqual(['start:a', 'end:a', 'start:b', 'end:b'])
    })

    it('rejects a bad signature without dispatching', async () => {
      let called = false
      gateway.handle(UpdateKind.MESSAGE_RECEIVED, () => {
        called = true
      })

      await postRaw(JSON.stringify(batch(textEvent('U1', 'hi'))), 'wrong-secret').expect(403)
      await request(gateway.app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .send(JSON.stringify(batch(textEvent('U1', 'hi'))))
        .expect(403)
      await settle()

      expect(called).toBe(false)
    })

    it('answers 400 to a signed body that is not JSON', async () => {
      const response = await postRaw('{"object": "page", ').expect(400)

      expect(response.body).toEqual({ success: false, error: 'Request body must be JSON' })
    })

    it('still accepts a batch when one event is malformed', async () => {
      const seen: string[] = []
      gateway.handle(UpdateKind.MESSAGE_RECEIVED, (update) => {
        seen.push(update.senderId)
      })

      await postRaw(
        JSON.stringify(batch({ sender: { id: 'U1' }, timestamp: 1, message: { text: 'no mid' } }, textEvent('U2', 'ok')))
      ).expect(200)
      await settle()

      expect(seen).toEqual(['U2'])
    })

    it('answers 200 even when a handler fails', async () => {
      gateway.handle(UpdateKind.MESSAGE_RECEIVED, () => {
        throw new Error('handler bug')
      })
      const failures: string[] = []
      gateway.on('handler:error', ({ update }) => failures.push(update.senderId))

      await postRaw(JSON.stringify(batch(textEvent('U1', 'hi')))).expect(200)
      await settle()

      expect(failures).toEqual(['U1'])
    })

    it('answers 503 while draining', async () => {
      await gateway.dispatcher.shutdown(0)

      await postRaw(JSON.stringify(batch(textEvent('U1', 'hi')))).expect(503)
    })

    it('rejects bodies over the size limit', async () => {
      const raw = JSON.stringify({ entry: [], padding: 'x'.repeat(1_100_000) })

      const response = await postRaw(raw).expect(413)

      expect(response.body).toEqual({ success: false, error: 'Bad request' })
    })
  })

  describe('attachment hosting', () => {
    let dir: string
    let filePath: string

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-attachments-'))
      filePath = path.join(dir, 'note.txt')
      fs.writeFileSync(filePath, 'attachment body')
    })

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true })
    })

    it('serves a serve-once attachment a single time', async () => {
      const hosted = gateway.attachments.host(filePath, { contentType: 'text/plain' })

      const first = await request(gateway.app).get(hosted.path).expect(200)
      expect(first.text).toBe('attachment body')
      expect(first.headers['content-type']).toMatch(/^text\/plain/)

      await request(gateway.app).get(hosted.path).expect(404)
      expect(gateway.attachments.size).toBe(0)
    })

    it('serves a ttl attachment until it expires', async () => {
      ;({ gateway, transport } = createTestGateway({
        attachments: { ttlMs: 60_000, policy: 'ttl', sweepIntervalMs: 60_000 }
      }))
      const hosted = gateway.attachments.host(filePath, { contentType: 'text/plain' })

      await request(gateway.app).get(hosted.path).expect(200)
      await request(gateway.app).get(hosted.path).expect(200)
      expect(gateway.attachments.size).toBe(1)
    })

    it('releases the entry when the file cannot be sent', async () => {
      const hosted = gateway.attachments.host(path.join(dir, 'missing.txt'))

      await request(gateway.app).get(hosted.path).expect(404)

      expect(gateway.attachments.stats()).toEqual({ entries: 1, unconsumed: 1, policy: 'serve-once' })
    })

    it('answers HEAD without consuming a serve-once attachment', async () => {
      const hosted = gateway.attachments.host(filePath, { contentType: 'text/plain' })

      const head = await request(gateway.app).head(hosted.path).expect(200)
      expect(head.headers['content-type']).toMatch(/^text\/plain/)
      expect(gateway.attachments.stats()).toEqual({ entries: 1, unconsumed: 1, policy: 'serve-once' })

      const get = await request(gateway.app).get(hosted.path).expect(200)
      expect(get.text).toBe('attachment body')
      await request(gateway.app).head(hosted.path).expect(404)
    })

    it('serves files whose name or directory starts with a dot', async () => {
      fs.mkdirSync(path.join(dir, '.cache'))
      fs.writeFileSync(path.join(dir, '.cache', 'a.txt'), 'in a dot directory')
      fs.writeFileSync(path.join(dir, '.report.txt'), 'dot file')
      const inDotDir = gateway.attachments.host(path.join(dir, '.cache', 'a.txt'))
      const dotFile = gateway.attachments.host(path.join(dir, '.report.txt'))

      const first = await request(gateway.app).get(inDotDir.path).expect(200)
      const second = await request(gateway.app).get(dotFile.path).expect(200)

      expect(first.text).toBe('in a dot directory')
      expect(second.text).toBe('dot file')
    })

    it('answers 404 for unknown tokens', async () => {
      await request(gateway.app).get('/attachments/not-a-token').expect(404)
    })
  })

  describe('lifecycle', () => {
    it('closes registration on start and drains on stop', async () => {
      const address = await gateway.start()

      expect(address.port).toBeGreaterThan(0)
      expect(() => gateway.handle(UpdateKind.READ_CONFIRMED, () => undefined)).toThrow(RegistrationError)

      await expect(gateway.stop()).resolves.toBe(true)
      expect(gateway.getStatus()).toEqual({
        running: false,
        accepting: false,
        handlers: 0,
        activeConversations: 0,
        hostedAttachments: 0
      })
    })
  })
})
