import { describe, it, expect, beforeEach } from '@jest/globals'
import request from 'supertest'
import type { Express } from 'express'
import { createApp } from '../app.js'
import { loadBotConfig } from '../config/env.js'
import { SIGNATURE_HEADER, signPayload } from '../middleware/signature.js'
import { MessageDispatcher } from '../routing/Dispatcher.js'
import { ReplyExecutor } from '../services/replyExecutor.js'
import { WebhookProcessor } from '../services/webhookProcessor.js'
import { FakeWhatsApp } from './fakes.js'

const APP_SECRET = 'test-secret'
const API_TOKEN = 'test-api-token'

const delivery = JSON.stringify({
  object: 'whatsapp_business_account',
  entry: [
    {
      id: 'waba-1',
      changes: [
        {
          field: 'messages',
          value: {
            messages: [{ id: 'wamid.a', from: '15550001111', timestamp: '1700000000', type: 'text', text: { body: 'resume' } }]
          }
        }
      ]
    }
  ]
})

describe('HTTP routes', () => {
  let whatsapp: FakeWhatsApp
  let app: Express

  beforeEach(() => {
    const config = loadBotConfig({
      PHONE_ID: '1234567890',
      ACCESS_TOKEN: 'test-access-token',
      VERIFY_TOKEN: 'test-verify-token',
      APP_SECRET,
      API_TOKENS: API_TOKEN
    })
    whatsapp = new FakeWhatsApp()
    const dispatcher = new MessageDispatcher(
      [{ name: 'resume', keywords: ['resume'], action: { kind: 'send_text', body: 'resume tip' } }],
      { nonText: { kind: 'send_text', body: 'text only' }, unmatched: { kind: 'send_text', body: 'menu' } },
      { answers: {}, unknown: { kind: 'send_text', body: 'tell me more' } }
    )
    const executor = new ReplyExecutor(whatsapp, null, {
      generativeTimeoutMs: 50,
      staticFallback: { kind: 'send_text', body: 'menu' }
    })
    app = createApp({
      config,
      processor: new WebhookProcessor(dispatcher, executor, whatsapp),
      whatsapp,
      generativeEnabled: false,
      ruleNames: dispatcher.getRuleNames()
    })
  })

  describe('GET /health', () => {
    it('reports status and loaded rules', async () => {
      const res = await request(app).get('/health')

      expect(res.status).toBe(200)
      expect(res.body).toMatchObject({
        status: 'healthy',
        api_version: 'v18.0',
        webhook_path: '/webhook',
        generative: false,
        unmatched_action: 'static',
        rules: ['resume']
      })
      expect(typeof res.body.timestamp).toBe('string')
    })
  })

  describe('GET /webhook', () => {
    it('echoes the challenge for a matching verify token', async () => {
      const res = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify-token', 'hub.challenge': '1158201444' })

      expect(res.status).toBe(200)
      expect(res.text).toBe('1158201444')
    })

    it('refuses a wrong verify token', async () => {
      const res = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': '1158201444' })

      expect(res.status).toBe(403)
      expect(res.body).toEqual({ success: false, error: 'Verification failed' })
    })
  })

  describe('POST /webhook', () => {
    it('replies to a signed delivery and acknowledges it', async () => {
      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set(SIGNATURE_HEADER, signPayload(delivery, APP_SECRET))
        .send(delivery)

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: 'EVENT_RECEIVED' })
      expect(whatsapp.sent).toEqual([{ to: '15550001111', action: { kind: 'send_text', body: 'resume tip' } }])
    })

    it('rejects a delivery with a bad signature', async () => {
      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set(SIGNATURE_HEADER, signPayload(delivery, 'another-secret'))
        .send(delivery)

      expect(res.status).toBe(403)
      expect(whatsapp.sent).toHaveLength(0)
    })

    it('acknowledges a body that is not JSON', async () => {
      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .send('{not json')

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: 'EVENT_RECEIVED' })
    })

    it('acknowledges a signed payload with an unexpected shape', async () => {
      const body = JSON.stringify({ hello: 'world' })
      const res = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set(SIGNATURE_HEADER, signPayload(body, APP_SECRET))
        .send(body)

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: 'EVENT_RECEIVED' })
      expect(whatsapp.sent).toHaveLength(0)
    })
  })

  describe('POST /send-message', () => {
    it('requires an API key', async () => {
      const res = await request(app).post('/send-message').send({ to: '15550001111', message: 'hello' })

      expect(res.status).toBe(401)
      expect(res.body).toEqual({ success: false, error: 'Invalid or missing API key' })
    })

    it('validates the body', async () => {
      const res = await request(app).post('/send-message').set('x-api-key', API_TOKEN).send({ to: '15550001111' })

      expect(res.status).toBe(400)
    })

    it('sends a text message', async () => {
      const res = await request(app)
        .post('/send-message')
        .set('Authorization', `Bearer ${API_TOKEN}`)
        .send({ to: '15550001111', message: 'hello' })

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ success: true, status: 'sent', to: '15550001111', message_id: 'wamid.out-1' })
    })

    it('reports a failed send', async () => {
      whatsapp.sendError = new Error('network down')
      const res = await request(app).post('/send-message').set('x-api-key', API_TOKEN).send({ to: '15550001111', message: 'hello' })

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ success: false, error: 'Failed to send message' })
    })
  })

  describe('POST /broadcast', () => {
    it('sends to every recipient', async () => {
      const res = await request(app)
        .post('/broadcast')
        .set('x-api-key', API_TOKEN)
        .send({ message: 'Weekly tip', recipients: ['15550001111', '15550002222'] })

      expect(res.status).toBe(200)
      expect(res.body).toEqual({
        success: true,
        results: [
          { recipient: '15550001111', status: 'sent', message_id: 'wamid.out-1' },
          { recipient: '15550002222', status: 'sent', message_id: 'wamid.out-2' }
        ]
      })
    })

    it('marks the broadcast unsuccessful when a send fails', async () => {
      whatsapp.sendError = new Error('network down')
      const res = await request(app)
        .post('/broadcast')
        .set('x-api-key', API_TOKEN)
        .send({ message: 'Weekly tip', recipients: ['15550001111'] })

      expect(res.body).toEqual({
        success: false,
        results: [{ recipient: '15550001111', status: 'failed', error: 'network down' }]
      })
    })
  })
})
