import { createHmac, timingSafeEqual } from 'crypto'
import type { IncomingMessage, ServerResponse } from 'http'
import type { Request, Response, NextFunction, RequestHandler } from 'express'
import type { Logger } from '../utils/Logger.js'

export const SIGNATURE_HEADER = 'x-hub-signature-256'

export function signPayload(payload: Buffer | string, appSecret: string): string {
  return `sha256=${createHmac('sha256', appSecret).update(payload).digest('hex')}`
}

export function isValidSignature(payload: Buffer, signature: string | undefined, appSecret: string): boolean {
  if (!signature) return false
  const expected = Buffer.from(signPayload(payload, appSecret))
  const received = Buffer.from(signature)
  return expected.length === received.length && timingSafeEqual(expected, received)
}

const rawBodies = new WeakMap<IncomingMessage, Buffer>()

/**
 * `express.json` verify hook that keeps the raw bytes for signature checks.
 */
export function captureRawBody(req: IncomingMessage, _res: ServerResponse, buf: Buffer): void {
  rawBodies.set(req, buf)
}

export function getRawBody(req: IncomingMessage): Buffer {
  return rawBodies.get(req) ?? Buffer.alloc(0)
}

/**
 * Rejects webhook posts whose X-Hub-Signature-256 does not match the app secret.
 * Without a configured secret every request passes.
 */
export function verifyWebhookSignature(appSecret: string | undefined, logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!appSecret) {
      next()
      return
    }
    if (!isValidSignature(getRawBody(req), req.header(SIGNATURE_HEADER), appSecret)) {
      logger.warn({ path: req.path }, 'Invalid webhook signature')
      res.status(403).json({ success: false, error: 'Invalid signature' })
      return
    }
    next()
  }
}
