import { Request, Response, NextFunction, RequestHandler } from 'express'

/**
 * API key check for the outbound send endpoints. The webhook routes stay open:
 * Meta authenticates itself with the verify token and the payload signature.
 */
export function apiKeyAuth(tokens: Set<string>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (tokens.size === 0) {
      // if no tokens configured, deny by default
      res.status(401).json({ success: false, error: 'API not configured: missing API_TOKENS' })
      return
    }
    const headerKey =
      req.header('x-api-key') ||
      req.header('authorization')?.replace(/^Bearer\s+/i, '')
    if (!headerKey || !tokens.has(headerKey)) {
      res.status(401).json({ success: false, error: 'Invalid or missing API key' })
      return
    }
    next()
  }
}
