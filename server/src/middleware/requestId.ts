/**
 * Request ID middleware: read x-request-id from the edge proxy or generate a UUID.
 * Attaches it to the request and echoes it in the response header for correlation (client → API → worker).
 */
import { Request, Response, NextFunction } from 'express'
import { v4 as uuidv4 } from 'uuid'
import { withRequestId } from '../lib/logger'

export const REQUEST_ID_HEADER = 'x-request-id'

export interface RequestWithId extends Request {
  requestId?: string
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[REQUEST_ID_HEADER]
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : uuidv4()
  ;(req as RequestWithId).requestId = id
  res.setHeader(REQUEST_ID_HEADER, id)
  next()
}

/** Debug-level start/finish lines per request. Run after requestIdMiddleware. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const log = withRequestId((req as RequestWithId).requestId)
  const started = process.hrtime.bigint()
  log.debug({ method: req.method, path: req.path }, 'Handling request')
  res.on('finish', () => {
    const elapsedMs = Number(process.hrtime.bigint() - started) / 1e6
    log.debug(
      { method: req.method, path: req.path, statusCode: res.statusCode, elapsedMs },
      'Completed request'
    )
  })
  next()
}
