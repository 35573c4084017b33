/**
 * Final express error handler: AppError → its status code and message, multer limits → 413/400,
 * anything else → 500 with a generic message. Details only go to the log.
 */
import { Request, Response, NextFunction } from 'express'
import multer from 'multer'
import { AppError } from '../lib/errors'
import { withRequestId } from '../lib/logger'
import { RequestWithId } from './requestId'

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err)
    return
  }
  const log = withRequestId((req as RequestWithId).requestId)

  if (err instanceof AppError) {
    const level = err.statusCode >= 500 ? 'error' : 'warn'
    log[level]({ err, method: req.method, path: req.path }, 'Request failed')
    res.status(err.statusCode).json({ message: err.message, code: err.code })
    return
  }

  if (err instanceof multer.MulterError) {
    log.warn({ err, method: req.method, path: req.path }, 'Upload rejected')
    const statusCode = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400
    res.status(statusCode).json({ message: err.message, code: err.code })
    return
  }

  log.error({ err, method: req.method, path: req.path }, 'Unhandled request error')
  res.status(500).json({ message: 'Internal server error', code: 'INTERNAL_ERROR' })
}
