/**
 * Sentry for API and job workers. Enabled only when SENTRY_DSN is set.
 * Uses @sentry/node v8: setupExpressErrorHandler(app) after routes; no request handler (auto-instrumentation).
 */
import * as Sentry from '@sentry/node'
import type { Express, Request, Response, NextFunction } from 'express'
import type { AppConfig } from '../env'
import type { RequestWithId } from '../middleware/requestId'
import { getLogger } from './logger'

let enabled = false

export function initSentry(config: Pick<AppConfig, 'sentryDsn' | 'nodeEnv' | 'release'>): void {
  if (!config.sentryDsn) return
  try {
    Sentry.init({
      dsn: config.sentryDsn,
      environment: config.nodeEnv,
      release: config.release,
      tracesSampleRate: 0.05,
      integrations: [Sentry.expressIntegration()],
    })
    enabled = true
  } catch (err) {
    getLogger('api').warn({ err }, 'Sentry initialisation failed; error reporting disabled')
  }
}

/** Call after all routes. No-op if Sentry is not enabled. */
export function setupSentryErrorHandler(app: Express): void {
  if (!enabled) return
  Sentry.setupExpressErrorHandler(app)
}

/** Set requestId on Sentry scope for correlation. Run after requestIdMiddleware. */
export function sentryRequestIdScope(req: Request, _res: Response, next: NextFunction): void {
  const id = (req as RequestWithId).requestId
  if (enabled && id) Sentry.getCurrentScope().setTag('request_id', id)
  next()
}

/** Capture an unexpected job failure with jobId/requestId tags. */
export function captureJobError(jobId: string, requestId: string | undefined, err: unknown): void {
  if (!enabled) return
  Sentry.withScope((scope) => {
    scope.setTag('service', 'worker')
    scope.setTag('job_id', jobId)
    if (requestId) scope.setTag('request_id', requestId)
    Sentry.captureException(err)
  })
}
