import express from 'express'
import cors from 'cors'
import rateLimit from 'express-rate-limit'
import { AppConfig } from './env'
import { MetadataStore } from './store/metadataStore'
import { JobSubmissionService } from './services/jobSubmission'
import { JobStatusReader } from './services/jobStatus'
import { WorkerPool } from './workers/workerPool'
import { requestIdMiddleware, requestLogger } from './middleware/requestId'
import { errorHandler } from './middleware/errorHandler'
import { sentryRequestIdScope, setupSentryErrorHandler } from './lib/sentry'
import { createUploadRouter } from './routes/upload'
import { createJobsRouter } from './routes/jobs'
import { createDownloadRouter } from './routes/download'
import { createHealthRouter } from './routes/health'

export interface AppDeps {
  config: Pick<AppConfig, 'uploadDir' | 'maxUploadBytes' | 'corsOrigins' | 'nodeEnv' | 'release'>
  store: MetadataStore
  pool: WorkerPool
  submission: JobSubmissionService
  reader: JobStatusReader
}

/** In dev, allow any origin that is localhost or 127.0.0.1 (any port). */
function isLocalOrigin(origin: string): boolean {
  try {
    const host = new URL(origin).hostname.toLowerCase()
    return host === 'localhost' || host === '127.0.0.1' || host === '[::1]'
  } catch {
    return false
  }
}

export function createApp(deps: AppDeps): express.Express {
  const { config } = deps
  const app = express()
  app.disable('etag')
  app.disable('x-powered-by')

  const allowedOrigins = new Set(config.corsOrigins.map((o) => o.replace(/\/$/, '')))
  app.use(
    cors({
      origin: (origin, callback) => {
        // curl, server-to-server
        if (!origin) return callback(null, true)
        const norm = origin.trim().replace(/\/$/, '')
        const allowed =
          allowedOrigins.has(norm) || (config.nodeEnv !== 'production' && isLocalOrigin(norm))
        callback(null, allowed)
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-Id'],
    })
  )

  // Request ID: correlate client → API → worker (read from edge or generate)
  app.use(requestIdMiddleware)
  app.use(sentryRequestIdScope)
  app.use(requestLogger)

  app.use(
    '/api',
    rateLimit({
      windowMs: 60 * 1000,
      limit: 120,
      message: { message: 'Too many requests. Please wait.' },
      standardHeaders: true,
      legacyHeaders: false,
    })
  )

  app.use(
    '/api/upload',
    createUploadRouter({
      submission: deps.submission,
      uploadsRoot: config.uploadDir,
      maxUploadBytes: config.maxUploadBytes,
    })
  )
  app.use('/api/jobs', createJobsRouter(deps.reader))
  app.use('/api/download', createDownloadRouter(deps.store))
  app.use(createHealthRouter({ pool: deps.pool, release: config.release, nodeEnv: config.nodeEnv }))

  setupSentryErrorHandler(app)
  app.use(errorHandler)

  return app
}
