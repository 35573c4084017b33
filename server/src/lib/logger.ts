/**
 * pino loggers for the HTTP side ('api') and the job pool ('worker'). JSON lines carrying service, env and
 * release, plus requestId/jobId on child loggers. Absolute paths never go to the log; see redactFilePath.
 */
import pino from 'pino'

export type ServiceName = 'api' | 'worker'

export type Logger = pino.Logger

const REDACT_PATHS = [
  'sourcePath',
  'uploadedPath',
  'outputDir',
  'sentryDsn',
  'req.headers.authorization',
  'req.headers.cookie',
]

/** LOG_LEVEL wins; otherwise tests run silent and everything else logs at info. */
export function resolveLogLevel(source: NodeJS.ProcessEnv = process.env): string {
  const configured = source.LOG_LEVEL?.trim()
  if (configured) return configured
  return source.NODE_ENV === 'test' ? 'silent' : 'info'
}

const loggers = new Map<ServiceName, Logger>()

export function getLogger(service: ServiceName): Logger {
  const existing = loggers.get(service)
  if (existing) return existing

  const logger = pino({
    level: resolveLogLevel(),
    base: {
      service,
      env: process.env.NODE_ENV || 'development',
      release: process.env.RELEASE || 'dev',
    },
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
  loggers.set(service, logger)
  return logger
}

export function withRequestId(requestId: string | undefined): Logger {
  return getLogger('api').child({ requestId: requestId || undefined })
}

/** Worker-side child logger for one job. */
export function withJobContext(jobId: string, requestId?: string): Logger {
  return getLogger('worker').child({ jobId, requestId: requestId || undefined })
}

/** Last path segment only: clip.mp4 rather than /srv/data/uploads/<jobId>/clip.mp4. */
export function redactFilePath(filePath: string): string {
  const segments = filePath.split(/[\\/]/)
  return segments[segments.length - 1] || '[REDACTED]'
}
