/**
 * Error classes shared by the HTTP adapter, the job runner and the splitter.
 * `statusCode` is what the express error handler answers with.
 */

export class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number

  constructor(message: string, code: string, statusCode = 500) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.statusCode = statusCode
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400)
    this.name = 'ValidationError'
  }
}

/** The worker pool no longer accepts work (process shutting down). */
export class PoolClosedError extends AppError {
  constructor(poolName: string) {
    super(`Worker pool "${poolName}" is shut down and no longer accepts jobs`, 'POOL_CLOSED', 503)
    this.name = 'PoolClosedError'
  }
}

/** Source duration could not be read, or is not a positive number of seconds. */
export class DurationUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 'DURATION_UNAVAILABLE', 422)
    this.name = 'DurationUnavailableError'
  }
}

/** An external media tool (ffprobe/ffmpeg) failed; `diagnostic` carries its stderr. */
export class ExternalToolError extends AppError {
  public readonly tool: string
  public readonly diagnostic: string

  constructor(tool: string, diagnostic: string) {
    super(`${tool} failed: ${diagnostic || 'no diagnostic output'}`, 'EXTERNAL_TOOL_FAILURE', 500)
    this.name = 'ExternalToolError'
    this.tool = tool
    this.diagnostic = diagnostic
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}
