import path from 'path'
import { completeRecord, failRecord, isTerminalStatus, JobRecord } from '../models/Job'
import { MetadataStore } from '../store/metadataStore'
import { Splitter } from '../services/splitter'
import { DurationUnavailableError, ExternalToolError } from '../lib/errors'
import { Logger, redactFilePath, withJobContext } from '../lib/logger'
import { captureJobError } from '../lib/sentry'
import { removeTransientUpload } from '../utils/fileCleanup'

export const UNEXPECTED_ERROR_MESSAGE = 'Unexpected error while processing the video.'
export const MAX_DIAGNOSTIC_LENGTH = 2000

export interface JobRequest {
  jobId: string
  sourcePath: string
  outputDir: string
  parts: number
  initialRecord: JobRecord
  requestId?: string
}

export interface JobRunnerDeps {
  store: MetadataStore
  splitter: Splitter
  /** Child loggers per job are derived from this; defaults to the worker logger. */
  logger?: Logger
}

export type FailureKind = 'external_tool' | 'duration' | 'unexpected'

export interface ClassifiedFailure {
  kind: FailureKind
  message: string
}

/** Strip control characters (keeping newlines and tabs) and cap the length of tool output kept in a job record. */
export function sanitizeDiagnostic(text: string, maxLength = MAX_DIAGNOSTIC_LENGTH): string {
  const cleaned = text.replace(/\r\n?/g, '\n').replace(/[\x00-\x08\x0b-\x1f\x7f]/g, '').trim()
  if (cleaned.length <= maxLength) return cleaned
  return `${cleaned.slice(0, maxLength - 3)}...`
}

/** Drop the given directory prefixes so only file names remain: /srv/uploads/<id>/clip.mp4 → clip.mp4. */
export function stripDirectories(text: string, dirs: readonly string[]): string {
  return dirs.reduce((result, dir) => result.split(`${dir}${path.sep}`).join(''), text)
}

/** `dirs` are the job's server-side directories, removed from tool output before it is stored. */
export function classifyFailure(error: unknown, dirs: readonly string[] = []): ClassifiedFailure {
  if (error instanceof ExternalToolError) {
    const diagnostic = sanitizeDiagnostic(stripDirectories(error.diagnostic, dirs))
    return { kind: 'external_tool', message: diagnostic || stripDirectories(error.message, dirs) }
  }
  if (error instanceof DurationUnavailableError) {
    return { kind: 'duration', message: error.message }
  }
  return { kind: 'unexpected', message: UNEXPECTED_ERROR_MESSAGE }
}

/**
 * Executes one job: split, one terminal metadata write, then removal of the transient upload.
 * `run` always resolves; outcomes are only observable through the job's record.
 */
export class JobRunner {
  private readonly store: MetadataStore
  private readonly splitter: Splitter
  private readonly logger?: Logger

  constructor(deps: JobRunnerDeps) {
    this.store = deps.store
    this.splitter = deps.splitter
    this.logger = deps.logger
  }

  async run(request: JobRequest): Promise<JobRecord | undefined> {
    const { jobId, sourcePath, outputDir, parts, initialRecord, requestId } = request
    const log = this.logger
      ? this.logger.child({ jobId, requestId })
      : withJobContext(jobId, requestId)
    log.info({ source: redactFilePath(sourcePath), parts }, 'Starting background processing')

    let terminal: JobRecord
    try {
      const outputs = await this.splitter.split(sourcePath, outputDir, parts)
      if (outputs.length === 0) {
        throw new Error('Splitter reported no output files')
      }
      terminal = completeRecord(initialRecord, outputs)
      log.info({ outputs: outputs.length }, 'Job completed')
    } catch (err) {
      const failure = classifyFailure(err, [path.dirname(sourcePath), outputDir])
      terminal = failRecord(initialRecord, failure.message)
      if (failure.kind === 'external_tool') {
        log.error({ err }, 'Job failed while splitting video')
      } else if (failure.kind === 'duration') {
        log.error({ err }, 'Job failed while determining duration')
      } else {
        log.error({ err }, 'Job encountered an unexpected error')
        captureJobError(jobId, requestId, err)
      }
    }

    try {
      return await this.persistTerminal(jobId, terminal, log)
    } catch (err) {
      log.error({ err, status: terminal.status }, 'Failed to persist terminal job record')
      captureJobError(jobId, requestId, err)
      return undefined
    } finally {
      await removeTransientUpload(sourcePath, log)
    }
  }

  /** Applies the terminal fields to the record on disk, unless that record already reached a terminal status. */
  private async persistTerminal(jobId: string, terminal: JobRecord, log: Logger): Promise<JobRecord | undefined> {
    return this.store.update(jobId, (current) => {
      if (current && isTerminalStatus(current.status)) {
        log.warn({ status: current.status }, 'Job already has a terminal status; keeping it')
        return undefined
      }
      const base = current ?? terminal
      return terminal.status === 'completed'
        ? completeRecord(base, terminal.outputs, terminal.completed_at)
        : failRecord(base, terminal.error_message ?? UNEXPECTED_ERROR_MESSAGE, terminal.completed_at)
    })
  }
}
