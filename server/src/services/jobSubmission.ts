import fs from 'fs/promises'
import path from 'path'
import { createJobId, createProcessingRecord, isValidPartCount, JobRecord } from '../models/Job'
import { MetadataStore } from '../store/metadataStore'
import { JobRunner } from '../workers/jobRunner'
import { WorkerPool } from '../workers/workerPool'
import { PoolClosedError, ValidationError } from '../lib/errors'
import { getLogger, Logger, redactFilePath } from '../lib/logger'
import { sanitizeFilename } from '../utils/sanitizeFilename'
import { assertPathWithinDir } from '../utils/assertPathWithinDir'
import { PART_RANGE_MESSAGE } from '../utils/fileValidation'
import { removeTransientUpload } from '../utils/fileCleanup'

export interface SubmitJobInput {
  /** Where the upload currently sits; it is moved into the job's own upload directory. */
  uploadedPath: string
  originalFilename: string
  parts: number
  requestId?: string
}

export interface SubmittedJob {
  jobId: string
  record: JobRecord
}

export interface JobSubmissionDeps {
  store: MetadataStore
  pool: WorkerPool
  runner: JobRunner
  uploadsRoot: string
  logger?: Logger
}

/**
 * Creates the job's `processing` record and hands execution to the worker pool.
 * Returns as soon as the record is on disk; the split runs in the background.
 */
export class JobSubmissionService {
  private readonly store: MetadataStore
  private readonly pool: WorkerPool
  private readonly runner: JobRunner
  private readonly uploadsRoot: string
  private readonly log: Logger

  constructor(deps: JobSubmissionDeps) {
    this.store = deps.store
    this.pool = deps.pool
    this.runner = deps.runner
    this.uploadsRoot = deps.uploadsRoot
    this.log = deps.logger ?? getLogger('api')
  }

  async submit(input: SubmitJobInput): Promise<SubmittedJob> {
    if (!isValidPartCount(input.parts)) {
      throw new ValidationError(PART_RANGE_MESSAGE)
    }
    if (this.pool.isClosed) {
      throw new PoolClosedError(this.pool.name)
    }

    const jobId = createJobId()
    const filename = sanitizeFilename(input.originalFilename)
    const uploadDir = path.join(this.uploadsRoot, jobId)
    const sourcePath = path.join(uploadDir, filename)
    assertPathWithinDir(this.uploadsRoot, sourcePath)

    const outputDir = this.store.jobDir(jobId)
    const record = createProcessingRecord(jobId, filename, input.parts)
    try {
      await fs.mkdir(uploadDir, { recursive: true })
      await fs.rename(input.uploadedPath, sourcePath)
      this.log.info({ jobId, file: redactFilePath(sourcePath) }, 'Saved uploaded file')

      await fs.mkdir(outputDir, { recursive: true })
      // shutdown() may have run while the upload was being moved
      if (this.pool.isClosed) {
        throw new PoolClosedError(this.pool.name)
      }
      await this.store.put(jobId, record)

      this.pool.submit(async () => {
        await this.runner.run({
          jobId,
          sourcePath,
          outputDir,
          parts: input.parts,
          initialRecord: record,
          requestId: input.requestId,
        })
      })
    } catch (err) {
      await this.abandon(jobId, sourcePath, outputDir)
      throw err
    }
    this.log.info({ jobId, parts: input.parts, ...this.pool.stats() }, 'Job queued')

    return { jobId, record }
  }

  /** Undo a submission that failed after the upload was moved: no record, no job directories left behind. */
  private async abandon(jobId: string, sourcePath: string, outputDir: string): Promise<void> {
    const log = this.log.child({ jobId })
    await removeTransientUpload(sourcePath, log)
    try {
      await fs.rm(outputDir, { recursive: true, force: true })
    } catch (err) {
      log.warn({ err }, 'Unable to remove output directory of a refused job')
    }
    log.warn('Job submission abandoned')
  }
}
