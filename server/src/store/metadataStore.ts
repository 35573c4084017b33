import type { Dirent } from 'fs'
import fs from 'fs/promises'
import path from 'path'
import { isJobId, isJobRecord, JobRecord } from '../models/Job'
import { ValidationError, isErrnoException } from '../lib/errors'
import { getLogger, Logger } from '../lib/logger'
import { assertPathWithinDir } from '../utils/assertPathWithinDir'

export const METADATA_FILENAME = 'metadata.json'
const TMP_SUFFIX = '.tmp'

/** Returns the next record to write, or undefined to leave the document as it is. */
export type RecordMutator = (current: JobRecord | undefined) => JobRecord | undefined

/**
 * One JSON document per job at <outputsRoot>/<jobId>/metadata.json.
 *
 * Writes go to a temp file in the same directory and are renamed onto the document, so a reader sees
 * either the previous document or the new one. Writes for one job are serialized in-process; `update`
 * runs its read-modify-write under the same per-job lock.
 */
export class MetadataStore {
  private readonly locks = new Map<string, Promise<void>>()
  private writeSeq = 0

  constructor(
    readonly outputsRoot: string,
    private readonly log: Logger = getLogger('api')
  ) {}

  jobDir(jobId: string): string {
    if (!isJobId(jobId)) {
      throw new ValidationError(`Invalid job id: ${jobId}`)
    }
    const dir = path.join(this.outputsRoot, jobId)
    assertPathWithinDir(this.outputsRoot, dir)
    return dir
  }

  metadataPath(jobId: string): string {
    return path.join(this.jobDir(jobId), METADATA_FILENAME)
  }

  /** An unreadable job directory counts as missing; only the id check throws. */
  async exists(jobId: string): Promise<boolean> {
    const dir = this.jobDir(jobId)
    try {
      const stats = await fs.stat(dir)
      return stats.isDirectory()
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'ENOENT')) {
        this.log.error({ err, jobId }, 'Failed to stat job directory')
      }
      return false
    }
  }

  /** Missing, unreadable or malformed documents all read as undefined. */
  async get(jobId: string): Promise<JobRecord | undefined> {
    const metadataPath = this.metadataPath(jobId)
    let content: string
    try {
      content = await fs.readFile(metadataPath, 'utf8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return undefined
      this.log.error({ err, jobId }, 'Failed to read job metadata')
      return undefined
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      this.log.error({ err, jobId }, 'Failed to parse job metadata')
      return undefined
    }
    if (!isJobRecord(parsed)) {
      this.log.error({ jobId }, 'Job metadata does not match the job record shape')
      return undefined
    }
    return parsed
  }

  async put(jobId: string, record: JobRecord): Promise<void> {
    await this.withJobLock(jobId, () => this.writeDocument(jobId, record))
  }

  /**
   * Read-modify-write under the job's lock. Resolves to the document as it stands afterwards.
   */
  async update(jobId: string, mutator: RecordMutator): Promise<JobRecord | undefined> {
    return this.withJobLock(jobId, async () => {
      const current = await this.get(jobId)
      const next = mutator(current)
      if (next === undefined) return current
      await this.writeDocument(jobId, next)
      return next
    })
  }

  /** Regular files in the job directory other than the metadata document, sorted by name. */
  async listArtifacts(jobId: string): Promise<string[]> {
    const dir = this.jobDir(jobId)
    let entries: Dirent[]
    try {
      entries = await fs.readdir(dir, { withFileTypes: true })
    } catch (err) {
      if (!(isErrnoException(err) && err.code === 'ENOENT')) {
        this.log.error({ err, jobId }, 'Failed to list job artifacts')
      }
      return []
    }
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .filter((name) => name !== METADATA_FILENAME && !isTempName(name))
      .sort()
  }

  private async writeDocument(jobId: string, record: JobRecord): Promise<void> {
    const dir = this.jobDir(jobId)
    await fs.mkdir(dir, { recursive: true })

    const metadataPath = path.join(dir, METADATA_FILENAME)
    this.writeSeq += 1
    const tmpPath = `${metadataPath}.${process.pid}.${this.writeSeq}${TMP_SUFFIX}`
    const content = JSON.stringify(record, null, 2)
    try {
      await fs.writeFile(tmpPath, content, 'utf8')
      await fs.rename(tmpPath, metadataPath)
    } catch (err) {
      await fs.rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
        this.log.warn({ err: rmErr, jobId }, 'Failed to remove temporary metadata file')
      })
      throw err
    }
    this.log.debug({ jobId, status: record.status }, 'Saved job metadata')
  }

  private async withJobLock<T>(jobId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(jobId) ?? Promise.resolve()
    const run = previous.then(fn, fn)
    const tail = run.then(
      () => undefined,
      () => undefined
    )
    this.locks.set(jobId, tail)
    try {
      return await run
    } finally {
      if (this.locks.get(jobId) === tail) this.locks.delete(jobId)
    }
  }
}

function isTempName(name: string): boolean {
  return name.startsWith(`${METADATA_FILENAME}.`) && name.endsWith(TMP_SUFFIX)
}
