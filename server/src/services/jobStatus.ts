import { JobRecord, JobStatus } from '../models/Job'
import { MetadataStore } from '../store/metadataStore'
import { getLogger, Logger } from '../lib/logger'

export interface JobPayload {
  job_id: string
  status: JobStatus
  metadata: JobRecord
  files: string[]
}

export type JobQueryResult =
  | { kind: 'not_found'; job_id: string }
  | { kind: 'found'; payload: JobPayload }

/** External status contract, camelCased for API consumers. */
export interface JobStatusView {
  status: JobStatus
  createdAt: string
  completedAt?: string
  outputs: string[]
  errorMessage?: string
}

function sameFiles(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i])
}

export function toStatusView(payload: JobPayload): JobStatusView {
  const { metadata } = payload
  return {
    status: payload.status,
    createdAt: metadata.created_at,
    ...(metadata.completed_at !== undefined && { completedAt: metadata.completed_at }),
    outputs: [...payload.files],
    ...(metadata.error_message !== undefined && { errorMessage: metadata.error_message }),
  }
}

/**
 * Builds the query-time view of a job. For completed jobs whose record lists no outputs, the file list is
 * derived from the job directory and written back into the record (status and other fields untouched).
 */
export class JobStatusReader {
  private readonly store: MetadataStore
  private readonly log: Logger

  constructor(store: MetadataStore, log: Logger = getLogger('api')) {
    this.store = store
    this.log = log
  }

  async query(jobId: string): Promise<JobQueryResult> {
    if (!(await this.store.exists(jobId))) {
      return { kind: 'not_found', job_id: jobId }
    }
    const record = await this.store.get(jobId)
    if (!record) {
      return { kind: 'not_found', job_id: jobId }
    }

    let files: string[] = []
    if (record.status === 'completed') {
      files = record.outputs.length > 0 ? [...record.outputs] : await this.store.listArtifacts(jobId)
    }

    const payload: JobPayload = {
      job_id: jobId,
      status: record.status,
      metadata: record,
      files,
    }

    if (record.status === 'completed' && !sameFiles(record.outputs, files)) {
      payload.metadata = { ...record, outputs: files }
      await this.healOutputs(jobId, files)
    }

    if (record.status === 'error') {
      this.log.debug({ jobId, errorMessage: record.error_message }, 'Job is in error state')
    }
    return { kind: 'found', payload }
  }

  async getStatusView(jobId: string): Promise<JobStatusView | undefined> {
    const result = await this.query(jobId)
    return result.kind === 'found' ? toStatusView(result.payload) : undefined
  }

  /**
   * Persist derived outputs. Re-checked against the latest record under the store's job lock, so it only
   * lands on a record that is still completed with an empty output list.
   */
  private async healOutputs(jobId: string, files: string[]): Promise<void> {
    try {
      let written = false
      await this.store.update(jobId, (current) => {
        if (!current || current.status !== 'completed') return undefined
        if (current.outputs.length > 0 || files.length === 0) return undefined
        written = true
        return { ...current, outputs: [...files] }
      })
      if (written) this.log.info({ jobId, files: files.length }, 'Corrected job outputs from directory listing')
    } catch (err) {
      this.log.error({ err, jobId }, 'Failed to persist corrected job outputs')
    }
  }
}
