import { v4 as uuidv4 } from 'uuid'

export type JobStatus = 'processing' | 'completed' | 'error'

export const JOB_STATUSES: readonly JobStatus[] = ['processing', 'completed', 'error']

export const MIN_PARTS = 2
export const MAX_PARTS = 4

const JOB_ID_PATTERN = /^[0-9a-f]{32}$/

/**
 * Persisted per-job document (metadata.json). Field names are part of the on-disk format.
 */
export interface JobRecord {
  job_id: string
  status: JobStatus
  original_filename: string
  parts: number
  created_at: string
  completed_at?: string
  outputs: string[]
  error_message?: string
}

export function isoNow(): string {
  return new Date().toISOString()
}

export function createJobId(): string {
  return uuidv4().replace(/-/g, '')
}

export function isJobId(value: string): boolean {
  return JOB_ID_PATTERN.test(value)
}

export function isValidPartCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= MIN_PARTS && value <= MAX_PARTS
}

export function isTerminalStatus(status: JobStatus): boolean {
  return status === 'completed' || status === 'error'
}

export function createProcessingRecord(
  jobId: string,
  originalFilename: string,
  parts: number,
  createdAt: string = isoNow()
): JobRecord {
  return {
    job_id: jobId,
    original_filename: originalFilename,
    parts,
    status: 'processing',
    created_at: createdAt,
    outputs: [],
  }
}

export function completeRecord(record: JobRecord, outputs: string[], completedAt: string = isoNow()): JobRecord {
  return {
    ...record,
    status: 'completed',
    completed_at: completedAt,
    outputs: [...outputs],
  }
}

export function failRecord(record: JobRecord, errorMessage: string, completedAt: string = isoNow()): JobRecord {
  return {
    ...record,
    status: 'error',
    error_message: errorMessage,
    completed_at: completedAt,
    outputs: [],
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value)
}

/** Shape check for documents read back from disk. */
export function isJobRecord(value: unknown): value is JobRecord {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  return (
    'job_id' in value && typeof value.job_id === 'string' &&
    'status' in value && isJobStatus(value.status) &&
    'original_filename' in value && typeof value.original_filename === 'string' &&
    'parts' in value && typeof value.parts === 'number' &&
    'created_at' in value && typeof value.created_at === 'string' &&
    'outputs' in value && isStringArray(value.outputs) &&
    (!('completed_at' in value) || value.completed_at === undefined || typeof value.completed_at === 'string') &&
    (!('error_message' in value) || value.error_message === undefined || typeof value.error_message === 'string')
  )
}
