import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { createProcessingRecord, JobRecord } from '../../src/models/Job'
import { formatTimestamp, planSegments, SegmentPlan, Splitter } from '../../src/services/splitter'

export interface TempDataContext {
  root: string
  uploadDir: string
  outputDir: string
}

export async function withTempDataDir<T>(prefix: string, run: (ctx: TempDataContext) => Promise<T>): Promise<T> {
  const root = await mkdtemp(path.join(os.tmpdir(), `clipsplit-${prefix}-`))
  const uploadDir = path.join(root, 'uploads')
  const outputDir = path.join(root, 'outputs')
  await mkdir(uploadDir, { recursive: true })
  await mkdir(outputDir, { recursive: true })
  try {
    return await run({ root, uploadDir, outputDir })
  } finally {
    await rm(root, { recursive: true, force: true })
  }
}

export const JOB_ID = '0123456789abcdef0123456789abcdef'
export const OTHER_JOB_ID = 'fedcba9876543210fedcba9876543210'
export const CREATED_AT = '2026-01-05T10:00:00.000Z'
export const COMPLETED_AT = '2026-01-05T10:01:30.000Z'

export function processingRecord(jobId = JOB_ID, parts = 3): JobRecord {
  return createProcessingRecord(jobId, 'clip.mp4', parts, CREATED_AT)
}

/** Writes an upload at uploads/<jobId>/clip.mp4 the way a submission leaves it. */
export async function placeUpload(uploadDir: string, jobId = JOB_ID, name = 'clip.mp4'): Promise<string> {
  const dir = path.join(uploadDir, jobId)
  await mkdir(dir, { recursive: true })
  const filePath = path.join(dir, name)
  await writeFile(filePath, 'fake mp4 payload')
  return filePath
}

export interface SplitCall {
  sourcePath: string
  outputDir: string
  parts: number
}

/** Splitter stand-in for a source of fixed duration; each part file holds "<start>+<length>". */
export class FixedDurationSplitter implements Splitter {
  readonly calls: SplitCall[] = []
  readonly plans: SegmentPlan[][] = []

  constructor(private readonly duration: number) {}

  async split(sourcePath: string, outputDir: string, parts: number): Promise<string[]> {
    this.calls.push({ sourcePath, outputDir, parts })
    const plan = planSegments(sourcePath, this.duration, parts)
    this.plans.push(plan)
    for (const segment of plan) {
      await writeFile(
        path.join(outputDir, segment.fileName),
        `${formatTimestamp(segment.start)}+${formatTimestamp(segment.length)}`
      )
    }
    return plan.map((segment) => segment.fileName)
  }
}

export class FailingSplitter implements Splitter {
  calls = 0

  constructor(private readonly error: unknown) {}

  async split(): Promise<string[]> {
    this.calls += 1
    throw this.error
  }
}

/** Holds every split until `release()` is called. */
export class GatedSplitter implements Splitter {
  private readonly gate = deferred<void>()

  constructor(private readonly inner: Splitter) {}

  release(): void {
    this.gate.resolve()
  }

  async split(sourcePath: string, outputDir: string, parts: number): Promise<string[]> {
    await this.gate.promise
    return this.inner.split(sourcePath, outputDir, parts)
  }
}

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (reason: unknown) => void
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined
  let reject: (reason: unknown) => void = () => undefined
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
