import assert from 'node:assert/strict'
import { once } from 'node:events'
import { readdir } from 'node:fs/promises'
import type { AddressInfo } from 'node:net'
import test from 'node:test'
import { createApp } from '../src/app'
import { MetadataStore } from '../src/store/metadataStore'
import { Splitter } from '../src/services/splitter'
import { JobSubmissionService } from '../src/services/jobSubmission'
import { JobStatusReader } from '../src/services/jobStatus'
import { MISSING_FILE_MESSAGE, PART_RANGE_MESSAGE, UNSUPPORTED_TYPE_MESSAGE } from '../src/utils/fileValidation'
import { JobRunner } from '../src/workers/jobRunner'
import { WorkerPool } from '../src/workers/workerPool'
import { FixedDurationSplitter, JOB_ID, processingRecord, TempDataContext, withTempDataDir } from './helpers/temp-data'

interface ApiContext extends TempDataContext {
  baseUrl: string
  store: MetadataStore
  pool: WorkerPool
}

async function withApi(prefix: string, splitter: Splitter, run: (ctx: ApiContext) => Promise<void>): Promise<void> {
  await withTempDataDir(prefix, async (dirs) => {
    const store = new MetadataStore(dirs.outputDir)
    const pool = new WorkerPool({ concurrency: 1, name: 'api-test' })
    const runner = new JobRunner({ store, splitter })
    const submission = new JobSubmissionService({ store, pool, runner, uploadsRoot: dirs.uploadDir })
    const app = createApp({
      config: {
        uploadDir: dirs.uploadDir,
        maxUploadBytes: 1024 * 1024,
        corsOrigins: [],
        nodeEnv: 'test',
        release: 'test-release',
      },
      store,
      pool,
      submission,
      reader: new JobStatusReader(store),
    })

    const server = app.listen(0, '127.0.0.1')
    await once(server, 'listening')
    const address = server.address()
    assert.ok(address !== null && typeof address === 'object')
    const { port }: AddressInfo = address
    try {
      await run({ ...dirs, baseUrl: `http://127.0.0.1:${port}`, store, pool })
    } finally {
      await pool.onIdle()
      server.closeAllConnections()
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
    }
  })
}

function uploadForm(options: { name?: string; parts?: string; withFile?: boolean } = {}): FormData {
  const form = new FormData()
  if (options.parts !== undefined) form.append('parts', options.parts)
  if (options.withFile !== false) {
    form.append('file', new Blob(['fake mp4 payload'], { type: 'video/mp4' }), options.name ?? 'clip.mp4')
  }
  return form
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readJobId(body: unknown): string {
  assert.ok(isRecord(body) && typeof body.jobId === 'string')
  return body.jobId
}

test('upload, poll, and download a split video', async () => {
  await withApi('api', new FixedDurationSplitter(9), async ({ baseUrl, pool, uploadDir }) => {
    const upload = await fetch(`${baseUrl}/api/upload`, { method: 'POST', body: uploadForm({ parts: '3' }) })
    assert.equal(upload.status, 202)
    const uploadBody: unknown = await upload.json()
    const jobId = readJobId(uploadBody)
    assert.deepEqual(uploadBody, { jobId, status: 'processing', statusUrl: `/api/jobs/${jobId}` })
    assert.match(jobId, /^[0-9a-f]{32}$/)

    await pool.onIdle()

    const job = await fetch(`${baseUrl}/api/jobs/${jobId}`)
    assert.equal(job.status, 200)
    assert.equal(job.headers.get('cache-control'), 'no-store, no-cache, must-revalidate, proxy-revalidate')
    const payload: unknown = await job.json()
    const files = ['clip_part1.mp4', 'clip_part2.mp4', 'clip_part3.mp4']
    assert.ok(isRecord(payload) && isRecord(payload.metadata))
    assert.equal(payload.job_id, jobId)
    assert.equal(payload.status, 'completed')
    assert.deepEqual(payload.files, files)
    assert.equal(payload.metadata.status, 'completed')
    assert.equal(payload.metadata.original_filename, 'clip.mp4')
    assert.equal(payload.metadata.parts, 3)
    assert.deepEqual(payload.metadata.outputs, files)

    const status = await fetch(`${baseUrl}/api/jobs/${jobId}/status`)
    const view: unknown = await status.json()
    assert.ok(isRecord(view) && typeof view.createdAt === 'string' && typeof view.completedAt === 'string')
    assert.deepEqual(view, {
      status: 'completed',
      createdAt: view.createdAt,
      completedAt: view.completedAt,
      outputs: files,
    })

    const download = await fetch(`${baseUrl}/api/download/${jobId}/clip_part1.mp4`)
    assert.equal(download.status, 200)
    assert.equal(download.headers.get('content-disposition'), 'attachment; filename="clip_part1.mp4"')
    assert.equal(await download.text(), '0.00+3.00')

    assert.deepEqual(await readdir(uploadDir), [])
  })
})

test('upload rejects a part count outside 2 to 4 and removes the file', async () => {
  await withApi('api', new FixedDurationSplitter(9), async ({ baseUrl, uploadDir, outputDir }) => {
    const res = await fetch(`${baseUrl}/api/upload`, { method: 'POST', body: uploadForm({ parts: '5' }) })

    assert.equal(res.status, 400)
    assert.deepEqual(await res.json(), { message: PART_RANGE_MESSAGE })
    assert.deepEqual(await readdir(uploadDir), [])
    assert.deepEqual(await readdir(outputDir), [])
  })
})

test('upload rejects unsupported file types and a missing file', async () => {
  await withApi('api', new FixedDurationSplitter(9), async ({ baseUrl, uploadDir }) => {
    const wrongType = await fetch(`${baseUrl}/api/upload`, {
      method: 'POST',
      body: uploadForm({ parts: '2', name: 'notes.txt' }),
    })
    assert.equal(wrongType.status, 400)
    assert.deepEqual(await wrongType.json(), { message: UNSUPPORTED_TYPE_MESSAGE })

    const noFile = await fetch(`${baseUrl}/api/upload`, {
      method: 'POST',
      body: uploadForm({ parts: '2', withFile: false }),
    })
    assert.equal(noFile.status, 400)
    assert.deepEqual(await noFile.json(), { message: MISSING_FILE_MESSAGE })
    assert.deepEqual(await readdir(uploadDir), [])
  })
})

test('job routes validate the id and report unknown jobs', async () => {
  await withApi('api', new FixedDurationSplitter(9), async ({ baseUrl }) => {
    const invalid = await fetch(`${baseUrl}/api/jobs/not-a-job`)
    assert.equal(invalid.status, 400)
    assert.deepEqual(await invalid.json(), { message: 'Invalid job id' })

    const missing = await fetch(`${baseUrl}/api/jobs/${JOB_ID}`)
    assert.equal(missing.status, 404)
    assert.deepEqual(await missing.json(), { job_id: JOB_ID, status: 'not-found' })

    const missingStatus = await fetch(`${baseUrl}/api/jobs/${JOB_ID}/status`)
    assert.equal(missingStatus.status, 404)
  })
})

test('downloads are limited to artifacts inside the job directory', async () => {
  await withApi('api', new FixedDurationSplitter(9), async ({ baseUrl, store }) => {
    await store.put(JOB_ID, processingRecord())

    const metadata = await fetch(`${baseUrl}/api/download/${JOB_ID}/metadata.json`)
    assert.equal(metadata.status, 400)

    const traversal = await fetch(`${baseUrl}/api/download/${JOB_ID}/..%2Fmetadata.json`)
    assert.equal(traversal.status, 400)

    const badId = await fetch(`${baseUrl}/api/download/not-a-job/clip_part1.mp4`)
    assert.equal(badId.status, 400)

    const absent = await fetch(`${baseUrl}/api/download/${JOB_ID}/clip_part1.mp4`)
    assert.equal(absent.status, 404)
    assert.deepEqual(await absent.json(), { message: 'File not found' })
  })
})

test('health and queue endpoints report process state', async () => {
  await withApi('api', new FixedDurationSplitter(9), async ({ baseUrl }) => {
    const health = await fetch(`${baseUrl}/healthz`)
    assert.deepEqual(await health.json(), { status: 'ok' })

    const version = await fetch(`${baseUrl}/version`)
    assert.deepEqual(await version.json(), { service: 'api', release: 'test-release', env: 'test' })

    const queue = await fetch(`${baseUrl}/ops/queue`)
    assert.deepEqual(await queue.json(), {
      name: 'api-test',
      concurrency: 1,
      active: 0,
      waiting: 0,
      closed: false,
    })
  })
})
