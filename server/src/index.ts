import { ensureDataDirs, loadConfig } from './env'
import { initSentry } from './lib/sentry'
import { getLogger } from './lib/logger'
import { MetadataStore } from './store/metadataStore'
import { FfmpegSplitter } from './services/ffmpeg'
import { JobSubmissionService } from './services/jobSubmission'
import { JobStatusReader } from './services/jobStatus'
import { WorkerPool } from './workers/workerPool'
import { JobRunner } from './workers/jobRunner'
import { createApp } from './app'

const log = getLogger('api')
const config = loadConfig()
initSentry(config)
ensureDataDirs(config)

const store = new MetadataStore(config.outputDir)
const pool = new WorkerPool({ concurrency: config.workerThreads, name: 'video-worker' })
const runner = new JobRunner({
  store,
  splitter: new FfmpegSplitter({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath }),
})
const submission = new JobSubmissionService({ store, pool, runner, uploadsRoot: config.uploadDir })
const reader = new JobStatusReader(store)

const app = createApp({ config, store, pool, submission, reader })

const server = app.listen(config.port, () => {
  log.info(
    { port: config.port, dataDir: config.dataDir, workers: pool.concurrency },
    'Server listening'
  )
})

server.on('error', (error: NodeJS.ErrnoException) => {
  if (error.code === 'EADDRINUSE') {
    log.fatal({ port: config.port }, 'Port is already in use; set PORT to another value')
  } else {
    log.fatal({ err: error }, 'Server error')
  }
  process.exit(1)
})

// In-flight jobs are abandoned on exit and keep their `processing` record.
function shutdown(signal: string) {
  log.info({ signal }, 'Shutting down gracefully')
  const dropped = pool.shutdown()
  const { active } = pool.stats()
  if (dropped > 0 || active > 0) {
    log.warn({ dropped, active }, 'Jobs left in processing state')
  }
  server.close(() => {
    log.info('Server closed')
    process.exit(0)
  })
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
