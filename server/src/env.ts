/**
 * Load .env before anything reads process.env, and expose the typed runtime configuration.
 * Must be the first import in index.ts.
 */
import 'dotenv/config'
import path from 'path'
import fs from 'fs'

const DEFAULT_PORT = 3001
const DEFAULT_WORKER_THREADS = 2
const DEFAULT_MAX_UPLOAD_BYTES = 2 * 1024 * 1024 * 1024 // 2GB

export interface AppConfig {
  port: number
  nodeEnv: string
  release: string
  dataDir: string
  uploadDir: string
  outputDir: string
  workerThreads: number
  maxUploadBytes: number
  ffmpegPath?: string
  ffprobePath?: string
  sentryDsn?: string
  corsOrigins: string[]
}

function parseInteger(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === '') return fallback
  const value = Number.parseInt(raw, 10)
  return Number.isNaN(value) ? fallback : value
}

function optional(raw: string | undefined): string | undefined {
  const value = raw?.trim()
  return value ? value : undefined
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const dataDir = path.resolve(source.DATA_DIR?.trim() || path.join(process.cwd(), 'data'))
  return {
    port: parseInteger(source.PORT, DEFAULT_PORT),
    nodeEnv: source.NODE_ENV || 'development',
    release: source.RELEASE || 'dev',
    dataDir,
    uploadDir: path.join(dataDir, 'uploads'),
    outputDir: path.join(dataDir, 'outputs'),
    // A pool needs at least one worker
    workerThreads: Math.max(1, parseInteger(source.WORKER_THREADS, DEFAULT_WORKER_THREADS)),
    maxUploadBytes: Math.max(1, parseInteger(source.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES)),
    ffmpegPath: optional(source.FFMPEG_PATH),
    ffprobePath: optional(source.FFPROBE_PATH),
    sentryDsn: optional(source.SENTRY_DSN),
    corsOrigins: (source.CORS_ORIGINS || '').split(',').map((o) => o.trim()).filter(Boolean),
  }
}

export function ensureDataDirs(config: Pick<AppConfig, 'uploadDir' | 'outputDir'>): void {
  fs.mkdirSync(config.uploadDir, { recursive: true })
  fs.mkdirSync(config.outputDir, { recursive: true })
}
