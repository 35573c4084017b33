import ffmpeg, { FfprobeData } from 'fluent-ffmpeg'
import ffmpegInstaller from '@ffmpeg-installer/ffmpeg'
import ffprobeInstaller from '@ffprobe-installer/ffprobe'
import fs from 'fs'
import path from 'path'
import { ExternalToolError } from '../lib/errors'
import { getLogger, Logger, redactFilePath } from '../lib/logger'
import { buildCutOptions, parseDuration, planSegments, SegmentPlan, Splitter } from './splitter'

export interface FfmpegBinaries {
  ffmpegPath?: string
  ffprobePath?: string
}

export interface ResolvedBinaries {
  ffmpegPath: string
  ffprobePath: string
}

// Explicit paths: use env (e.g. /usr/bin/ffmpeg in Docker) if the file exists, else the npm installer binary
function resolveBinaryPath(envPath: string | undefined, fallback: string): string {
  if (envPath && fs.existsSync(envPath)) return envPath
  return fallback
}

export function resolveBinaries(binaries: FfmpegBinaries): ResolvedBinaries {
  return {
    ffmpegPath: resolveBinaryPath(binaries.ffmpegPath, ffmpegInstaller.path),
    ffprobePath: resolveBinaryPath(binaries.ffprobePath, ffprobeInstaller.path),
  }
}

/** Reads format.duration through ffprobe. */
export function getVideoDuration(videoPath: string, ffprobePath: string): Promise<number> {
  return new Promise((resolve, reject) => {
    ffmpeg(videoPath)
      .setFfprobePath(ffprobePath)
      .ffprobe((err: Error | null, metadata: FfprobeData) => {
        if (err) {
          reject(new ExternalToolError('ffprobe', err.message))
          return
        }
        try {
          resolve(parseDuration(metadata?.format?.duration, videoPath))
        } catch (parseErr) {
          reject(parseErr)
        }
      })
  })
}

function cutSegment(
  ffmpegPath: string,
  sourcePath: string,
  outputPath: string,
  segment: SegmentPlan,
  log: Logger
): Promise<void> {
  return new Promise((resolve, reject) => {
    ffmpeg(sourcePath)
      .setFfmpegPath(ffmpegPath)
      .inputOptions(['-hide_banner', '-loglevel', 'warning'])
      .outputOptions(buildCutOptions(segment))
      .output(outputPath)
      .on('start', (commandLine: string) => {
        log.debug({ command: commandLine }, 'Running ffmpeg')
      })
      .on('end', (_stdout: string | null, stderr: string | null) => {
        if (stderr?.trim()) log.warn({ part: segment.index + 1, stderr: stderr.trim() }, 'ffmpeg stderr')
        resolve()
      })
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        reject(new ExternalToolError('ffmpeg', stderr?.trim() || err.message))
      })
      .run()
  })
}

/**
 * Splitter backed by ffprobe (duration) and ffmpeg stream copy (cuts).
 * Parts are cut one after another in index order.
 */
export class FfmpegSplitter implements Splitter {
  readonly binaries: ResolvedBinaries
  private readonly log: Logger

  constructor(binaries: FfmpegBinaries = {}, log: Logger = getLogger('worker')) {
    this.binaries = resolveBinaries(binaries)
    this.log = log
  }

  async split(sourcePath: string, outputDir: string, parts: number): Promise<string[]> {
    const source = redactFilePath(sourcePath)
    const duration = await getVideoDuration(sourcePath, this.binaries.ffprobePath)
    this.log.info({ source, duration }, 'Probed source duration')

    const outputs: string[] = []
    for (const segment of planSegments(sourcePath, duration, parts)) {
      const started = Date.now()
      await cutSegment(this.binaries.ffmpegPath, sourcePath, path.join(outputDir, segment.fileName), segment, this.log)
      this.log.info(
        { source, part: segment.index + 1, parts, elapsedMs: Date.now() - started },
        'Finished ffmpeg split part'
      )
      outputs.push(segment.fileName)
    }

    this.log.info({ source, parts }, 'Completed splitting source')
    return outputs
  }
}
