import path from 'path'
import { DurationUnavailableError } from '../lib/errors'

/**
 * Cuts a source file into `parts` contiguous clips inside `outputDir`.
 * Resolves to the output file names (not paths) in part order. Rejects with
 * DurationUnavailableError, ExternalToolError, or anything else for unclassified faults.
 */
export interface Splitter {
  split(sourcePath: string, outputDir: string, parts: number): Promise<string[]>
}

export interface SegmentPlan {
  index: number
  start: number
  /** Seconds covered by this part; the last part absorbs the remainder. */
  length: number
  /** False for the last part, which runs to the end of the source. */
  bounded: boolean
  fileName: string
}

/** Generate output filename for part `index` (0-based): clip.mp4 → clip_part1.mp4 */
export function partFileName(sourceName: string, index: number): string {
  const ext = path.extname(sourceName)
  const stem = path.basename(sourceName, ext)
  return `${stem}_part${index + 1}${ext}`
}

export function formatTimestamp(seconds: number): string {
  return seconds.toFixed(2)
}

/** Duration as reported by the prober; anything but a finite positive number is unusable. */
export function parseDuration(raw: unknown, sourcePath: string): number {
  const duration = typeof raw === 'string' ? Number.parseFloat(raw) : raw
  if (typeof duration !== 'number' || !Number.isFinite(duration)) {
    throw new DurationUnavailableError(`Unable to determine duration for ${path.basename(sourcePath)}`)
  }
  if (duration <= 0) {
    throw new DurationUnavailableError(`Invalid video duration (${duration}) for ${path.basename(sourcePath)}`)
  }
  return duration
}

export function planSegments(sourcePath: string, duration: number, parts: number): SegmentPlan[] {
  const partDuration = duration / parts
  const sourceName = path.basename(sourcePath)
  const plan: SegmentPlan[] = []
  for (let index = 0; index < parts; index++) {
    const start = partDuration * index
    const bounded = index < parts - 1
    plan.push({
      index,
      start,
      length: bounded ? partDuration : duration - start,
      bounded,
      fileName: partFileName(sourceName, index),
    })
  }
  return plan
}

/** Output options for one stream-copy cut. -ss is applied after -i. */
export function buildCutOptions(segment: SegmentPlan): string[] {
  const options = ['-ss', formatTimestamp(segment.start), '-c', 'copy']
  if (segment.bounded) {
    options.push('-t', formatTimestamp(segment.length))
  }
  return options
}
