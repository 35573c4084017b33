import { fromFile as fileTypeFromFile } from 'file-type'
import path from 'path'
import { MAX_PARTS, MIN_PARTS, isValidPartCount } from '../models/Job'
import { getLogger } from '../lib/logger'

const ALLOWED_MIME_TYPES = ['video/mp4', 'video/quicktime']

export const ALLOWED_VIDEO_EXT = ['.mp4']

export const UNSUPPORTED_TYPE_MESSAGE = 'Only MP4 files are supported.'
export const MISSING_FILE_MESSAGE = 'Please choose an MP4 file to upload.'
export const PART_RANGE_MESSAGE = `Please choose between ${MIN_PARTS} and ${MAX_PARTS} parts.`

export function hasAllowedVideoExtension(filename: string): boolean {
  return ALLOWED_VIDEO_EXT.includes(path.extname(filename).toLowerCase())
}

/**
 * Parse the `parts` form field. Returns null when it is not an integer in [MIN_PARTS, MAX_PARTS].
 */
export function parsePartCount(raw: unknown): number | null {
  if (typeof raw === 'number') return isValidPartCount(raw) ? raw : null
  if (typeof raw !== 'string' || !/^\s*\d+\s*$/.test(raw)) return null
  const value = Number.parseInt(raw, 10)
  return isValidPartCount(value) ? value : null
}

/**
 * Validate an uploaded video by extension and, where the magic bytes are recognised, by content.
 * Content that file-type cannot identify is accepted on the extension alone (some MP4 variants are not detected).
 * Returns an error message, or null when the file is acceptable.
 */
export async function validateVideoFile(filePath: string, originalFilename: string): Promise<string | null> {
  if (!hasAllowedVideoExtension(originalFilename)) {
    return UNSUPPORTED_TYPE_MESSAGE
  }
  try {
    const fileType = await fileTypeFromFile(filePath)
    getLogger('api').debug({ fileType }, 'Detected upload file type')
    if (fileType && !ALLOWED_MIME_TYPES.includes(fileType.mime)) {
      return UNSUPPORTED_TYPE_MESSAGE
    }
    return null
  } catch (err) {
    getLogger('api').warn({ err }, 'File type detection failed; accepting by extension')
    return null
  }
}
