import fs from 'fs/promises'
import path from 'path'
import { Logger, redactFilePath } from '../lib/logger'

/**
 * Best-effort removal of a job's transient upload: the file, then its per-job directory.
 * Never throws; failures are logged.
 */
export async function removeTransientUpload(filePath: string, log: Logger): Promise<void> {
  try {
    await fs.rm(filePath, { force: true })
  } catch (err) {
    log.warn({ err, file: redactFilePath(filePath) }, 'Unable to remove uploaded file after processing')
  }

  const uploadDir = path.dirname(filePath)
  try {
    await fs.rmdir(uploadDir)
  } catch (err) {
    log.debug({ err, dir: redactFilePath(uploadDir) }, 'Upload directory not removed (may not be empty)')
  }
}

/** Remove a rejected upload that never became a job. */
export async function discardUpload(filePath: string | undefined, log: Logger): Promise<void> {
  if (!filePath) return
  try {
    await fs.rm(filePath, { force: true })
  } catch (err) {
    log.warn({ err, file: redactFilePath(filePath) }, 'Unable to remove rejected upload')
  }
}
